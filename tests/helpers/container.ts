/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * container.ts: Synthetic Novatek containers for tests.
 */
import type { GpsSample, Nullable } from "../../src/types/index.js";
import type { IndexEntry } from "../../src/parser/gpsBlockLocator.js";

/**
 * The body fields of a GPS record, as the camera stores them.
 */
export interface RecordFields {

  active: string;
  bearing: number;
  day: number;
  hour: number;
  latitude: number;
  latitudeHemisphere: string;
  longitude: number;
  longitudeHemisphere: string;
  minute: number;
  month: number;
  second: number;
  speed: number;
  year: number;
}

// 2024-06-15 12:30:45 on the camera clock, 37 13.484' N 1 45.9' E, 10 knots heading east.
export const BASE_RECORD: RecordFields = {

  active: "A",
  bearing: 90,
  day: 15,
  hour: 12,
  latitude: 3713.484,
  latitudeHemisphere: "N",
  longitude: 145.9,
  longitudeHemisphere: "E",
  minute: 30,
  month: 6,
  second: 45,
  speed: 10,
  year: 24
};

/**
 * Builds a box from a type and payload parts.
 */
export function box(type: string, ...payload: Buffer[]): Buffer {

  const body = Buffer.concat(payload);
  const header = Buffer.alloc(8);

  header.writeUInt32BE(8 + body.length, 0);
  header.write(type, 4, "latin1");

  return Buffer.concat([ header, body ]);
}

/**
 * Builds a raw 8-byte box header with an arbitrary declared size.
 */
export function rawHeader(size: number, type: string): Buffer {

  const header = Buffer.alloc(8);

  header.writeUInt32BE(size, 0);
  header.write(type, 4, "latin1");

  return header;
}

/**
 * Builds a GPS record. The size must be at least 60 bytes.
 */
export function gpsRecord(overrides: Partial<RecordFields> = {}, size = 64): Buffer {

  const fields = { ...BASE_RECORD, ...overrides };
  const data = Buffer.alloc(size);

  data.writeUInt32BE(size, 0);
  data.write("free", 4, "latin1");
  data.write("GPS ", 8, "latin1");

  [ fields.hour, fields.minute, fields.second, fields.year, fields.month, fields.day ].forEach((value, index) => {

    data.writeUInt32LE(value, 16 + (index * 4));
  });

  data.write(fields.active, 40, "latin1");
  data.write(fields.latitudeHemisphere, 41, "latin1");
  data.write(fields.longitudeHemisphere, 42, "latin1");
  data.writeFloatLE(fields.latitude, 44);
  data.writeFloatLE(fields.longitude, 48);
  data.writeFloatLE(fields.speed, 52);
  data.writeFloatLE(fields.bearing, 56);

  return data;
}

/**
 * Builds a "gps " box holding an index table.
 */
export function gpsIndexBox(entries: readonly IndexEntry[]): Buffer {

  const table = Buffer.alloc(8 + (entries.length * 8));

  entries.forEach((entry, index) => {

    table.writeUInt32BE(entry.offset, 8 + (index * 8));
    table.writeUInt32BE(entry.size, 12 + (index * 8));
  });

  return box("gps ", table);
}

// Size of the ftyp box that starts every container built here.
export const FTYP_SIZE = 16;

/**
 * Builds a container: ftyp, an mdat holding the records back to back, then moov with an mvhd and the GPS index. A null record becomes a (0, 0) index entry. Extra
 * entries are appended to the index as given.
 */
export function buildContainer(records: readonly Nullable<Buffer>[], extraEntries: readonly IndexEntry[] = []): Buffer {

  const ftyp = box("ftyp", Buffer.from("isom\0\0\0\0", "latin1"));
  const mdat = box("mdat", ...records.filter((record): record is Buffer => record !== null));
  const entries: IndexEntry[] = [];
  let offset = FTYP_SIZE + 8;

  for(const record of records) {

    if(!record) {

      entries.push({ offset: 0, size: 0 });

      continue;
    }

    entries.push({ offset, size: record.length });
    offset += record.length;
  }

  entries.push(...extraEntries);

  return Buffer.concat([ ftyp, mdat, box("moov", box("mvhd", Buffer.alloc(4)), gpsIndexBox(entries)) ]);
}

/**
 * Builds a sample directly.
 */
export function sample(overrides: Partial<GpsSample> = {}): GpsSample {

  return {

    bearing: 0,
    latitude: 41.8781,
    longitude: -87.6298,
    speed: 10,
    timestamp: new Date("2024-06-15T17:30:45.000Z"),
    ...overrides
  };
}

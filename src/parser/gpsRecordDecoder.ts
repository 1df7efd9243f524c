/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * gpsRecordDecoder.ts: Decoding of Novatek GPS records.
 */
import type { GpsSample, Nullable } from "../types/index.js";
import { getDaysInMonth, isValid } from "date-fns";
import type { ByteSource } from "./byteSource.js";
import type { IndexEntry } from "./gpsBlockLocator.js";
import { fromZonedTime } from "date-fns-tz";

/* Each GPS reading is stored as a "free" box so that standard players skip it. The layout mixes byte orders: the box header is big-endian like every MP4 box, while
 * the body written by the camera firmware is little-endian.
 *
 * [0-3]   size (big-endian uint32), must equal the size recorded in the index
 * [4-7]   "free"
 * [8-11]  "GPS "
 * [12-15] unused
 * [16-39] hour, minute, second, year, month, day (little-endian uint32 each, year is years since 2000)
 * [40]    status: 'A' when the receiver has a fix
 * [41]    latitude hemisphere: 'N' or 'S'
 * [42]    longitude hemisphere: 'E' or 'W'
 * [43]    unused
 * [44-59] latitude, longitude, speed in knots, bearing in degrees (little-endian float32 each)
 *
 * Coordinates are stored the way NMEA sentences carry them: DDDMM.MMMM, i.e. whole degrees times 100 plus decimal minutes.
 */

// Offset of the little-endian body.
const BODY_OFFSET = 16;

// Minimum record size that holds a complete body.
export const MIN_GPS_RECORD_SIZE = 60;

// Conversion factor from knots to meters per second.
export const KNOTS_TO_METERS_PER_SECOND = 0.514444;

/**
 * The result of decoding one record. A record without a fix is a normal condition and carries no reason; a malformed record carries a reason for diagnostics. Both
 * end up as an empty track slot.
 */
export type RecordDecodeResult =
  { readonly sample: GpsSample; readonly status: "ok" } |
  { readonly status: "noFix" } |
  { readonly reason: string; readonly status: "malformed" };

/**
 * The raw body fields of a record, before any conversion.
 */
export interface RawGpsRecord {

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

/**
 * Reads the body fields of a record. The caller guarantees the buffer holds at least MIN_GPS_RECORD_SIZE bytes.
 * @param data - The complete record.
 * @returns The raw fields.
 */
export function parseRecordBody(data: Buffer): RawGpsRecord {

  const pos = BODY_OFFSET;

  return {

    active: data.toString("latin1", pos + 24, pos + 25),
    bearing: data.readFloatLE(pos + 40),
    day: data.readUInt32LE(pos + 20),
    hour: data.readUInt32LE(pos),
    latitude: data.readFloatLE(pos + 28),
    latitudeHemisphere: data.toString("latin1", pos + 25, pos + 26),
    longitude: data.readFloatLE(pos + 32),
    longitudeHemisphere: data.toString("latin1", pos + 26, pos + 27),
    minute: data.readUInt32LE(pos + 4),
    month: data.readUInt32LE(pos + 16),
    second: data.readUInt32LE(pos + 8),
    speed: data.readFloatLE(pos + 36),
    year: data.readUInt32LE(pos + 12)
  };
}

/**
 * Converts a DDDMM.MMMM fixed-point coordinate into signed decimal degrees.
 * @param raw - The stored coordinate.
 * @param hemisphere - The hemisphere letter. 'S' and 'W' produce a negative result.
 * @returns Decimal degrees.
 */
export function decodeCoordinate(raw: number, hemisphere: string): number {

  const minutes = raw % 100;
  const degrees = raw - minutes;
  const decimal = (degrees / 100) + (minutes / 60);

  return ((hemisphere === "S") || (hemisphere === "W")) ? -decimal : decimal;
}

/**
 * Converts a speed in knots to meters per second.
 * @param knots - Speed in knots.
 * @returns Speed in meters per second.
 */
export function knotsToMetersPerSecond(knots: number): number {

  return knots * KNOTS_TO_METERS_PER_SECOND;
}

/**
 * Zero-pads a number to the given width.
 */
function pad(value: number, width: number): string {

  return String(value).padStart(width, "0");
}

/**
 * Checks whether a string names a time zone the runtime knows.
 * @param timeZone - The IANA time zone name.
 * @returns True if the zone can be used for conversions.
 */
export function isValidTimeZone(timeZone: string): boolean {

  if(timeZone.length === 0) {

    return false;
  }

  try {

    return Intl.DateTimeFormat("en-US", { timeZone }).resolvedOptions().timeZone.length > 0;
  } catch {

    return false;
  }
}

/**
 * Resolves the camera's wall-clock fields to an instant in the given time zone. The year is an offset from 2000.
 * @param record - The raw record fields.
 * @param timeZone - IANA time zone the camera clock was set to.
 * @returns The instant, or null if any field is out of range or the time zone is unknown.
 */
export function resolveTimestamp(record: Pick<RawGpsRecord, "day" | "hour" | "minute" | "month" | "second" | "year">, timeZone: string): Nullable<Date> {

  const { day, hour, minute, month, second } = record;

  if((record.year > 99) || (month < 1) || (month > 12) || (hour > 23) || (minute > 59) || (second > 59)) {

    return null;
  }

  const year = 2000 + record.year;

  if((day < 1) || (day > getDaysInMonth(new Date(year, month - 1, 1)))) {

    return null;
  }

  const wallClock = [ pad(year, 4), "-", pad(month, 2), "-", pad(day, 2), "T", pad(hour, 2), ":", pad(minute, 2), ":", pad(second, 2) ].join("");
  const instant = fromZonedTime(wallClock, timeZone);

  return isValid(instant) ? instant : null;
}

/**
 * Decodes one record that has already been read from the file.
 * @param data - The record bytes.
 * @param expectedSize - The size the index table promised for this record.
 * @param timeZone - IANA time zone the camera clock was set to.
 * @returns The decoded sample, noFix, or malformed with a reason.
 */
export function decodeGpsRecord(data: Buffer, expectedSize: number, timeZone: string): RecordDecodeResult {

  if(data.length < MIN_GPS_RECORD_SIZE) {

    return { reason: [ "record is ", String(data.length), " bytes, need at least ", String(MIN_GPS_RECORD_SIZE) ].join(""), status: "malformed" };
  }

  const selfSize = data.readUInt32BE(0);
  const type = data.toString("latin1", 4, 8);
  const magic = data.toString("latin1", 8, 12);

  if((selfSize !== expectedSize) || (type !== "free") || (magic !== "GPS ")) {

    return {

      reason: [ "expected size ", String(expectedSize), " type 'free' magic 'GPS ', found size ", String(selfSize), " type '", type, "' magic '", magic, "'" ].join(""),
      status: "malformed"
    };
  }

  const record = parseRecordBody(data);

  if(record.active !== "A") {

    return { status: "noFix" };
  }

  for(const field of [ "latitude", "longitude", "speed", "bearing" ] as const) {

    if(!Number.isFinite(record[field])) {

      return { reason: [ "non-finite ", field, " ", String(record[field]) ].join(""), status: "malformed" };
    }
  }

  const timestamp = resolveTimestamp(record, timeZone);

  if(!timestamp) {

    return {

      reason: [ "invalid date ", String(record.year), "/", String(record.month), "/", String(record.day), " ", String(record.hour), ":", String(record.minute), ":",
        String(record.second) ].join(""),
      status: "malformed"
    };
  }

  return {

    sample: {

      bearing: record.bearing,
      latitude: decodeCoordinate(record.latitude, record.latitudeHemisphere),
      longitude: decodeCoordinate(record.longitude, record.longitudeHemisphere),
      speed: knotsToMetersPerSecond(record.speed),
      timestamp
    },
    status: "ok"
  };
}

/**
 * Reads and decodes the record an index entry points at.
 * @param source - The byte source.
 * @param entry - The index entry.
 * @param timeZone - IANA time zone the camera clock was set to.
 * @returns The decoded sample, noFix, or malformed with a reason.
 */
export function readGpsRecord(source: ByteSource, entry: IndexEntry, timeZone: string): RecordDecodeResult {

  return decodeGpsRecord(source.read(entry.offset, entry.size), entry.size, timeZone);
}

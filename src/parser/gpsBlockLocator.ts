/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * gpsBlockLocator.ts: Locates the Novatek GPS index table inside an MP4 container.
 */
import type { AtomHeader, StructuralError } from "./atomWalker.js";
import type { ByteSource } from "./byteSource.js";
import type { Nullable } from "../types/index.js";
import { findAtom } from "./atomWalker.js";

/* Novatek-based dash cams do not store GPS readings in a standard track. Instead, the moov box carries a vendor box of type "gps " whose payload is an index table
 * pointing at the actual readings, which are written as "free" boxes interleaved with the media data:
 *
 * moov
 *   ...
 *   gps   [0-3] size, [4-7] "gps ", [8-15] version and entry count (unused), then N entries of:
 *         [0-3] absolute offset of the record (big-endian uint32)
 *         [4-7] size of the record in bytes (big-endian uint32)
 *
 * Entries are written once per second in recording order, so the position of an entry in the table is the elapsed time of its reading. The table is preallocated and
 * its unused tail is zero-filled. We return every entry, including unusable ones, because dropping one would shift every later reading in time.
 */

// Box types along the path from the top level to the GPS index.
export const GPS_ATOM_PATH = [ "moov", "gps " ] as const;

// Offset of the first index entry from the start of the "gps " box: 8 bytes of box header plus 8 bytes of version and count.
export const GPS_INDEX_TABLE_OFFSET = 16;

// Size of one index entry.
export const GPS_INDEX_ENTRY_SIZE = 8;

// Records larger than this are rejected without being read. A real record is a few hundred bytes; a larger value means the index is corrupt.
export const MAX_GPS_RECORD_SIZE = 100000;

/**
 * One entry of the GPS index table.
 */
export interface IndexEntry {

  // Absolute offset of the record within the file.
  readonly offset: number;

  // Size of the record in bytes.
  readonly size: number;
}

/**
 * Result of locating the index. A file without a "gps " box yields an empty entry list rather than an error.
 */
export type GpsIndexResult = { readonly entries: IndexEntry[]; readonly kind: "index" } | StructuralError;

/**
 * Reads the index table of a "gps " box. Entries are read until the box's declared extent is exhausted; a trailing partial entry is ignored.
 * @param source - The byte source.
 * @param header - The header of the "gps " box.
 * @returns The index entries in table order.
 */
export function readIndexTable(source: ByteSource, header: AtomHeader): IndexEntry[] {

  const end = header.offset + header.size;
  const entries: IndexEntry[] = [];

  for(let pos = header.offset + GPS_INDEX_TABLE_OFFSET; (pos + GPS_INDEX_ENTRY_SIZE) <= end; pos += GPS_INDEX_ENTRY_SIZE) {

    const raw = source.read(pos, GPS_INDEX_ENTRY_SIZE);

    if(raw.length < GPS_INDEX_ENTRY_SIZE) {

      break;
    }

    entries.push({ offset: raw.readUInt32BE(0), size: raw.readUInt32BE(4) });
  }

  return entries;
}

/**
 * Walks the container to the "gps " box inside moov and reads its index table.
 * @param source - The byte source.
 * @returns The index entries (possibly empty), or the structural error that prevented the search.
 */
export function locateGpsIndex(source: ByteSource): GpsIndexResult {

  const result = findAtom(source, GPS_ATOM_PATH);

  switch(result.kind) {

    case "atom": {

      return { entries: readIndexTable(source, result.header), kind: "index" };
    }

    case "notFound": {

      return { entries: [], kind: "index" };
    }

    default: {

      return result;
    }
  }
}

/**
 * Checks whether an index entry can point at a record at all. Rejected entries become empty track slots without being read.
 * @param entry - The index entry.
 * @param sourceLength - Total size of the source.
 * @returns The reason for rejecting the entry, or null if it may be read.
 */
export function checkIndexEntry(entry: IndexEntry, sourceLength: number): Nullable<string> {

  if(entry.size > MAX_GPS_RECORD_SIZE) {

    return [ "record size ", String(entry.size), " exceeds the ", String(MAX_GPS_RECORD_SIZE), " byte limit" ].join("");
  }

  if((entry.offset + entry.size) > sourceLength) {

    return [ "record at offset ", String(entry.offset), " with size ", String(entry.size), " extends past the end of the file" ].join("");
  }

  return null;
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * trackBuilder.ts: Assembles the GPS track of a Novatek container.
 */
import type { ByteSource } from "./byteSource.js";
import { createBufferSource, openFileSource } from "./byteSource.js";
import type { IndexEntry } from "./gpsBlockLocator.js";
import { checkIndexEntry, locateGpsIndex } from "./gpsBlockLocator.js";
import type { Track, TrackSlot } from "../types/index.js";
import { LOG } from "../utils/logger.js";
import type { StructuralError } from "./atomWalker.js";
import { readGpsRecord } from "./gpsRecordDecoder.js";

/**
 * The file-level result of extracting a track. Record-level problems never surface here; they are empty slots inside the track.
 *
 * - track: at least one slot holds a sample.
 * - emptyTrack: the file has no "gps " box, an empty index, or no usable record. `entries` is the size of the index table, so zero means the camera wrote no GPS
 *   data at all.
 * - structuralError: the container could not be walked far enough to find the GPS index.
 */
export type TrackOutcome =
  { readonly fixes: number; readonly kind: "track"; readonly track: Track } |
  { readonly entries: number; readonly kind: "emptyTrack" } |
  { readonly error: StructuralError; readonly kind: "structuralError" };

/**
 * Builds a track from index entries, one slot per entry in index order. Entries that are rejected, records that fail validation and records without a fix all leave an
 * empty slot, and decoding continues with the next entry.
 * @param source - The byte source.
 * @param entries - The index entries in table order.
 * @param timeZone - IANA time zone the camera clock was set to.
 * @returns The track.
 */
export function buildTrack(source: ByteSource, entries: readonly IndexEntry[], timeZone: string): Track {

  const slots: TrackSlot[] = [];
  let malformed = 0;
  let noFix = 0;

  for(const [ index, entry ] of entries.entries()) {

    const rejection = checkIndexEntry(entry, source.length);

    if(rejection) {

      // The zero-filled tail of the preallocated index is expected and not worth a warning.
      if((entry.offset !== 0) || (entry.size !== 0)) {

        LOG.warn("Skipping GPS index entry %d: %s.", index, rejection);
      }

      malformed++;
      slots.push(null);

      continue;
    }

    const result = readGpsRecord(source, entry, timeZone);

    switch(result.status) {

      case "ok": {

        slots.push(result.sample);

        break;
      }

      case "noFix": {

        noFix++;
        slots.push(null);

        break;
      }

      case "malformed": {

        LOG.debug("parser:records", "Skipping GPS record %d at offset %d: %s.", index, entry.offset, result.reason);

        malformed++;
        slots.push(null);

        break;
      }
    }
  }

  LOG.debug("parser:records", "Decoded %d GPS slots: %d with a fix, %d without a fix, %d unreadable.", slots.length, slots.length - noFix - malformed, noFix, malformed);

  return { slots, timeZone };
}

/**
 * Extracts the track of a container held in a byte source.
 * @param source - The byte source.
 * @param timeZone - IANA time zone the camera clock was set to.
 * @returns The file-level outcome.
 */
export function extractTrackFromSource(source: ByteSource, timeZone: string): TrackOutcome {

  const index = locateGpsIndex(source);

  if(index.kind === "structuralError") {

    return { error: index, kind: "structuralError" };
  }

  const track = buildTrack(source, index.entries, timeZone);
  const fixes = countFixes(track);

  if(fixes === 0) {

    return { entries: index.entries.length, kind: "emptyTrack" };
  }

  return { fixes, kind: "track", track };
}

/**
 * Extracts the track of a container held in memory.
 * @param bytes - The complete container.
 * @param timeZone - IANA time zone the camera clock was set to.
 * @returns The file-level outcome.
 */
export function extractTrack(bytes: Uint8Array, timeZone: string): TrackOutcome {

  return extractTrackFromSource(createBufferSource(bytes), timeZone);
}

/**
 * Extracts the track of a container file. Only the box headers and the GPS records are read.
 * @param filePath - Path to the container.
 * @param timeZone - IANA time zone the camera clock was set to.
 * @returns The file-level outcome.
 * @throws If the file cannot be opened or read.
 */
export function extractTrackFromFile(filePath: string, timeZone: string): TrackOutcome {

  const source = openFileSource(filePath);

  try {

    return extractTrackFromSource(source, timeZone);
  } finally {

    source.close();
  }
}

/**
 * Counts the slots of a track that hold a sample.
 * @param track - The track.
 * @returns The number of samples.
 */
export function countFixes(track: Track): number {

  return track.slots.reduce((count, slot) => (slot ? count + 1 : count), 0);
}

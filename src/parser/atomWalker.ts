/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * atomWalker.ts: Region-bounded traversal of MP4 boxes.
 */
import type { ByteSource } from "./byteSource.js";
import { LOG } from "../utils/logger.js";

/* MP4 files consist of a sequence of "boxes" (also called "atoms"). Each box has a simple structure:
 *
 * - 4 bytes: size (big-endian uint32) - total box size including header
 * - 4 bytes: type (4 ASCII characters, e.g., 'ftyp', 'moov', 'mdat', 'gps ')
 * - (size - 8) bytes: payload
 *
 * Container boxes such as moov hold further boxes in their payload. Every walk here is bounded by an explicit region [start, end): a box whose declared size runs past
 * the end of its region is a structural error, and the walk of that region stops there because every later offset would be computed from a size we no longer trust.
 * A size of zero ends the region without error; Novatek firmware pads the tail of some regions with zeros.
 */

// Size of the fixed box header: 4 bytes size + 4 bytes type.
export const ATOM_HEADER_SIZE = 8;

/**
 * A half-open byte range [start, end) within a source.
 */
export interface Region {

  readonly end: number;
  readonly start: number;
}

/**
 * A parsed box header.
 */
export interface AtomHeader {

  // Absolute offset of the first header byte.
  readonly offset: number;

  // Declared box size, header included.
  readonly size: number;

  // The 4-character box type. Trailing spaces are significant ("gps ").
  readonly type: string;
}

/**
 * A box whose header cannot be trusted. Stops the walk of the region it was found in.
 */
export interface StructuralError {

  readonly kind: "structuralError";
  readonly message: string;

  // Absolute offset of the offending header.
  readonly offset: number;
}

/**
 * A successfully parsed box and the region holding its payload.
 */
export interface AtomEntry {

  readonly header: AtomHeader;
  readonly kind: "atom";
  readonly payload: Region;
}

export type AtomWalkItem = AtomEntry | StructuralError;

/**
 * Result of searching for a box along a path of types.
 */
export type FindAtomResult = AtomEntry | StructuralError | { readonly kind: "notFound" };

/**
 * Returns the region covering an entire source.
 * @param source - The byte source.
 * @returns The region [0, source.length).
 */
export function wholeSource(source: ByteSource): Region {

  return { end: source.length, start: 0 };
}

/**
 * Creates a structural error value.
 * @param offset - Absolute offset of the offending header.
 * @param message - Description of what was wrong.
 * @returns The error value.
 */
function structuralError(offset: number, message: string): StructuralError {

  return { kind: "structuralError", message, offset };
}

/**
 * Lazily walks the sibling boxes of a region. Yields one item per box in order. The sequence ends quietly at the end of the region or at a zero-size header. A header
 * that is truncated, declares a size smaller than the header itself, or declares a size that exceeds the remaining bytes of the region produces exactly one
 * StructuralError, after which the sequence ends.
 * @param source - The byte source.
 * @param region - The region to walk. Clamped to the end of the source.
 */
export function* walkAtoms(source: ByteSource, region: Region): Generator<AtomWalkItem, void, undefined> {

  const end = Math.min(region.end, source.length);
  let pos = region.start;

  while(pos < end) {

    const remaining = end - pos;

    if(remaining < ATOM_HEADER_SIZE) {

      yield structuralError(pos, [ "truncated box header: ", String(remaining), " bytes remain in region" ].join(""));

      return;
    }

    const header = source.read(pos, ATOM_HEADER_SIZE);

    if(header.length < ATOM_HEADER_SIZE) {

      yield structuralError(pos, "box header could not be read");

      return;
    }

    const size = header.readUInt32BE(0);

    if(size === 0) {

      return;
    }

    const type = header.toString("latin1", 4, 8);

    if(size < ATOM_HEADER_SIZE) {

      yield structuralError(pos, [ "box '", type, "' declares size ", String(size), ", smaller than its header" ].join(""));

      return;
    }

    if(size > remaining) {

      yield structuralError(pos, [ "box '", type, "' declares size ", String(size), " but only ", String(remaining), " bytes remain in region" ].join(""));

      return;
    }

    yield { header: { offset: pos, size, type }, kind: "atom", payload: { end: pos + size, start: pos + ATOM_HEADER_SIZE } };

    pos += size;
  }
}

/**
 * Descends through nested boxes following a path of types, e.g. [ "moov", "gps " ]. The descent uses an explicit stack of region walkers, one per level, and only
 * enters boxes whose type matches the path at that depth. A structural error aborts the region it occurs in and the search continues in the enclosing region. If the
 * box is never found and a structural error was seen on the way, that error is returned, since the box may have been inside the region we could not read.
 * @param source - The byte source.
 * @param path - Box types from the outermost to the target.
 * @param region - The region to search. Defaults to the whole source.
 * @returns The first matching box, the first structural error, or notFound.
 */
export function findAtom(source: ByteSource, path: readonly string[], region: Region = wholeSource(source)): FindAtomResult {

  if(path.length === 0) {

    return { kind: "notFound" };
  }

  const stack: { atoms: Generator<AtomWalkItem, void, undefined>; depth: number }[] = [ { atoms: walkAtoms(source, region), depth: 0 } ];
  let firstError: StructuralError | undefined;

  while(stack.length > 0) {

    const frame = stack[stack.length - 1];
    const next = frame.atoms.next();

    if(next.done) {

      stack.pop();

      continue;
    }

    const item = next.value;

    if(item.kind === "structuralError") {

      LOG.debug("parser:atoms", "Structural error at offset %d: %s.", item.offset, item.message);

      firstError ??= item;

      continue;
    }

    LOG.debug("parser:atoms", "Box '%s' at offset %d, size %d.", item.header.type, item.header.offset, item.header.size);

    if(item.header.type !== path[frame.depth]) {

      continue;
    }

    if(frame.depth === (path.length - 1)) {

      return item;
    }

    stack.push({ atoms: walkAtoms(source, item.payload), depth: frame.depth + 1 });
  }

  return firstError ?? { kind: "notFound" };
}

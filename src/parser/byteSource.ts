/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * byteSource.ts: Random-access byte sources for container parsing.
 */
import fs from "node:fs";

/* The parser never needs the whole file in memory. GPS records are scattered through a container that is usually several hundred megabytes, and the parser only
 * touches a few kilobytes of it: the box headers on the way down to the index table, and each record the table points at. A ByteSource abstracts "give me these
 * bytes" so the same parser runs against an in-memory buffer (tests, callers that already hold the bytes) and an open file descriptor.
 */

/**
 * A seekable, finite source of bytes.
 */
export interface ByteSource {

  // Total size of the source in bytes.
  readonly length: number;

  /**
   * Reads up to `length` bytes starting at `offset`. Fewer bytes are returned when the read crosses the end of the source, and an empty buffer when `offset` is at
   * or beyond the end.
   */
  read: (offset: number, length: number) => Buffer;
}

/**
 * A byte source backed by an open file. Must be closed by the caller.
 */
export interface FileByteSource extends ByteSource {

  close: () => void;
}

/**
 * Wraps an in-memory buffer as a byte source. The returned slices share memory with the buffer.
 * @param bytes - The complete container.
 * @returns The byte source.
 */
export function createBufferSource(bytes: Uint8Array): ByteSource {

  const buffer = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  return {

    length: buffer.length,
    read: (offset: number, length: number): Buffer => {

      if((offset < 0) || (length <= 0) || (offset >= buffer.length)) {

        return Buffer.alloc(0);
      }

      return buffer.subarray(offset, Math.min(offset + length, buffer.length));
    }
  };
}

/**
 * Opens a file as a byte source. Reads are synchronous positional reads, so the source holds no cursor and can be shared by sequential callers.
 * @param filePath - Path to the container file.
 * @returns The byte source. Call close() when finished.
 * @throws If the file cannot be opened or stat'ed.
 */
export function openFileSource(filePath: string): FileByteSource {

  const fd = fs.openSync(filePath, "r");
  let size: number;

  try {

    size = fs.fstatSync(fd).size;
  } catch(error) {

    fs.closeSync(fd);

    throw error;
  }

  let closed = false;

  return {

    close: (): void => {

      if(!closed) {

        closed = true;
        fs.closeSync(fd);
      }
    },

    length: size,

    read: (offset: number, length: number): Buffer => {

      if((offset < 0) || (length <= 0) || (offset >= size)) {

        return Buffer.alloc(0);
      }

      const wanted = Math.min(length, size - offset);
      const buffer = Buffer.alloc(wanted);
      const bytesRead = fs.readSync(fd, buffer, 0, wanted, offset);

      return (bytesRead === wanted) ? buffer : buffer.subarray(0, bytesRead);
    }
  };
}

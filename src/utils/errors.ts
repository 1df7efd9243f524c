/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error formatting and inspection utilities for dashgeo.
 */

/* Problems inside a container (bad boxes, corrupt records) are reported as values by the parser. Exceptions are reserved for file-level failures such as an
 * unreadable video or an FFmpeg crash, and these helpers turn whatever was thrown into something a log line or a batch summary can show.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error values. Trailing punctuation is stripped so
 * callers can add their own.
 * @param error - The error to format.
 * @returns A message without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if((typeof error === "object") && (error !== null) && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  return message.replace(/[.!?]+$/, "");
}

/**
 * Returns the system error code of a Node.js filesystem or process error (e.g., "ENOENT", "EXDEV").
 * @param error - The error to inspect.
 * @returns The code, or undefined if the value carries none.
 */
export function getErrorCode(error: unknown): string | undefined {

  if((typeof error === "object") && (error !== null) && ("code" in error) && (typeof error.code === "string")) {

    return error.code;
  }

  return undefined;
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileContext.ts: AsyncLocalStorage-based per-file context for log correlation.
 */
import { AsyncLocalStorage } from "async_hooks";

/* While a video is processed, every log line should say which video it is about, including lines written deep inside the parser and the FFmpeg wrapper. Rather than
 * threading a file name through every call, the batch runner establishes a context per file and the logger reads it back.
 */

/**
 * Context for the file currently being processed.
 */
export interface FileContext {

  // Short label used as the log prefix, normally the file's base name.
  label: string;

  // Full path of the video.
  path: string;
}

const fileContextStorage = new AsyncLocalStorage<FileContext>();

/**
 * Runs a function within a file context. Everything the function awaits inherits the context.
 * @param context - The file context.
 * @param fn - The async function to run.
 * @returns The result of the function.
 */
export async function runWithFileContext<T>(context: FileContext, fn: () => Promise<T>): Promise<T> {

  return fileContextStorage.run(context, fn);
}

/**
 * Returns the label of the file being processed in the current async context.
 * @returns The label, or undefined outside a file context.
 */
export function getFileLabel(): string | undefined {

  return fileContextStorage.getStore()?.label;
}

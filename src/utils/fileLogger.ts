/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: Optional log file with size-based trimming for dashgeo.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* A run over a directory of videos can log thousands of lines, so entries are collected in memory and appended in batches. The file is trimmed when a run starts:
 * if it has grown past the configured maximum, only the most recent half is kept, cut at a line boundary. Timestamps use the same format console-stamp applies to
 * console output, yyyy/mm/dd HH:MM:ss.l.
 */

// Number of buffered entries that triggers an append.
const FLUSH_THRESHOLD = 50;

interface FileLoggerState {

  buffer: string[];
  filePath: Nullable<string>;
}

const state: FileLoggerState = { buffer: [], filePath: null };

/**
 * Keeps the most recent half of a log file when it exceeds the maximum size.
 * @param filePath - The log file.
 * @param maxSize - Maximum size in bytes.
 */
async function trimIfOversized(filePath: string, maxSize: number): Promise<void> {

  const stats = await fsPromises.stat(filePath);

  if(stats.size <= maxSize) {

    return;
  }

  const content = await fsPromises.readFile(filePath, "utf-8");
  const cut = content.indexOf("\n", content.length - Math.floor(maxSize / 2));
  const kept = (cut === -1) ? "" : content.slice(cut + 1);
  const tempPath = filePath + ".tmp";

  await fsPromises.writeFile(tempPath, kept, "utf-8");
  await fsPromises.rename(tempPath, filePath);
}

/**
 * Opens the log file, creating it and its directory if needed. A file logger that cannot be initialized is left disabled and the reason is reported on the console.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });
    await fsPromises.appendFile(logPath, "", "utf-8");
    await trimIfOversized(logPath, maxSize);

    state.filePath = logPath;
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize log file %s: %s. File logging disabled.", logPath, (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Returns whether log entries are currently written to a file.
 * @returns True once initializeFileLogger() succeeded and until shutdownFileLogger().
 */
export function isFileLogging(): boolean {

  return state.filePath !== null;
}

/**
 * Queues a log entry for the log file. Does nothing while file logging is disabled.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted message.
 * @param categoryTag - Debug category, shown as [DEBUG:category].
 */
export function writeLogEntry(level: string, message: string, categoryTag?: string): void {

  if(!state.filePath) {

    return;
  }

  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");

  state.buffer.push([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", levelPrefix, message, "\n" ].join(""));

  if(state.buffer.length >= FLUSH_THRESHOLD) {

    flushLogBufferSync();
  }
}

/**
 * Appends all queued entries to the log file. Synchronous so it can run from a process "exit" handler.
 */
export function flushLogBufferSync(): void {

  if(!state.filePath || (state.buffer.length === 0)) {

    return;
  }

  const content = state.buffer.join("");

  state.buffer = [];

  try {

    fs.appendFileSync(state.filePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file %s: %s.", state.filePath, (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Flushes remaining entries and disables file logging.
 */
export function shutdownFileLogger(): void {

  flushLogBufferSync();

  state.filePath = null;
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for dashgeo.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import { format } from "util";
import { getFileLabel } from "./fileContext.js";
import { writeLogEntry } from "./fileLogger.js";

/* Terminal color codes. Warnings are yellow, errors red and debug output cyan, so problems stand out in a long batch run.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

type LogLevel = "debug" | "error" | "info" | "warn";

/* Every entry goes to the log file when one is configured (see fileLogger.ts). Console output is off until the command-line entry point turns it on, so the parser can
 * be used as a library without printing anything.
 */

let useConsoleLogging = false;

/**
 * Enables or disables console output.
 * @param enabled - True to print log entries to stdout/stderr.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Enables or disables debug output for every category. DASHGEO_DEBUG gives finer control.
 * @param enabled - True to enable all debug categories.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/**
 * Formats and routes one entry. Messages logged while a file is being processed are prefixed with that file's label.
 * @param level - The log level.
 * @param color - ANSI color for console output, or an empty string.
 * @param message - The format string.
 * @param args - Format arguments.
 * @param categoryTag - Debug category for debug entries.
 */
function logWithLevel(level: LogLevel, color: string, message: string, args: unknown[], categoryTag?: string): void {

  const label = getFileLabel();
  const formatted = args.length > 0 ? format(message, ...args) : message;
  const logMessage = label ? [ "[", label, "] ", formatted ].join("") : formatted;

  writeLogEntry(level, logMessage, categoryTag);

  if(!useConsoleLogging) {

    return;
  }

  /* eslint-disable no-console */
  const consoleMethod = (level === "error") ? console.error : ((level === "warn") ? console.warn : console.log);
  /* eslint-enable no-console */

  if(color) {

    consoleMethod("%s%s%s", color, logMessage, ANSI_COLORS.reset);
  } else {

    consoleMethod(logMessage);
  }
}

export const LOG = {

  /**
   * Logs a debug message in cyan when its category is enabled through DASHGEO_DEBUG or --debug.
   * @param category - The debug category (e.g., "parser:records").
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, category);
  },

  /**
   * Logs an error message in red. Use this for failures that stop a file from being processed.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message in the default terminal color.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Use this for skipped files and data that had to be discarded.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  }
};

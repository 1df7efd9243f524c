/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Batch run orchestration for dashgeo.
 */
import { CONFIG, displayConfiguration, getLogFilePath, initializeConfiguration, validateConfiguration } from "./config/index.js";
import { LOG, formatCount, formatError, getPackageVersion, resolveFFmpegPath, setConsoleLogging } from "./utils/index.js";
import { createDefaultCollaborators, processBatch, summarizeBatch } from "./pipeline/process.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { ConfigOverrides } from "./config/index.js";
import consoleStamp from "console-stamp";

/*
 * LOGGING MODE
 *
 * The command line always logs to the console, with timestamps added via console-stamp. When a log file is configured (--log-file or DASHGEO_LOG_FILE), every entry is
 * also written there, which is useful for long unattended runs over a card's worth of footage.
 */

/**
 * Options for a batch run.
 */
export interface RunOptions {

  readonly overrides: ConfigOverrides;
  readonly videos: readonly string[];
}

/**
 * Runs the whole command: configuration, FFmpeg lookup and the batch itself.
 * @param options - Command-line overrides and the videos to process.
 * @returns The process exit code: 0 when no video failed, 1 otherwise.
 */
export async function runBatch(options: RunOptions): Promise<number> {

  setConsoleLogging(true);
  consoleStamp(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });

  // Initialize configuration from file, environment variables and flags, then validate.
  try {

    await initializeConfiguration(options.overrides);
    validateConfiguration();
  } catch(error) {

    LOG.error(formatError(error));

    return 1;
  }

  const logFile = getLogFilePath(CONFIG);

  if(logFile) {

    await initializeFileLogger(logFile, CONFIG.logging.maxSize);
  }

  try {

    LOG.info("dashgeo v%s.", getPackageVersion());
    displayConfiguration();

    const ffmpegPath = await resolveFFmpegPath(CONFIG.ffmpeg.path);

    if(!ffmpegPath) {

      LOG.error("FFmpeg is not available. Install FFmpeg, or point FFMPEG_BIN or --ffmpeg at the executable.");

      return 1;
    }

    LOG.info("Using FFmpeg at: %s", ffmpegPath);

    const started = Date.now();
    const results = await processBatch(options.videos, CONFIG, createDefaultCollaborators(ffmpegPath));
    const summary = summarizeBatch(results);

    LOG.info("Done: %s tagged, %s skipped, %s failed, %s written in %ss.", formatCount(summary.tagged, "video"), String(summary.skipped), String(summary.failed),
      formatCount(summary.frames, "frame"), ((Date.now() - started) / 1000).toFixed(1));

    return (summary.failed > 0) ? 1 : 0;
  } finally {

    shutdownFileLogger();
  }
}

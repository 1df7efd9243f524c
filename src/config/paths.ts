/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for dashgeo.
 */
import type { Config, Nullable } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* This module is the single source of truth for the filesystem paths dashgeo uses on its own behalf. The data directory is resolved once at startup, before config.json
 * is loaded, because the data directory determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. Explicit argument (tests and embedding callers)
 *   2. Environment variable (DASHGEO_DATA_DIR)
 *   3. Default (~/.dashgeo)
 */

// The resolved data directory, initialized once at startup.
let resolvedDataDir: string | undefined;

/**
 * Initializes the data directory. May be called again to change it.
 * @param dataDir - Optional data directory that takes priority over the environment.
 * @throws If DASHGEO_DATA_DIR is set to a relative path.
 */
export function initializeDataDir(dataDir?: string): void {

  const envDataDir = process.env.DASHGEO_DATA_DIR;

  if(dataDir) {

    resolvedDataDir = path.resolve(dataDir);
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      throw new Error("DASHGEO_DATA_DIR must be an absolute path, got: " + envDataDir);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".dashgeo");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to the user configuration file.
 * @returns The absolute path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the absolute log file path, or null when no log file is configured. Relative paths are resolved against the working directory.
 * @param config - The application configuration.
 * @returns The log file path or null.
 */
export function getLogFilePath(config: Config): Nullable<string> {

  return config.paths.logFile ? path.resolve(config.paths.logFile) : null;
}

/**
 * Returns the absolute directory tagged frames are written to.
 * @param config - The application configuration.
 * @returns The output directory.
 */
export function getOutputDir(config: Config): string {

  return path.resolve(config.processing.outputDir);
}

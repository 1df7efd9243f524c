/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for dashgeo.
 */
import type { Config, Nullable } from "../types/index.js";
import { type ConfigOverrides, DEFAULTS, loadUserConfig, mergeConfiguration } from "./userConfig.js";
import { LOG, formatCount } from "../utils/index.js";
import { getConfigFilePath } from "./paths.js";
import { isValidTimeZone } from "../parser/gpsRecordDecoder.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters. Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. Command-line flags
 * 2. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 3. User config file (~/.dashgeo/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - processing: Time zone, frames per GPS sample, output directory and GPX export
 * - filters: File and frame filter stages
 * - ffmpeg: The frame extractor executable
 * - logging, paths: Log file location and size
 *
 * Configuration is initialized at startup via initializeConfiguration() and then checked with validateConfiguration(), which lists every invalid value at once.
 */

// The CONFIG object is initialized during startup. It starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = structuredClone(DEFAULTS);

/**
 * Initializes the configuration by loading the user config file, merging with defaults, and applying environment variable and command-line overrides. This must be
 * called after initializeDataDir() and before any code reads CONFIG.
 * @param overrides - Settings from the command line.
 * @returns The merged configuration.
 */
export async function initializeConfiguration(overrides: ConfigOverrides = {}): Promise<Config> {

  const result = await loadUserConfig(getConfigFilePath());

  CONFIG = mergeConfiguration(result.config, process.env, overrides);

  return CONFIG;
}

/*
 * CONFIGURATION VALIDATION
 *
 * We validate every value before touching any video, and collect all errors before throwing so a misconfigured run reports everything that is wrong in one go.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  return validateRange(name, value, min, max);
}

/**
 * Validates that a configuration value is a finite number within an optional range. Zero and negative values are allowed.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validateNumber(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isFinite(value)) {

    return [ name, " must be a number, got: ", String(value) ].join("");
  }

  return validateRange(name, value, min, max);
}

/**
 * Checks the optional bounds shared by the numeric validators.
 */
function validateRange(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates all configuration values and throws an error if any are invalid.
 * @param config - The configuration to check. Defaults to CONFIG.
 * @throws If any configuration value is invalid. The error message lists all invalid values.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];

  if(!isValidTimeZone(config.processing.timeZone)) {

    errors.push("DASHGEO_TZ must be an IANA time zone, got: " + config.processing.timeZone);
  }

  if(config.processing.outputDir.length === 0) {

    errors.push("DASHGEO_OUTPUT must not be empty.");
  }

  const checks = [

    validatePositiveInt("DASHGEO_FPS", config.processing.samplesPerTick, 1, 60),
    validateNumber("DASHGEO_MIN_SPEED", config.filters.minimumSpeed, 0, 100),
    validateNumber("DASHGEO_MOVEMENT_THRESHOLD", config.filters.movementThreshold, 0, 100),
    validateNumber("DASHGEO_TWILIGHT_ANGLE", config.filters.twilightAngle, -18, 0),

    // Minimum size (10KB) keeps meaningful log content. Maximum (100MB) bounds disk usage.
    validatePositiveInt("LOG_MAX_SIZE", config.logging.maxSize, 10240, 104857600)
  ];

  for(const error of checks) {

    if(error) {

      errors.push(error);
    }
  }

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Logs the active configuration at startup so the operator can confirm the time zone and filters before a long batch run.
 */
export function displayConfiguration(): void {

  const filters = CONFIG.filters;

  LOG.info("Processing with configuration:");
  LOG.info("  Camera time zone: %s", CONFIG.processing.timeZone);
  LOG.info("  Frames per GPS sample: %s", CONFIG.processing.samplesPerTick);
  LOG.info("  Output directory: %s", CONFIG.processing.outputDir);
  LOG.info("  GPX export: %s", CONFIG.processing.writeGpx ? "enabled" : "disabled");
  LOG.info("  Daylight filter: %s", filters.daylight ? "enabled (sun above " + String(filters.twilightAngle) + " degrees)" : "disabled");
  LOG.info("  Movement filter: %s", filters.movement ? "enabled (above " + String(filters.movementThreshold) + " m/s)" : "disabled");
  LOG.info("  Minimum speed: %s", (filters.minimumSpeed > 0) ? String(filters.minimumSpeed) + " m/s" : "disabled");
  LOG.info("  Exclusion zones: %s", formatCount(filters.exclusionZones.length, "zone"));
  LOG.info("  FFmpeg executable: %s", CONFIG.ffmpeg.path ?? "ffmpeg from PATH");
}

export * from "./paths.js";
export * from "./userConfig.js";

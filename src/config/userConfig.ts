/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for dashgeo.
 */
import type { Config, ExclusionZone, Nullable } from "../types/index.js";
import { LOG } from "../utils/index.js";
import fs from "node:fs";
import { getConfigFilePath } from "./paths.js";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * dashgeo reads optional user configuration from ~/.dashgeo/config.json (see paths.ts for how the directory is chosen). The configuration system uses a layered
 * approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (config.json)
 * 3. Environment variables
 * 4. Command-line flags (highest priority)
 *
 * This lets a machine that always processes footage from the same camera keep its time zone and filters in config.json, while one-off runs adjust them on the
 * command line.
 */

/*
 * SETTING METADATA
 *
 * Each scalar setting has metadata describing its type, valid range, environment variable name and a description. The metadata drives environment parsing, type
 * checks on config.json values and the --list-env output. Default values live in DEFAULTS; use getNestedValue(DEFAULTS, setting.path) to look one up.
 */

/**
 * Metadata describing a single configuration setting.
 */
export interface SettingMetadata {

  // Human-readable description shown by --list-env.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: Nullable<string>;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // Whether the setting accepts null. An empty string in the environment or config file clears it.
  nullable?: boolean;

  // Dot-separated path to the setting (e.g., "processing.timeZone").
  path: string;

  // Data type for parsing and validation.
  type: "boolean" | "float" | "integer" | "path" | "string";

  // Unit of measurement shown by --list-env.
  unit?: string;
}

/**
 * Metadata for all scalar settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  ffmpeg: [
    {

      description: "Path to the FFmpeg executable. Leave empty to use ffmpeg from the system PATH.",
      envVar: "FFMPEG_BIN",
      nullable: true,
      path: "ffmpeg.path",
      type: "path"
    }
  ],

  filters: [
    {

      description: "Skip videos whose last GPS fix was taken after dark.",
      envVar: "DASHGEO_DAYLIGHT",
      path: "filters.daylight",
      type: "boolean"
    },
    {

      description: "Drop frames slower than this speed. Zero keeps every frame.",
      envVar: "DASHGEO_MIN_SPEED",
      max: 100,
      min: 0,
      path: "filters.minimumSpeed",
      type: "float",
      unit: "m/s"
    },
    {

      description: "Skip videos in which the vehicle never moves.",
      envVar: "DASHGEO_MOVEMENT",
      path: "filters.movement",
      type: "boolean"
    },
    {

      description: "A video counts as moving when any GPS sample is faster than this.",
      envVar: "DASHGEO_MOVEMENT_THRESHOLD",
      max: 100,
      min: 0,
      path: "filters.movementThreshold",
      type: "float",
      unit: "m/s"
    },
    {

      description: "Sun altitude below which the daylight filter considers it dark.",
      envVar: "DASHGEO_TWILIGHT_ANGLE",
      max: 0,
      min: -18,
      path: "filters.twilightAngle",
      type: "float",
      unit: "degrees"
    }
  ],

  logging: [
    {

      description: "Maximum log file size. When exceeded, the file is trimmed to half this size keeping the most recent entries.",
      envVar: "LOG_MAX_SIZE",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  paths: [
    {

      description: "Log file path. Leave empty to log to the console only.",
      envVar: "DASHGEO_LOG_FILE",
      nullable: true,
      path: "paths.logFile",
      type: "path"
    }
  ],

  processing: [
    {

      description: "Directory that receives the tagged frames and GPX tracks.",
      envVar: "DASHGEO_OUTPUT",
      path: "processing.outputDir",
      type: "path"
    },
    {

      description: "Interpolated positions, and extracted frames, per GPS sample.",
      envVar: "DASHGEO_FPS",
      max: 60,
      min: 1,
      path: "processing.samplesPerTick",
      type: "integer"
    },
    {

      description: "IANA time zone the camera clock was set to (e.g., America/Chicago).",
      envVar: "DASHGEO_TZ",
      path: "processing.timeZone",
      type: "string"
    },
    {

      description: "Write a GPX track for every video beside its frames.",
      envVar: "DASHGEO_GPX",
      path: "processing.writeGpx",
      type: "boolean"
    }
  ]
};

/**
 * A scalar setting value.
 */
export type SettingValue = Nullable<boolean | number | string>;

/**
 * The contents of config.json. Only plain objects are accepted at the top level; everything below is checked against CONFIG_METADATA when merging.
 */
export type UserConfig = Record<string, unknown>;

/**
 * Settings supplied on the command line. They take priority over every other source.
 */
export interface ConfigOverrides {

  // Zones added to the ones from config.json.
  exclusionZones?: ExclusionZone[];

  // Setting path to value (e.g., "processing.timeZone" -> "Europe/Berlin").
  settings?: Record<string, SettingValue>;
}

/**
 * Result of loading the user configuration file.
 */
export interface UserConfigLoadResult {

  // The parsed configuration, or an empty object if the file doesn't exist or couldn't be parsed.
  config: UserConfig;

  // True if the file exists but contains invalid JSON.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/**
 * Narrows a value to a plain object.
 * @param value - The value to check.
 * @returns True for non-null, non-array objects.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {

  return (typeof value === "object") && (value !== null) && !Array.isArray(value);
}

/*
 * CONFIG FILE OPERATIONS
 */

/**
 * Loads user configuration from the config file. Returns an empty config if the file doesn't exist, and sets parseError if the file exists but does not contain a
 * JSON object.
 * @param filePath - The file to read. Defaults to config.json in the data directory.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(filePath: string = getConfigFilePath()): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    // A missing file is normal. We use the defaults.
    if(isRecord(error) && (error.code === "ENOENT")) {

      return { config: {}, parseError: false };
    }

    LOG.warn("Failed to read configuration file %s: %s. Using defaults.", filePath, (error instanceof Error) ? error.message : String(error));

    return { config: {}, parseError: false };
  }

  let message: string;

  try {

    const parsed: unknown = JSON.parse(content);

    if(isRecord(parsed)) {

      return { config: parsed, parseError: false };
    }

    message = "the top level must be a JSON object";
  } catch(parseError) {

    message = (parseError instanceof Error) ? parseError.message : String(parseError);
  }

  LOG.warn("Invalid configuration file %s: %s. Using defaults.", filePath, message);

  return { config: {}, parseError: true, parseErrorMessage: message };
}

/*
 * CONFIGURATION MERGING
 *
 * These functions merge defaults, user config, environment overrides and command-line flags into the final CONFIG object.
 */

/**
 * Hard-coded default configuration values. These are the baseline values used when no other source provides a value.
 */
export const DEFAULTS: Config = {

  ffmpeg: {

    path: null
  },

  filters: {

    daylight: true,
    exclusionZones: [],
    minimumSpeed: 4,
    movement: true,
    movementThreshold: 0.5,
    twilightAngle: -2
  },

  logging: {

    maxSize: 1048576
  },

  paths: {

    logFile: null
  },

  processing: {

    outputDir: ".",
    samplesPerTick: 1,
    timeZone: "America/Chicago",
    writeGpx: false
  }
};

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param setting - The setting being parsed.
 * @returns The parsed value, or undefined if parsing fails.
 */
export function parseEnvValue(value: string, setting: SettingMetadata): SettingValue | undefined {

  switch(setting.type) {

    case "boolean": {

      const lower = value.trim().toLowerCase();

      if([ "1", "true", "yes" ].includes(lower)) {

        return true;
      }

      if([ "0", "false", "no" ].includes(lower)) {

        return false;
      }

      return undefined;
    }

    case "float": {

      const num = Number(value);

      return ((value.trim().length === 0) || Number.isNaN(num)) ? undefined : num;
    }

    case "integer": {

      const num = parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    default: {

      return ((value.length === 0) && setting.nullable) ? null : value;
    }
  }
}

/**
 * Checks that a value read from config.json has the setting's type.
 * @param value - The value from the file.
 * @param setting - The setting it is meant for.
 * @returns The value if it fits, or undefined.
 */
function checkFileValue(value: unknown, setting: SettingMetadata): SettingValue | undefined {

  if(((value === null) || (value === "")) && setting.nullable) {

    return null;
  }

  switch(setting.type) {

    case "boolean": {

      return (typeof value === "boolean") ? value : undefined;
    }

    case "float":
    case "integer": {

      return ((typeof value === "number") && Number.isFinite(value)) ? value : undefined;
    }

    default: {

      return (typeof value === "string") ? value : undefined;
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "filters.minimumSpeed").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  let current: unknown = obj;

  for(const part of settingPath.split(".")) {

    if(!isRecord(current)) {

      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "filters.minimumSpeed").
 * @param value - The value to set.
 */
export function setNestedValue(obj: object, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  const leaf = parts.pop();
  let current: object = obj;

  if(leaf === undefined) {

    return;
  }

  for(const part of parts) {

    const next: unknown = Reflect.get(current, part);

    if((typeof next === "object") && (next !== null)) {

      current = next;

      continue;
    }

    const created = {};

    Reflect.set(current, part, created);
    current = created;
  }

  Reflect.set(current, leaf, value);
}

/**
 * Parses an exclusion zone written as "latitude,longitude,radius".
 * @param text - The zone description.
 * @returns The zone, or null if the text is malformed or out of range.
 */
export function parseExclusionZone(text: string): Nullable<ExclusionZone> {

  const parts = text.split(",").map((part) => part.trim());

  if((parts.length !== 3) || parts.some((part) => part.length === 0)) {

    return null;
  }

  const [ latitude, longitude, radius ] = parts.map(Number);

  return checkExclusionZone({ latitude, longitude, radius });
}

/**
 * Checks an exclusion zone read from config.json.
 * @param value - The candidate zone.
 * @returns The zone, or null if it is not an object with finite, in-range latitude, longitude and radius.
 */
export function checkExclusionZone(value: unknown): Nullable<ExclusionZone> {

  if(!isRecord(value)) {

    return null;
  }

  const { latitude, longitude, radius } = value;

  if((typeof latitude !== "number") || (typeof longitude !== "number") || (typeof radius !== "number")) {

    return null;
  }

  if(!Number.isFinite(latitude) || (Math.abs(latitude) > 90) || !Number.isFinite(longitude) || (Math.abs(longitude) > 180) || !Number.isFinite(radius) ||
    (radius < 0)) {

    return null;
  }

  return { latitude, longitude, radius };
}

/**
 * Returns every scalar setting in CONFIG_METADATA.
 * @returns The settings, category by category.
 */
export function getAllSettings(): SettingMetadata[] {

  return Object.values(CONFIG_METADATA).flat();
}

/**
 * Merges user configuration with defaults, environment overrides and command-line flags to produce the final configuration. Priority: flags > env vars > user config >
 * defaults. Values of the wrong type are ignored with a warning. Range checks are left to validateConfiguration().
 * @param userConfig - User configuration from the config file.
 * @param env - The environment to read overrides from.
 * @param overrides - Settings from the command line.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig, env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): Config {

  const config = structuredClone(DEFAULTS);

  // Apply user config values.
  for(const setting of getAllSettings()) {

    const userValue = getNestedValue(userConfig, setting.path);

    if(userValue === undefined) {

      continue;
    }

    const checked = checkFileValue(userValue, setting);

    if(checked === undefined) {

      LOG.warn("Ignoring %s in the configuration file: expected a %s value.", setting.path, setting.type);

      continue;
    }

    setNestedValue(config, setting.path, checked);
  }

  // Exclusion zones are an array, so they don't fit the scalar setting model and are checked here.
  const userZones = getNestedValue(userConfig, "filters.exclusionZones");

  if(Array.isArray(userZones)) {

    for(const candidate of userZones) {

      const zone = checkExclusionZone(candidate);

      if(!zone) {

        LOG.warn("Ignoring invalid exclusion zone in the configuration file: %j.", candidate);

        continue;
      }

      config.filters.exclusionZones.push(zone);
    }
  } else if(userZones !== undefined) {

    LOG.warn("Ignoring filters.exclusionZones in the configuration file: expected an array.");
  }

  // Apply environment variable overrides.
  for(const setting of getAllSettings()) {

    const envValue = setting.envVar ? env[setting.envVar] : undefined;

    if(envValue === undefined) {

      continue;
    }

    const parsedValue = parseEnvValue(envValue, setting);

    if(parsedValue === undefined) {

      LOG.warn("Ignoring %s=%s: expected a %s value.", setting.envVar, envValue, setting.type);

      continue;
    }

    setNestedValue(config, setting.path, parsedValue);
  }

  // Apply command-line flags (highest priority).
  for(const [ settingPath, value ] of Object.entries(overrides.settings ?? {})) {

    setNestedValue(config, settingPath, value);
  }

  config.filters.exclusionZones.push(...(overrides.exclusionZones ?? []));

  return config;
}

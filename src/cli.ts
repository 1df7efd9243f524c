/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * cli.ts: Command-line argument parsing and help output for dashgeo.
 */
import { CONFIG_METADATA, type ConfigOverrides, DEFAULTS, type SettingValue, getNestedValue, parseExclusionZone } from "./config/index.js";
import { DEBUG_CATEGORIES } from "./utils/index.js";
import type { ExclusionZone, Nullable } from "./types/index.js";

/* Command-line flags have the highest priority in the configuration merge order. They are collected into ConfigOverrides rather than written to CONFIG directly, so
 * initializeConfiguration() can apply them after config.json and the environment.
 */

/**
 * Result of parsing command-line arguments.
 */
export type ParsedArgs =
  { readonly dataDir?: string; readonly debugLogging: boolean; readonly kind: "run"; readonly overrides: ConfigOverrides; readonly videos: string[] } |
  { readonly kind: "error"; readonly message: string } |
  { readonly kind: "help" } |
  { readonly kind: "listEnv" } |
  { readonly kind: "version" };

// Flags that take a value, mapped to the setting they override.
const SETTING_FLAGS: Record<string, { path: string; type: "float" | "integer" | "string" }> = {

  "--ffmpeg": { path: "ffmpeg.path", type: "string" },
  "--fps": { path: "processing.samplesPerTick", type: "integer" },
  "--log-file": { path: "paths.logFile", type: "string" },
  "--min-speed": { path: "filters.minimumSpeed", type: "float" },
  "--output": { path: "processing.outputDir", type: "string" },
  "--tz": { path: "processing.timeZone", type: "string" },
  "-f": { path: "processing.samplesPerTick", type: "integer" },
  "-o": { path: "processing.outputDir", type: "string" },
  "-t": { path: "processing.timeZone", type: "string" }
};

// Switches that set a boolean setting.
const SWITCH_FLAGS: Record<string, { path: string; value: boolean }> = {

  "--gpx": { path: "processing.writeGpx", value: true },
  "--no-daylight": { path: "filters.daylight", value: false },
  "--no-movement": { path: "filters.movement", value: false }
};

/**
 * Parses a flag value as a number of the given kind.
 * @param raw - The raw value.
 * @param type - The expected kind.
 * @returns The number, or null if the value is not one.
 */
function parseNumber(raw: string, type: "float" | "integer"): Nullable<number> {

  const trimmed = raw.trim();

  if((trimmed.length === 0) || ((type === "integer") && !/^-?\d+$/.test(trimmed))) {

    return null;
  }

  const value = Number(trimmed);

  return Number.isFinite(value) ? value : null;
}

/**
 * Parses command-line arguments. Nothing is printed and the process is never exited here; the entry point acts on the result.
 * @param args - The arguments after the script name.
 * @returns What to do.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {

  const settings: Record<string, SettingValue> = {};
  const exclusionZones: ExclusionZone[] = [];
  const videos: string[] = [];
  let dataDir: string | undefined;
  let debugLogging = false;

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    // Everything after "--" is a video, even if it starts with a dash.
    if(arg === "--") {

      videos.push(...args.slice(i + 1));

      break;
    }

    switch(arg) {

      case "-h":
      case "--help": {

        return { kind: "help" };
      }

      case "-v":
      case "--version": {

        return { kind: "version" };
      }

      case "--list-env": {

        return { kind: "listEnv" };
      }

      case "-d":
      case "--debug": {

        debugLogging = true;

        continue;
      }

      default: {

        break;
      }
    }

    const switchFlag = SWITCH_FLAGS[arg];

    if(switchFlag) {

      settings[switchFlag.path] = switchFlag.value;

      continue;
    }

    const takesValue = (arg in SETTING_FLAGS) || [ "-i", "--ignore-point", "--data-dir" ].includes(arg);

    if(!takesValue) {

      if(arg.startsWith("-") && (arg.length > 1)) {

        return { kind: "error", message: "Unknown option: " + arg };
      }

      videos.push(arg);

      continue;
    }

    const value = (i + 1 < args.length) ? args[++i] : undefined;

    if(value === undefined) {

      return { kind: "error", message: arg + " requires a value." };
    }

    if((arg === "-i") || (arg === "--ignore-point")) {

      const zone = parseExclusionZone(value);

      if(!zone) {

        return { kind: "error", message: arg + " expects latitude,longitude,radius, got: " + value };
      }

      exclusionZones.push(zone);

      continue;
    }

    if(arg === "--data-dir") {

      dataDir = value;

      continue;
    }

    const flag = SETTING_FLAGS[arg];

    if(flag.type === "string") {

      settings[flag.path] = value;

      continue;
    }

    const num = parseNumber(value, flag.type);

    if(num === null) {

      return { kind: "error", message: [ arg, " expects ", (flag.type === "integer") ? "an integer" : "a number", ", got: ", value ].join("") };
    }

    settings[flag.path] = num;
  }

  if(videos.length === 0) {

    return { kind: "error", message: "No video files given." };
  }

  return { dataDir, debugLogging, kind: "run", overrides: { exclusionZones, settings }, videos };
}

/**
 * Returns the usage text.
 * @returns The lines to print.
 */
export function usageText(): string[] {

  return [

    "Usage: dashgeo [options] <video...>",
    "",
    "Extracts geotagged frames from Novatek dash cam videos.",
    "",
    "Options:",
    "  -o, --output <dir>              Directory for tagged frames (default: " + DEFAULTS.processing.outputDir + ")",
    "  -t, --tz <zone>                 IANA time zone the camera clock was set to (default: " + DEFAULTS.processing.timeZone + ")",
    "  -f, --fps <n>                   Frames per GPS sample (default: " + String(DEFAULTS.processing.samplesPerTick) + ")",
    "  -i, --ignore-point <lat,lon,r>  Do not write frames within r meters of a point (repeatable)",
    "  --min-speed <m/s>               Drop frames slower than this, 0 keeps all (default: " + String(DEFAULTS.filters.minimumSpeed) + ")",
    "  --no-daylight                   Keep videos that end after dark",
    "  --no-movement                   Keep videos without movement",
    "  --gpx                           Also write a GPX track per video",
    "  --ffmpeg <path>                 FFmpeg executable (default: ffmpeg from PATH)",
    "  --log-file <path>               Also write log output to a file",
    "  --data-dir <path>               Directory holding config.json (default: ~/.dashgeo)",
    "  -d, --debug                     Enable all debug output",
    "  -h, --help                      Show this help message",
    "  -v, --version                   Show version number",
    "  --list-env                      List all environment variables",
    "",
    "Debug categories for DASHGEO_DEBUG (e.g., 'parser', '*,-parser:atoms'):",
    ...DEBUG_CATEGORIES.map((entry) => "  " + entry.category.padEnd(32) + entry.description)
  ];
}

/**
 * Returns a listing of all environment variables, generated from CONFIG_METADATA.
 * @returns The lines to print.
 */
export function environmentText(): string[] {

  // Descriptions for null settings, whose default is resolved at run time.
  const dynamicDefaults: Record<string, string> = {

    "ffmpeg.path": "ffmpeg from PATH",
    "paths.logFile": "(console only)"
  };

  const lines = [ "dashgeo Environment Variables", "", "Priority: CLI flags > environment variables > config.json > defaults." ];

  for(const [ category, settings ] of Object.entries(CONFIG_METADATA)) {

    lines.push("", category.charAt(0).toUpperCase() + category.slice(1) + ":");

    for(const setting of settings) {

      if(!setting.envVar) {

        continue;
      }

      const defaultValue = getNestedValue(DEFAULTS, setting.path);
      let defaultStr = dynamicDefaults[setting.path] ?? String(defaultValue);

      if((typeof defaultValue === "number") && setting.unit) {

        defaultStr = [ defaultStr, " (", setting.unit, ")" ].join("");
      }

      lines.push("  " + setting.envVar, "    " + setting.description, "    Default: " + defaultStr);
    }
  }

  lines.push("", "Special:", "  DASHGEO_DATA_DIR", "    Directory holding config.json. Must be an absolute path.", "    Default: ~/.dashgeo", "", "  DASHGEO_DEBUG",
    "    Debug category filter (e.g., 'parser:records', '*,-parser:atoms').", "    Default: (disabled)");

  return lines;
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * config.test.ts: Tests for configuration loading, merging and validation.
 */
import { CONFIG, DEFAULTS, getConfigFilePath, getLogFilePath, getNestedValue, getOutputDir, initializeConfiguration, initializeDataDir, loadUserConfig,
  mergeConfiguration, parseEnvValue, parseExclusionZone, setNestedValue, validateConfiguration, validateNumber, validatePositiveInt } from "../src/config/index.js";
import type { Config } from "../src/types/index.js";
import type { SettingMetadata } from "../src/config/index.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const INTEGER_SETTING: SettingMetadata = { description: "test", envVar: "TEST_INT", path: "processing.samplesPerTick", type: "integer" };
const NULLABLE_PATH: SettingMetadata = { description: "test", envVar: "TEST_PATH", nullable: true, path: "ffmpeg.path", type: "path" };

function withConfig(change: (config: Config) => void): Config {

  const config = structuredClone(DEFAULTS);

  change(config);

  return config;
}

describe("mergeConfiguration", () => {

  it("returns the defaults when nothing is set", () => {

    expect(mergeConfiguration({}, {})).toEqual(DEFAULTS);
  });

  it("applies values from the configuration file", () => {

    const config = mergeConfiguration({ filters: { daylight: false }, processing: { samplesPerTick: 2, timeZone: "Europe/Berlin" } }, {});

    expect(config.filters.daylight).toBe(false);
    expect(config.processing.samplesPerTick).toBe(2);
    expect(config.processing.timeZone).toBe("Europe/Berlin");
  });

  it("ignores file values of the wrong type", () => {

    expect(mergeConfiguration({ processing: { samplesPerTick: "2" } }, {}).processing.samplesPerTick).toBe(1);
  });

  it("treats an empty nullable path as unset", () => {

    expect(mergeConfiguration({ ffmpeg: { path: "" } }, {}).ffmpeg.path).toBeNull();
    expect(mergeConfiguration({ ffmpeg: { path: "/opt/ffmpeg/bin/ffmpeg" } }, {}).ffmpeg.path).toBe("/opt/ffmpeg/bin/ffmpeg");
  });

  it("lets the environment override the file", () => {

    const config = mergeConfiguration({ processing: { timeZone: "Europe/Berlin" } }, { DASHGEO_DAYLIGHT: "no", DASHGEO_FPS: "3", DASHGEO_MIN_SPEED: "2.5",
      DASHGEO_TZ: "UTC", FFMPEG_BIN: "" });

    expect(config.processing.timeZone).toBe("UTC");
    expect(config.processing.samplesPerTick).toBe(3);
    expect(config.filters.minimumSpeed).toBe(2.5);
    expect(config.filters.daylight).toBe(false);
    expect(config.ffmpeg.path).toBeNull();
  });

  it("ignores environment values that do not parse", () => {

    expect(mergeConfiguration({}, { DASHGEO_DAYLIGHT: "maybe" }).filters.daylight).toBe(true);
  });

  it("lets command-line flags override the environment", () => {

    const config = mergeConfiguration({}, { DASHGEO_TZ: "UTC" }, { settings: { "processing.timeZone": "Asia/Tokyo", "processing.writeGpx": true } });

    expect(config.processing.timeZone).toBe("Asia/Tokyo");
    expect(config.processing.writeGpx).toBe(true);
  });

  it("keeps valid file zones and appends command-line zones", () => {

    const userConfig = { filters: { exclusionZones: [ { latitude: 1, longitude: 2, radius: 3 }, { latitude: 100, longitude: 0, radius: 1 }, "home" ] } };
    const config = mergeConfiguration(userConfig, {}, { exclusionZones: [{ latitude: 4, longitude: 5, radius: 6 }] });

    expect(config.filters.exclusionZones).toEqual([ { latitude: 1, longitude: 2, radius: 3 }, { latitude: 4, longitude: 5, radius: 6 } ]);
    expect(DEFAULTS.filters.exclusionZones).toEqual([]);
  });

  it("ignores zones that are not an array", () => {

    expect(mergeConfiguration({ filters: { exclusionZones: { latitude: 1 } } }, {}).filters.exclusionZones).toEqual([]);
  });
});

describe("parseEnvValue", () => {

  it("parses integers the way parseInt does", () => {

    expect(parseEnvValue("12", INTEGER_SETTING)).toBe(12);
    expect(parseEnvValue("12abc", INTEGER_SETTING)).toBe(12);
    expect(parseEnvValue("abc", INTEGER_SETTING)).toBeUndefined();
  });

  it("maps an empty nullable path to null", () => {

    expect(parseEnvValue("", NULLABLE_PATH)).toBeNull();
    expect(parseEnvValue("/usr/bin/ffmpeg", NULLABLE_PATH)).toBe("/usr/bin/ffmpeg");
  });
});

describe("parseExclusionZone", () => {

  it("parses latitude, longitude and radius", () => {

    expect(parseExclusionZone("41.88,-87.63,150")).toEqual({ latitude: 41.88, longitude: -87.63, radius: 150 });
    expect(parseExclusionZone(" 1 , 2 , 3 ")).toEqual({ latitude: 1, longitude: 2, radius: 3 });
  });

  it("rejects malformed or out-of-range zones", () => {

    expect(parseExclusionZone("1,2")).toBeNull();
    expect(parseExclusionZone("1,,3")).toBeNull();
    expect(parseExclusionZone("a,b,c")).toBeNull();
    expect(parseExclusionZone("91,0,1")).toBeNull();
    expect(parseExclusionZone("0,0,-1")).toBeNull();
  });
});

describe("nested values", () => {

  it("reads dotted paths", () => {

    expect(getNestedValue({ a: { b: 2 } }, "a.b")).toBe(2);
    expect(getNestedValue({ a: { b: 2 } }, "a.x.y")).toBeUndefined();
  });

  it("creates intermediate objects when writing", () => {

    const target = {};

    setNestedValue(target, "a.b.c", 1);

    expect(target).toEqual({ a: { b: { c: 1 } } });
  });
});

describe("validation", () => {

  it("accepts the defaults", () => {

    expect(() => validateConfiguration(structuredClone(DEFAULTS))).not.toThrow();
  });

  it("lists every invalid value at once", () => {

    const config = withConfig((draft) => {

      draft.processing.timeZone = "Mars/Olympus_Mons";
      draft.processing.samplesPerTick = 0;
      draft.filters.twilightAngle = 5;
    });

    expect(() => validateConfiguration(config)).toThrow([
      "Configuration validation failed:",
      "  DASHGEO_TZ must be an IANA time zone, got: Mars/Olympus_Mons",
      "  DASHGEO_FPS must be a positive integer, got: 0",
      "  DASHGEO_TWILIGHT_ANGLE must be at most 0, got: 5"
    ].join("\n"));
  });

  it("rejects an empty output directory", () => {

    expect(() => validateConfiguration(withConfig((draft) => {

      draft.processing.outputDir = "";
    }))).toThrow("DASHGEO_OUTPUT must not be empty.");
  });

  it("checks numbers and ranges", () => {

    expect(validatePositiveInt("X", 1.5)).toBe("X must be a positive integer, got: 1.5");
    expect(validatePositiveInt("X", 61, 1, 60)).toBe("X must be at most 60, got: 61");
    expect(validateNumber("X", Number.NaN)).toBe("X must be a number, got: NaN");
    expect(validateNumber("X", -1, 0)).toBe("X must be at least 0, got: -1");
    expect(validateNumber("X", 0, 0, 10)).toBeNull();
  });
});

describe("files and paths", () => {

  let dir: string;
  const savedDataDir = process.env.DASHGEO_DATA_DIR;

  beforeEach(() => {

    dir = fs.mkdtempSync(path.join(os.tmpdir(), "dashgeo-config-"));
  });

  afterEach(() => {

    if(savedDataDir === undefined) {

      delete process.env.DASHGEO_DATA_DIR;
    } else {

      process.env.DASHGEO_DATA_DIR = savedDataDir;
    }

    fs.rmSync(dir, { force: true, recursive: true });
  });

  it("treats a missing file as an empty configuration", async () => {

    await expect(loadUserConfig(path.join(dir, "config.json"))).resolves.toEqual({ config: {}, parseError: false });
  });

  it("reports a file that is not a JSON object", async () => {

    const file = path.join(dir, "config.json");

    fs.writeFileSync(file, "[]");

    await expect(loadUserConfig(file)).resolves.toEqual({ config: {}, parseError: true, parseErrorMessage: "the top level must be a JSON object" });

    fs.writeFileSync(file, "{ not json");

    await expect(loadUserConfig(file)).resolves.toMatchObject({ config: {}, parseError: true });
  });

  it("loads config.json from the data directory", async () => {

    initializeDataDir(dir);
    fs.writeFileSync(path.join(dir, "config.json"), JSON.stringify({ processing: { outputDir: "frames", timeZone: "UTC" } }));

    const config = await initializeConfiguration({ settings: { "processing.samplesPerTick": 3 } });

    expect(getConfigFilePath()).toBe(path.join(dir, "config.json"));
    expect(config).toBe(CONFIG);
    expect(CONFIG.processing).toMatchObject({ outputDir: "frames", samplesPerTick: 3, timeZone: "UTC" });
  });

  it("requires an absolute DASHGEO_DATA_DIR", () => {

    process.env.DASHGEO_DATA_DIR = "relative/dir";

    expect(() => initializeDataDir()).toThrow("DASHGEO_DATA_DIR must be an absolute path, got: relative/dir");

    process.env.DASHGEO_DATA_DIR = dir;
    initializeDataDir();

    expect(getConfigFilePath()).toBe(path.join(dir, "config.json"));
  });

  it("resolves the log file against the working directory", () => {

    expect(getLogFilePath(DEFAULTS)).toBeNull();
    expect(getLogFilePath(withConfig((draft) => {

      draft.paths.logFile = "logs/dashgeo.log";
    }))).toBe(path.resolve("logs/dashgeo.log"));
  });

  it("resolves the output directory against the working directory", () => {

    expect(getOutputDir(withConfig((draft) => {

      draft.processing.outputDir = "frames";
    }))).toBe(path.resolve("frames"));
  });
});

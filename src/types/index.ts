/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for dashgeo.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * TRACK TYPES
 *
 * A dash cam samples its GPS receiver once per tick (nominally one second) and stores each reading as a fixed-size record. We decode those records into GpsSample
 * values and keep them in file order. A tick without a usable reading stays in the track as an empty slot, because the slot's position is what aligns the track with
 * the frames extracted from the video.
 */

/**
 * One decoded GPS reading. Coordinates are signed decimal degrees, speed is in meters per second, and bearing is in degrees.
 */
export interface GpsSample {

  readonly bearing: number;
  readonly latitude: number;
  readonly longitude: number;
  readonly speed: number;

  // The reading's instant. The camera records wall-clock time, which we resolve against the configured time zone when decoding.
  readonly timestamp: Date;
}

/**
 * One sampling tick. Null means the receiver had no fix, or the record for this tick could not be decoded.
 */
export type TrackSlot = Nullable<GpsSample>;

/**
 * The ordered, gap-preserving sequence of slots for one file. Index n corresponds to roughly n seconds after the recording started.
 */
export interface Track {

  readonly slots: readonly TrackSlot[];

  // The IANA time zone the camera clock was set to.
  readonly timeZone: string;
}

/**
 * A synthetic point produced between two samples for one output frame. It has the same shape as a sample but is never stored in a track.
 */
export type InterpolatedPoint = GpsSample;

/*
 * CONFIGURATION TYPES
 *
 * The Config interface is the root configuration object, with nested interfaces for each functional area. Values come from defaults, the user config file,
 * environment variables and command-line flags, in increasing order of priority.
 */

/**
 * A circular area around a point in which no frames are written. Used to keep home and work locations out of published imagery.
 */
export interface ExclusionZone {

  latitude: number;
  longitude: number;

  // Radius in meters.
  radius: number;
}

/**
 * Filter stage configuration. See pipeline/filters.ts for the stages themselves.
 */
export interface FiltersConfig {

  // Skip files whose last fix was taken after dark. Environment variable: DASHGEO_DAYLIGHT.
  daylight: boolean;

  // Frames inside any of these zones are not written. Only settable through config.json or --ignore-point.
  exclusionZones: ExclusionZone[];

  // Drop frames slower than this many meters per second. Zero disables the stage. Environment variable: DASHGEO_MIN_SPEED.
  minimumSpeed: number;

  // Skip files where the vehicle never moves. Environment variable: DASHGEO_MOVEMENT.
  movement: boolean;

  // A file counts as moving when any sample is faster than this many meters per second. Environment variable: DASHGEO_MOVEMENT_THRESHOLD.
  movementThreshold: number;

  // Sun altitude, in degrees, below which we consider it dark. Environment variable: DASHGEO_TWILIGHT_ANGLE.
  twilightAngle: number;
}

/**
 * FFmpeg configuration for frame extraction.
 */
export interface FFmpegConfig {

  // Path to the FFmpeg executable. When null, we look for ffmpeg in the system PATH. Environment variable: FFMPEG_BIN.
  path: Nullable<string>;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // Maximum log file size in bytes before the file is trimmed to half. Environment variable: LOG_MAX_SIZE.
  maxSize: number;
}

/**
 * Filesystem locations.
 */
export interface PathsConfig {

  // Log file path. When null, log output goes to the console only. Environment variable: DASHGEO_LOG_FILE.
  logFile: Nullable<string>;
}

/**
 * Core processing settings.
 */
export interface ProcessingConfig {

  // Directory that receives the tagged frames and GPX files. Environment variable: DASHGEO_OUTPUT.
  outputDir: string;

  // Interpolated positions, and therefore extracted frames, per sampling tick. Environment variable: DASHGEO_FPS.
  samplesPerTick: number;

  // The IANA time zone the camera clock was set to. Environment variable: DASHGEO_TZ.
  timeZone: string;

  // Write a GPX track beside the frames. Environment variable: DASHGEO_GPX.
  writeGpx: boolean;
}

/**
 * The root configuration object.
 */
export interface Config {

  ffmpeg: FFmpegConfig;
  filters: FiltersConfig;
  logging: LoggingConfig;
  paths: PathsConfig;
  processing: ProcessingConfig;
}

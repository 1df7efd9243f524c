/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * filters.ts: File and frame filter stages for dashgeo.
 */
import type { ExclusionZone, FiltersConfig, GpsSample, InterpolatedPoint, Nullable, Track } from "../types/index.js";
import { LOG } from "../utils/index.js";
import { getPosition } from "suncalc";
import { haversineDistance } from "../geo/distance.js";

/*
 * FILTER STAGES
 *
 * Filtering happens at two levels, and each level is an ordered list of stages built from configuration:
 *
 * - File stages look at the whole track once and may skip the video. A skipped video is never handed to FFmpeg.
 * - Frame stages look at one interpolated point and may drop that frame. A dropped frame is not tagged or moved, and it vanishes with the temporary directory.
 *
 * A stage is a name plus a pure test, so every stage can be exercised on its own and the pipeline only needs to walk the list.
 */

/**
 * A stage that decides whether a video is worth processing.
 */
export interface FileFilterStage {

  readonly name: string;

  /**
   * Returns why the video should be skipped, or null to keep it.
   */
  test: (track: Track) => Nullable<string>;
}

/**
 * A stage that decides whether a single frame is written.
 */
export interface FrameFilterStage {

  readonly name: string;

  /**
   * Returns true to keep the frame.
   */
  test: (point: InterpolatedPoint) => boolean;
}

/**
 * A file-level rejection: the stage that rejected the video and its reason.
 */
export interface FileRejection {

  readonly reason: string;
  readonly stage: string;
}

const RADIANS_TO_DEGREES = 180 / Math.PI;

/**
 * Returns the samples of a track, skipping empty slots.
 * @param track - The track.
 * @returns The samples in slot order.
 */
export function trackSamples(track: Track): GpsSample[] {

  return track.slots.filter((slot): slot is GpsSample => slot !== null);
}

/**
 * Returns the sample with the latest timestamp. Ties go to the earlier slot.
 * @param track - The track.
 * @returns The latest sample, or null if the track has none.
 */
export function latestSample(track: Track): Nullable<GpsSample> {

  let latest: Nullable<GpsSample> = null;

  for(const sample of trackSamples(track)) {

    if(!latest || (sample.timestamp.getTime() > latest.timestamp.getTime())) {

      latest = sample;
    }
  }

  return latest;
}

/**
 * Returns the sun's altitude above the horizon at a sample's time and place.
 * @param sample - The sample.
 * @returns Altitude in degrees. Negative when the sun is below the horizon.
 */
export function sunAltitude(sample: GpsSample): number {

  return getPosition(sample.timestamp, sample.latitude, sample.longitude).altitude * RADIANS_TO_DEGREES;
}

/**
 * Skips videos that end after dark. Night footage is mostly black frames and headlights.
 * @param twilightAngle - Sun altitude in degrees at or below which it counts as dark.
 * @returns The stage.
 */
export function daylightStage(twilightAngle: number): FileFilterStage {

  return {

    name: "daylight",
    test: (track: Track): Nullable<string> => {

      const latest = latestSample(track);

      if(!latest) {

        return null;
      }

      const altitude = sunAltitude(latest);

      if(altitude > twilightAngle) {

        return null;
      }

      return [ "it ends when the sun is down (", altitude.toFixed(1), " degrees at ", latest.timestamp.toISOString(), ")" ].join("");
    }
  };
}

/**
 * Skips videos in which no sample moves faster than a threshold, such as footage from a parked car.
 * @param threshold - Speed in meters per second a sample must exceed.
 * @returns The stage.
 */
export function movementStage(threshold: number): FileFilterStage {

  return {

    name: "movement",
    test: (track: Track): Nullable<string> => {

      if(trackSamples(track).some((sample) => sample.speed > threshold)) {

        return null;
      }

      return [ "it does not include any movement above ", String(threshold), " m/s" ].join("");
    }
  };
}

/**
 * Drops frames captured below a speed. Slow frames are near-duplicates of their neighbors.
 * @param minimumSpeed - Speed in meters per second a frame must reach.
 * @returns The stage.
 */
export function minimumSpeedStage(minimumSpeed: number): FrameFilterStage {

  return {

    name: "minimumSpeed",
    test: (point: InterpolatedPoint): boolean => point.speed >= minimumSpeed
  };
}

/**
 * Drops frames captured inside any of the given zones.
 * @param zones - The zones.
 * @returns The stage.
 */
export function exclusionZoneStage(zones: readonly ExclusionZone[]): FrameFilterStage {

  return {

    name: "exclusionZones",
    test: (point: InterpolatedPoint): boolean => zones.every((zone) => haversineDistance(zone.latitude, zone.longitude, point.latitude, point.longitude) >= zone.radius)
  };
}

/**
 * Builds the file stages enabled by the configuration.
 * @param filters - The filter configuration.
 * @returns The stages in the order they run.
 */
export function buildFileFilters(filters: FiltersConfig): FileFilterStage[] {

  const stages: FileFilterStage[] = [];

  if(filters.daylight) {

    stages.push(daylightStage(filters.twilightAngle));
  }

  if(filters.movement) {

    stages.push(movementStage(filters.movementThreshold));
  }

  return stages;
}

/**
 * Builds the frame stages enabled by the configuration.
 * @param filters - The filter configuration.
 * @returns The stages in the order they run.
 */
export function buildFrameFilters(filters: FiltersConfig): FrameFilterStage[] {

  const stages: FrameFilterStage[] = [];

  if(filters.minimumSpeed > 0) {

    stages.push(minimumSpeedStage(filters.minimumSpeed));
  }

  if(filters.exclusionZones.length > 0) {

    stages.push(exclusionZoneStage(filters.exclusionZones));
  }

  return stages;
}

/**
 * Runs file stages in order and stops at the first rejection.
 * @param stages - The stages.
 * @param track - The track.
 * @returns The rejection, or null if every stage keeps the video.
 */
export function runFileFilters(stages: readonly FileFilterStage[], track: Track): Nullable<FileRejection> {

  for(const stage of stages) {

    const reason = stage.test(track);

    if(reason !== null) {

      LOG.debug("pipeline:filters", "File stage %s rejected the video: %s.", stage.name, reason);

      return { reason, stage: stage.name };
    }
  }

  return null;
}

/**
 * Runs frame stages in order and stops at the first one that drops the frame.
 * @param stages - The stages.
 * @param point - The frame's point.
 * @returns The name of the stage that dropped the frame, or null if it is kept.
 */
export function runFrameFilters(stages: readonly FrameFilterStage[], point: InterpolatedPoint): Nullable<string> {

  return stages.find((stage) => !stage.test(point))?.name ?? null;
}

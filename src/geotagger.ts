/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * geotagger.ts: Library entry point mapping video frames to geotags.
 */
import type { GeoTag } from "./geo/geoTag.js";
import type { GpsSample, InterpolatedPoint, Nullable, Track } from "./types/index.js";
import type { TrackOutcome } from "./parser/trackBuilder.js";
import { buildGeoTag } from "./geo/geoTag.js";
import { extractTrack } from "./parser/trackBuilder.js";
import { interpolatePoint } from "./geo/interpolator.js";
import { isValidTimeZone } from "./parser/gpsRecordDecoder.js";

/* A frame extractor running at N frames per second numbers its output 1, 2, 3, ... so frame 1 + tick * N + step belongs to sampling tick `tick`. For each tick that has
 * a sample we interpolate from the previous sample seen to this tick's sample at ratio step / N. A track that starts with a gap uses the first sample as both ends,
 * which yields that sample unchanged. Frames on an empty slot get no point, but their numbers are still consumed so later frames stay aligned with the video.
 */

/**
 * An output frame and the point it should be tagged with.
 */
export interface PlannedFrame {

  // 1-based frame number in extraction order.
  readonly frameNumber: number;

  readonly point: InterpolatedPoint;

  // Step within the tick, in [0, samplesPerTick).
  readonly step: number;

  // Index of the track slot the frame belongs to.
  readonly tick: number;
}

/**
 * Options for createGeotagger().
 */
export interface GeotaggerOptions {

  // Interpolated positions per sampling tick.
  samplesPerTick: number;

  // IANA time zone the camera clock was set to.
  timeZone: string;
}

/**
 * The result of preparing a file for tagging.
 */
export interface Geotagger {

  // Frames that have a point, in frame order. Empty unless the outcome is a track.
  readonly frames: readonly PlannedFrame[];

  readonly outcome: TrackOutcome;

  /**
   * Returns the geotag for a frame number, or null when the frame falls on an empty slot or outside the track.
   */
  tagFrame: (frameNumber: number) => Nullable<GeoTag>;
}

/**
 * Pairs every output frame with its interpolated point.
 * @param track - The track.
 * @param samplesPerTick - Interpolated positions per sampling tick. Must be a positive integer.
 * @returns The planned frames in frame order.
 * @throws RangeError if samplesPerTick is not a positive integer.
 */
export function planFrames(track: Track, samplesPerTick: number): PlannedFrame[] {

  if(!Number.isInteger(samplesPerTick) || (samplesPerTick < 1)) {

    throw new RangeError("samplesPerTick must be a positive integer, got: " + String(samplesPerTick));
  }

  const frames: PlannedFrame[] = [];
  let previous: Nullable<GpsSample> = null;

  for(const [ tick, slot ] of track.slots.entries()) {

    if(!slot) {

      continue;
    }

    const from = previous ?? slot;

    for(let step = 0; step < samplesPerTick; step++) {

      frames.push({ frameNumber: 1 + (tick * samplesPerTick) + step, point: interpolatePoint(from, slot, step / samplesPerTick), step, tick });
    }

    previous = slot;
  }

  return frames;
}

/**
 * Extracts the track of a container and prepares per-frame tagging. This is a pure function of its inputs: nothing is written and no state is kept between calls.
 * @param bytes - The complete container.
 * @param options - Time zone and samples per tick.
 * @returns The file-level outcome, the planned frames and a per-frame tagging function.
 * @throws RangeError if the time zone is unknown or samplesPerTick is not a positive integer.
 */
export function createGeotagger(bytes: Uint8Array, options: GeotaggerOptions): Geotagger {

  // An unknown zone would turn every record into a malformed one and the file into an empty track.
  if(!isValidTimeZone(options.timeZone)) {

    throw new RangeError("timeZone must be a valid IANA time zone, got: " + options.timeZone);
  }

  const outcome = extractTrack(bytes, options.timeZone);
  const frames = (outcome.kind === "track") ? planFrames(outcome.track, options.samplesPerTick) : [];
  const byNumber = new Map(frames.map((frame) => [ frame.frameNumber, frame ]));

  return {

    frames,
    outcome,
    tagFrame: (frameNumber: number): Nullable<GeoTag> => {

      const frame = byNumber.get(frameNumber);

      return frame ? buildGeoTag(frame.point) : null;
    }
  };
}

export { buildGeoTag, frameFileName, toDegreesMinutesSeconds } from "./geo/geoTag.js";
export type { DegreesMinutesSeconds, GeoTag, Rational } from "./geo/geoTag.js";
export { extractTrack, extractTrackFromFile } from "./parser/trackBuilder.js";
export type { TrackOutcome } from "./parser/trackBuilder.js";
export { interpolatePoint } from "./geo/interpolator.js";
export type { GpsSample, InterpolatedPoint, Track, TrackSlot } from "./types/index.js";

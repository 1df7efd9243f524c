/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * process.ts: Per-video processing pipeline and batch runner.
 */
import { LOG, extractFrames, extractedFramePath, formatCount, formatDuration, formatError, getErrorCode, runWithFileContext, writeGeoTag } from "../utils/index.js";
import { buildFileFilters, buildFrameFilters, runFileFilters, runFrameFilters } from "./filters.js";
import type { Config } from "../types/index.js";
import { getOutputDir } from "../config/paths.js";
import type { GeoTag } from "../geo/geoTag.js";
import type { TrackOutcome } from "../parser/trackBuilder.js";
import { buildGeoTag } from "../geo/geoTag.js";
import { extractTrackFromFile } from "../parser/trackBuilder.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { planFrames } from "../geotagger.js";
import { writeGpx } from "./gpx.js";

const { promises: fsPromises } = fs;

/*
 * VIDEO PIPELINE
 *
 * Each video goes through the same steps:
 *
 * 1. Extract the track from the container. A structural error or a track without a single fix skips the video.
 * 2. Run the file filter stages. The first rejection skips the video.
 * 3. Optionally write a GPX track into the output directory.
 * 4. Extract frames into a temporary directory at samplesPerTick frames per second.
 * 5. For every planned frame: run the frame filter stages, write the geotag and move the frame into the output directory under its timestamp name. The frames of the
 *    first sampling tick and the first frame of the second tick share the first sample's timestamp, so a name that was already written for this video is skipped
 *    and the earlier frame is kept.
 * 6. Remove the temporary directory, whether or not the previous steps succeeded.
 *
 * The frame extractor and the metadata writer are collaborators so the pipeline can run without FFmpeg or real JPEG files.
 */

/**
 * Produces numbered frames from a video.
 */
export interface FrameExtractor {

  /**
   * Writes the frames of a video into a directory.
   */
  extract: (videoPath: string, directory: string, framesPerSecond: number) => Promise<void>;

  /**
   * Returns where extract() put a given 1-based frame.
   */
  framePath: (directory: string, frameNumber: number) => string;
}

/**
 * Writes geotag metadata into a frame.
 */
export interface TagWriter {

  write: (imagePath: string, tag: GeoTag) => Promise<void>;
}

/**
 * The external collaborators of the pipeline.
 */
export interface PipelineCollaborators {

  readonly extractor: FrameExtractor;
  readonly writer: TagWriter;
}

/**
 * Why a video was skipped.
 *
 * - noTrack: the video has no GPS index, or none of its records has a fix.
 * - structuralError: the container could not be walked far enough to find the GPS index.
 * - filtered: a file filter stage rejected the video.
 */
export type SkipReason = "filtered" | "noTrack" | "structuralError";

/**
 * The result of processing one video.
 */
export type FileOutcome =
  { readonly framesDuplicate: number; readonly framesFiltered: number; readonly framesMissing: number; readonly framesWritten: number; readonly kind: "tagged" } |
  { readonly detail: string; readonly kind: "skipped"; readonly reason: SkipReason } |
  { readonly error: string; readonly kind: "failed" };

/**
 * A video and what happened to it.
 */
export interface BatchEntry {

  readonly outcome: FileOutcome;
  readonly path: string;
}

/**
 * Returns collaborators backed by FFmpeg and the EXIF writer.
 * @param ffmpegPath - The FFmpeg executable.
 * @returns The collaborators.
 */
export function createDefaultCollaborators(ffmpegPath: string): PipelineCollaborators {

  return {

    extractor: {

      extract: async (videoPath: string, directory: string, framesPerSecond: number): Promise<void> => extractFrames(ffmpegPath, videoPath, directory, framesPerSecond),
      framePath: extractedFramePath
    },
    writer: { write: writeGeoTag }
  };
}

/**
 * Checks whether a file exists.
 * @param filePath - The file.
 * @returns True if it exists.
 * @throws For any error other than the file not existing.
 */
async function fileExists(filePath: string): Promise<boolean> {

  try {

    await fsPromises.stat(filePath);

    return true;
  } catch(error) {

    if(getErrorCode(error) === "ENOENT") {

      return false;
    }

    throw error;
  }
}

/**
 * Moves a file, copying and deleting when source and destination are on different filesystems.
 * @param from - The current path.
 * @param to - The new path. An existing file is replaced.
 */
export async function moveFile(from: string, to: string): Promise<void> {

  try {

    await fsPromises.rename(from, to);
  } catch(error) {

    if(getErrorCode(error) !== "EXDEV") {

      throw error;
    }

    await fsPromises.copyFile(from, to);
    await fsPromises.unlink(from);
  }
}

/**
 * Describes a track outcome that has no samples to tag.
 * @param outcome - The outcome.
 * @returns The skip.
 */
function describeUnusableTrack(outcome: Exclude<TrackOutcome, { kind: "track" }>): FileOutcome {

  if(outcome.kind === "structuralError") {

    return {

      detail: [ "the container is malformed at offset ", String(outcome.error.offset), ": ", outcome.error.message ].join(""),
      kind: "skipped",
      reason: "structuralError"
    };
  }

  return {

    detail: (outcome.entries === 0) ? "it has no GPS data" : [ "none of its ", formatCount(outcome.entries, "GPS record"), " has a fix" ].join(""),
    kind: "skipped",
    reason: "noTrack"
  };
}

/**
 * Runs the pipeline for one video. Failures are returned as a "failed" outcome rather than thrown.
 * @param videoPath - The video.
 * @param config - The configuration.
 * @param collaborators - The frame extractor and metadata writer.
 * @returns What happened to the video.
 */
export async function processVideoFile(videoPath: string, config: Config, collaborators: PipelineCollaborators): Promise<FileOutcome> {

  const { samplesPerTick, timeZone } = config.processing;
  const outputDir = getOutputDir(config);
  const baseName = path.basename(videoPath);

  try {

    const outcome = extractTrackFromFile(videoPath, timeZone);

    if(outcome.kind !== "track") {

      return describeUnusableTrack(outcome);
    }

    const track = outcome.track;
    const rejection = runFileFilters(buildFileFilters(config.filters), track);

    if(rejection) {

      return { detail: rejection.reason, kind: "skipped", reason: "filtered" };
    }

    await fsPromises.mkdir(outputDir, { recursive: true });

    if(config.processing.writeGpx) {

      const gpxPath = path.join(outputDir, path.parse(baseName).name + ".gpx");

      try {

        await writeGpx(track, gpxPath, baseName);
      } catch(error) {

        LOG.warn("Unable to write GPX track %s: %s.", gpxPath, formatError(error));
      }
    }

    const frameFilters = buildFrameFilters(config.filters);
    const tempDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "dashgeo-"));
    const writtenNames = new Set<string>();
    let framesDuplicate = 0;
    let framesFiltered = 0;
    let framesMissing = 0;
    let framesWritten = 0;

    try {

      LOG.info("Extracting frames from %s...", baseName);

      await collaborators.extractor.extract(videoPath, tempDir, samplesPerTick);

      for(const frame of planFrames(track, samplesPerTick)) {

        const droppedBy = runFrameFilters(frameFilters, frame.point);

        if(droppedBy) {

          LOG.debug("pipeline:filters", "Frame %d dropped by %s.", frame.frameNumber, droppedBy);

          framesFiltered++;

          continue;
        }

        const framePath = collaborators.extractor.framePath(tempDir, frame.frameNumber);

        // The video can end before the GPS index does.
        if(!(await fileExists(framePath))) {

          framesMissing++;

          continue;
        }

        const tag = buildGeoTag(frame.point);

        if(writtenNames.has(tag.fileName)) {

          LOG.debug("pipeline:exif", "Frame %d has the same timestamp as an earlier frame, keeping the earlier one.", frame.frameNumber);

          framesDuplicate++;

          continue;
        }

        await collaborators.writer.write(framePath, tag);
        await moveFile(framePath, path.join(outputDir, tag.fileName));

        writtenNames.add(tag.fileName);
        framesWritten++;
      }
    } finally {

      await fsPromises.rm(tempDir, { force: true, recursive: true });
    }

    return { framesDuplicate, framesFiltered, framesMissing, framesWritten, kind: "tagged" };
  } catch(error) {

    return { error: formatError(error), kind: "failed" };
  }
}

/**
 * Logs the outcome of one video.
 */
function reportOutcome(baseName: string, outcome: FileOutcome, elapsed: number): void {

  switch(outcome.kind) {

    case "tagged": {

      LOG.info("Wrote %s from %s in %s (%d filtered, %d missing, %d duplicate).", formatCount(outcome.framesWritten, "frame"), baseName, formatDuration(elapsed),
        outcome.framesFiltered, outcome.framesMissing, outcome.framesDuplicate);

      break;
    }

    case "skipped": {

      LOG.warn("Skipping %s because %s.", baseName, outcome.detail);

      break;
    }

    case "failed": {

      LOG.error("Failed to process %s: %s.", baseName, outcome.error);

      break;
    }
  }
}

/**
 * Processes videos one after another. A failure in one video never stops the batch.
 * @param videoPaths - The videos, in processing order.
 * @param config - The configuration.
 * @param collaborators - The frame extractor and metadata writer.
 * @returns One entry per video, in input order.
 */
export async function processBatch(videoPaths: readonly string[], config: Config, collaborators: PipelineCollaborators): Promise<BatchEntry[]> {

  const results: BatchEntry[] = [];

  for(const videoPath of videoPaths) {

    const baseName = path.basename(videoPath);
    const started = Date.now();

    const outcome = await runWithFileContext({ label: baseName, path: videoPath }, async () => {

      LOG.info("Extracting GPS data from %s...", baseName);

      const result = await processVideoFile(videoPath, config, collaborators);

      reportOutcome(baseName, result, Date.now() - started);

      return result;
    });

    results.push({ outcome, path: videoPath });
  }

  return results;
}

/**
 * Summarizes a batch for the final log line.
 * @param entries - The batch results.
 * @returns Counts per outcome kind and the total frames written.
 */
export function summarizeBatch(entries: readonly BatchEntry[]): { failed: number; frames: number; skipped: number; tagged: number } {

  const summary = { failed: 0, frames: 0, skipped: 0, tagged: 0 };

  for(const { outcome } of entries) {

    summary[outcome.kind]++;

    if(outcome.kind === "tagged") {

      summary.frames += outcome.framesWritten;
    }
  }

  return summary;
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpeg.ts: FFmpeg process management for frame extraction.
 */
import { LOG } from "./logger.js";
import type { Nullable } from "../types/index.js";
import { join } from "node:path";
import { spawn } from "node:child_process";

/*
 * FRAME EXTRACTION
 *
 * FFmpeg decodes the video and writes still frames at a fixed rate into a directory, numbered from 1 in presentation order:
 *
 * - `-nostdin -hide_banner -loglevel warning`: never read the terminal, only report problems
 * - `-i <video>`: the dash cam recording
 * - `-qscale:v 1 -qmin 1 -qmax 1`: highest JPEG quality
 * - `-vf fps=<N>`: N frames per second of video, one per interpolated position
 * - `<dir>/frame_%d.jpg`: frame_1.jpg, frame_2.jpg, ...
 *
 * Because the camera writes one GPS sample per second, frame 1 + tick * N + step is the frame for step `step` of sampling tick `tick`.
 */

/*
 * FFMPEG PATH RESOLUTION
 *
 * We use the configured executable when one is set (FFMPEG_BIN or --ffmpeg), and otherwise whatever "ffmpeg" resolves to in the system PATH. The result is cached after
 * the first lookup.
 */

// Cached FFmpeg path after resolution. Null means not yet resolved, undefined means not found.
let cachedFFmpegPath: Nullable<string> | undefined = null;

/**
 * Checks if FFmpeg exists at a specific path by attempting to run it.
 * @param pathToCheck - Full path to, or command name of, the FFmpeg executable.
 * @returns Promise resolving to true if FFmpeg runs successfully.
 */
async function checkFFmpegAtPath(pathToCheck: string): Promise<boolean> {

  return new Promise((resolve) => {

    const ffmpeg = spawn(pathToCheck, ["-version"], {

      stdio: [ "ignore", "ignore", "ignore" ]
    });

    ffmpeg.on("error", () => {

      resolve(false);
    });

    ffmpeg.on("exit", (code) => {

      resolve(code === 0);
    });
  });
}

/**
 * Resolves the FFmpeg executable. The result is cached for subsequent calls.
 * @param configuredPath - Executable path from the configuration, or null to search the system PATH.
 * @returns Promise resolving to the FFmpeg path if found, or undefined if not available.
 */
export async function resolveFFmpegPath(configuredPath: Nullable<string>): Promise<string | undefined> {

  if(cachedFFmpegPath !== null) {

    return cachedFFmpegPath;
  }

  if(configuredPath) {

    if(await checkFFmpegAtPath(configuredPath)) {

      cachedFFmpegPath = configuredPath;

      return cachedFFmpegPath;
    }

    LOG.warn("FFmpeg could not be run at the configured path %s. Trying the system PATH.", configuredPath);
  }

  cachedFFmpegPath = (await checkFFmpegAtPath("ffmpeg")) ? "ffmpeg" : undefined;

  return cachedFFmpegPath;
}

/**
 * Returns the path FFmpeg writes a given frame to.
 * @param directory - The extraction directory.
 * @param frameNumber - The 1-based frame number.
 * @returns The frame's path.
 */
export function extractedFramePath(directory: string, frameNumber: number): string {

  return join(directory, [ "frame_", String(frameNumber), ".jpg" ].join(""));
}

/**
 * Runs FFmpeg to extract frames from a video at a fixed rate.
 * @param ffmpegPath - The FFmpeg executable.
 * @param videoPath - The video to decode.
 * @param directory - Directory that receives frame_1.jpg, frame_2.jpg, ...
 * @param framesPerSecond - Frames to extract per second of video.
 * @returns Promise resolving when FFmpeg exits successfully.
 * @throws If FFmpeg cannot be started or exits with a non-zero code.
 */
export async function extractFrames(ffmpegPath: string, videoPath: string, directory: string, framesPerSecond: number): Promise<void> {

  const ffmpegArgs = [
    "-nostdin",
    "-hide_banner",
    "-loglevel", "warning",
    "-i", videoPath,
    "-qscale:v", "1",
    "-qmin", "1",
    "-qmax", "1",
    "-vf", "fps=" + String(framesPerSecond),
    join(directory, "frame_%d.jpg")
  ];

  LOG.debug("pipeline:ffmpeg", "Running %s %s.", ffmpegPath, ffmpegArgs.join(" "));

  return new Promise<void>((resolve, reject) => {

    const ffmpeg = spawn(ffmpegPath, ffmpegArgs, {

      stdio: [ "ignore", "ignore", "pipe" ]
    });

    // The last thing FFmpeg complained about, for the error message if it fails.
    let lastMessage = "";

    ffmpeg.stderr.on("data", (data: Buffer) => {

      const message = data.toString().trim();

      if(message.length > 0) {

        lastMessage = message.split("\n").pop() ?? message;

        LOG.debug("pipeline:ffmpeg", "FFmpeg: %s", message);
      }
    });

    ffmpeg.on("error", (error) => {

      reject(error);
    });

    ffmpeg.on("close", (code, signal) => {

      if(code === 0) {

        resolve();

        return;
      }

      const reason = (code !== null) ? "exited with code " + String(code) : "was killed by signal " + String(signal);

      reject(new Error([ "FFmpeg ", reason, lastMessage ? ": " + lastMessage : "", "." ].join("")));
    });
  });
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * pipeline.test.ts: Tests for the per-video pipeline and the batch runner.
 */
import type { FrameExtractor, PipelineCollaborators } from "../src/pipeline/process.js";
import { box, buildContainer, gpsRecord, rawHeader } from "./helpers/container.js";
import { moveFile, processBatch, processVideoFile, summarizeBatch } from "../src/pipeline/process.js";
import type { Config } from "../src/types/index.js";
import type { GeoTag } from "../src/geo/geoTag.js";
import { DEFAULTS } from "../src/config/index.js";
import { extractedFramePath } from "../src/utils/ffmpeg.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as piexif from "piexifjs";
import { writeGeoTag } from "../src/utils/exif.js";

const JPEG = Buffer.from([ 0xFF, 0xD8, 0xFF, 0xDA, 0x00, 0x02, 0xFF, 0xD9 ]);

// Three consecutive readings at 12:30:45, 12:30:46 and 12:30:47 camera time.
const THREE_SECONDS = [ gpsRecord(), gpsRecord({ second: 46 }), gpsRecord({ second: 47 }) ];

interface FakeExtractor extends FrameExtractor {

  directories: string[];
}

/**
 * An extractor that writes a fixed number of placeholder frames.
 */
function fakeExtractor(frameCount: number, failure?: Error): FakeExtractor {

  const directories: string[] = [];

  return {

    directories,
    extract: async (_videoPath: string, directory: string): Promise<void> => {

      directories.push(directory);

      for(let frame = 1; frame <= frameCount; frame++) {

        await fs.promises.writeFile(extractedFramePath(directory, frame), JPEG);
      }

      if(failure) {

        throw failure;
      }
    },
    framePath: extractedFramePath
  };
}

describe("processVideoFile", () => {

  let root: string;
  let outputDir: string;
  let config: Config;
  let writer: { write: jest.Mock<Promise<void>, [string, GeoTag]> };

  function collaborators(extractor: FrameExtractor): PipelineCollaborators {

    return { extractor, writer };
  }

  function writeVideo(name: string, bytes: Buffer): string {

    const file = path.join(root, name);

    fs.writeFileSync(file, bytes);

    return file;
  }

  beforeEach(() => {

    root = fs.mkdtempSync(path.join(os.tmpdir(), "dashgeo-pipeline-"));
    outputDir = path.join(root, "out");
    config = structuredClone(DEFAULTS);
    config.processing.outputDir = outputDir;
    config.filters.daylight = false;
    writer = { write: jest.fn<Promise<void>, [string, GeoTag]>(async (): Promise<void> => Promise.resolve()) };
  });

  afterEach(() => {

    fs.rmSync(root, { force: true, recursive: true });
  });

  it("tags and renames every planned frame", async () => {

    const extractor = fakeExtractor(3);
    const outcome = await processVideoFile(writeVideo("clip.mp4", buildContainer(THREE_SECONDS)), config, collaborators(extractor));

    expect(outcome).toEqual({ framesDuplicate: 1, framesFiltered: 0, framesMissing: 0, framesWritten: 2, kind: "tagged" });
    expect(fs.readdirSync(outputDir).sort()).toEqual([ "frame-2024-06-15-17-30-45-000.jpg", "frame-2024-06-15-17-30-46-000.jpg" ]);
    expect(writer.write.mock.calls.map((call) => path.basename(call[0]))).toEqual([ "frame_1.jpg", "frame_3.jpg" ]);
    expect(fs.existsSync(extractor.directories[0])).toBe(false);
  });

  it("counts frames the video does not have", async () => {

    const outcome = await processVideoFile(writeVideo("clip.mp4", buildContainer(THREE_SECONDS)), config, collaborators(fakeExtractor(1)));

    expect(outcome).toEqual({ framesDuplicate: 0, framesFiltered: 0, framesMissing: 2, framesWritten: 1, kind: "tagged" });
  });

  it("writes EXIF data with the real writer", async () => {

    const video = writeVideo("clip.mp4", buildContainer(THREE_SECONDS));

    await processVideoFile(video, config, { extractor: fakeExtractor(1), writer: { write: writeGeoTag } });

    const exif = piexif.load(fs.readFileSync(path.join(outputDir, "frame-2024-06-15-17-30-45-000.jpg")).toString("binary"));

    expect(exif.GPS?.[1]).toBe("N");
    expect(exif.GPS?.[3]).toBe("E");
    expect(exif.GPS?.[17]).toEqual([ 9000, 100 ]);
  });

  it("removes the temporary directory when extraction fails", async () => {

    const extractor = fakeExtractor(2, new Error("FFmpeg exited with code 1."));
    const outcome = await processVideoFile(writeVideo("clip.mp4", buildContainer(THREE_SECONDS)), config, collaborators(extractor));

    expect(outcome).toEqual({ error: "FFmpeg exited with code 1", kind: "failed" });
    expect(fs.existsSync(extractor.directories[0])).toBe(false);
    expect(writer.write).not.toHaveBeenCalled();
  });

  it("skips a video without a fix", async () => {

    const extractor = fakeExtractor(1);

    expect(await processVideoFile(writeVideo("a.mp4", buildContainer([gpsRecord({ active: "V" })])), config, collaborators(extractor))).toEqual({
      detail: "none of its 1 GPS record has a fix",
      kind: "skipped",
      reason: "noTrack"
    });
    expect(await processVideoFile(writeVideo("b.mp4", buildContainer([])), config, collaborators(extractor))).toEqual({
      detail: "it has no GPS data",
      kind: "skipped",
      reason: "noTrack"
    });
    expect(extractor.directories).toEqual([]);
  });

  it("skips a container it cannot walk", async () => {

    const bytes = Buffer.concat([ box("ftyp", Buffer.alloc(8)), rawHeader(100, "moov") ]);

    expect(await processVideoFile(writeVideo("clip.mp4", bytes), config, collaborators(fakeExtractor(1)))).toEqual({
      detail: "the container is malformed at offset 16: box 'moov' declares size 100 but only 8 bytes remain in region",
      kind: "skipped",
      reason: "structuralError"
    });
  });

  it("skips a video that ends after dark before extracting anything", async () => {

    const extractor = fakeExtractor(1);

    config.filters.daylight = true;

    // 21:30 in Chicago is 02:30 UTC, the middle of the night at the recorded position.
    const outcome = await processVideoFile(writeVideo("clip.mp4", buildContainer([gpsRecord({ hour: 21 })])), config, collaborators(extractor));

    expect(outcome).toMatchObject({ kind: "skipped", reason: "filtered" });
    expect(outcome.kind === "skipped" ? outcome.detail : "").toMatch(/^it ends when the sun is down/);
    expect(extractor.directories).toEqual([]);
    expect(fs.existsSync(outputDir)).toBe(false);
  });

  it("drops frames below the minimum speed", async () => {

    const records = [ gpsRecord({ speed: 2 }), gpsRecord({ second: 46, speed: 2 }) ];
    const outcome = await processVideoFile(writeVideo("clip.mp4", buildContainer(records)), config, collaborators(fakeExtractor(2)));

    expect(outcome).toEqual({ framesDuplicate: 0, framesFiltered: 2, framesMissing: 0, framesWritten: 0, kind: "tagged" });
    expect(writer.write).not.toHaveBeenCalled();
  });

  it("drops frames inside an exclusion zone", async () => {

    config.filters.exclusionZones = [{ latitude: 37.2247, longitude: 1.765, radius: 100 }];

    const outcome = await processVideoFile(writeVideo("clip.mp4", buildContainer(THREE_SECONDS)), config, collaborators(fakeExtractor(3)));

    expect(outcome).toMatchObject({ framesFiltered: 3, framesWritten: 0, kind: "tagged" });
  });

  it("writes a GPX track beside the frames", async () => {

    config.processing.writeGpx = true;

    await processVideoFile(writeVideo("clip.mp4", buildContainer(THREE_SECONDS)), config, collaborators(fakeExtractor(3)));

    const gpx = fs.readFileSync(path.join(outputDir, "clip.gpx"), "utf-8");

    expect(gpx.split("\n").filter((line) => line.startsWith("\t\t<trkpt"))).toHaveLength(3);
  });

  it("reports a missing video as a failure", async () => {

    const outcome = await processVideoFile(path.join(root, "missing.mp4"), config, collaborators(fakeExtractor(1)));

    expect(outcome.kind).toBe("failed");
    expect(outcome.kind === "failed" ? outcome.error : "").toMatch(/^ENOENT/);
  });

  it("continues the batch past failures and summarizes it", async () => {

    const videos = [ writeVideo("good.mp4", buildContainer(THREE_SECONDS)), path.join(root, "missing.mp4"), writeVideo("nofix.mp4", buildContainer([null])) ];
    const results = await processBatch(videos, config, collaborators(fakeExtractor(3)));

    expect(results.map((entry) => [ path.basename(entry.path), entry.outcome.kind ])).toEqual([ [ "good.mp4", "tagged" ], [ "missing.mp4", "failed" ],
      [ "nofix.mp4", "skipped" ] ]);
    expect(summarizeBatch(results)).toEqual({ failed: 1, frames: 2, skipped: 1, tagged: 1 });
  });
});

describe("moveFile", () => {

  it("moves a file and replaces an existing destination", async () => {

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "dashgeo-move-"));

    try {

      fs.writeFileSync(path.join(dir, "a"), "new");
      fs.writeFileSync(path.join(dir, "b"), "old");

      await moveFile(path.join(dir, "a"), path.join(dir, "b"));

      expect(fs.existsSync(path.join(dir, "a"))).toBe(false);
      expect(fs.readFileSync(path.join(dir, "b"), "utf-8")).toBe("new");
    } finally {

      fs.rmSync(dir, { force: true, recursive: true });
    }
  });
});

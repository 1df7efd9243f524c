/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * geotagger.test.ts: Tests for frame planning and the library entry point.
 */
import { buildContainer, gpsRecord, sample } from "./helpers/container.js";
import { createGeotagger, planFrames } from "../src/geotagger.js";
import type { Track } from "../src/types/index.js";

const TZ = "America/Chicago";

describe("planFrames", () => {

  const first = sample({ latitude: 41, speed: 10 });
  const second = sample({ latitude: 42, speed: 20, timestamp: new Date("2024-06-15T17:30:47.000Z") });

  it("consumes frame numbers for empty slots", () => {

    const frames = planFrames({ slots: [ first, null, second ], timeZone: TZ }, 2);

    expect(frames.map((frame) => frame.frameNumber)).toEqual([ 1, 2, 5, 6 ]);
    expect(frames.map((frame) => [ frame.tick, frame.step ])).toEqual([ [ 0, 0 ], [ 0, 1 ], [ 2, 0 ], [ 2, 1 ] ]);
  });

  it("interpolates from the previous sample to the current one", () => {

    const frames = planFrames({ slots: [ first, null, second ], timeZone: TZ }, 2);

    expect(frames[2].point).toEqual(first);
    expect(frames[3].point.latitude).toBe(41.5);
    expect(frames[3].point.timestamp.toISOString()).toBe("2024-06-15T17:30:46.000Z");
  });

  it("uses the first sample on both ends after a leading gap", () => {

    const frames = planFrames({ slots: [ null, second ], timeZone: TZ }, 3);

    expect(frames.map((frame) => frame.frameNumber)).toEqual([ 4, 5, 6 ]);
    expect(frames.every((frame) => frame.point.latitude === 42)).toBe(true);
  });

  it("plans nothing for an empty track", () => {

    const track: Track = { slots: [ null, null ], timeZone: TZ };

    expect(planFrames(track, 1)).toEqual([]);
  });

  it("rejects a samples-per-tick value that is not a positive integer", () => {

    const track: Track = { slots: [first], timeZone: TZ };

    expect(() => planFrames(track, 0)).toThrow(RangeError);
    expect(() => planFrames(track, 1.5)).toThrow("samplesPerTick must be a positive integer, got: 1.5");
  });
});

describe("createGeotagger", () => {

  it("tags frames from container bytes", () => {

    const geotagger = createGeotagger(buildContainer([ gpsRecord(), gpsRecord({ second: 46 }) ]), { samplesPerTick: 2, timeZone: TZ });

    expect(geotagger.outcome.kind).toBe("track");
    expect(geotagger.frames).toHaveLength(4);
    expect(geotagger.tagFrame(1)?.fileName).toBe("frame-2024-06-15-17-30-45-000.jpg");
    expect(geotagger.tagFrame(4)?.fileName).toBe("frame-2024-06-15-17-30-45-500.jpg");
    expect(geotagger.tagFrame(5)).toBeNull();
  });

  it("plans no frames when the file has no fix", () => {

    const geotagger = createGeotagger(buildContainer([gpsRecord({ active: "V" })]), { samplesPerTick: 1, timeZone: TZ });

    expect(geotagger.outcome).toEqual({ entries: 1, kind: "emptyTrack" });
    expect(geotagger.frames).toEqual([]);
    expect(geotagger.tagFrame(1)).toBeNull();
  });

  it("turns a record with a corrupt coordinate into an empty slot", () => {

    const geotagger = createGeotagger(buildContainer([ gpsRecord({ latitude: Number.NaN }), gpsRecord({ second: 46 }) ]), { samplesPerTick: 1, timeZone: TZ });

    expect(geotagger.outcome.kind).toBe("track");
    expect((geotagger.outcome.kind === "track") ? geotagger.outcome.fixes : -1).toBe(1);
    expect(geotagger.frames.map((frame) => frame.frameNumber)).toEqual([2]);
    expect(geotagger.tagFrame(1)).toBeNull();
    expect(geotagger.tagFrame(2)?.fileName).toBe("frame-2024-06-15-17-30-46-000.jpg");
  });

  it("rejects an unknown time zone", () => {

    expect(() => createGeotagger(buildContainer([gpsRecord()]), { samplesPerTick: 1, timeZone: "Not/AZone" }))
      .toThrow("timeZone must be a valid IANA time zone, got: Not/AZone");
  });
});

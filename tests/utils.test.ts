/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * utils.test.ts: Tests for the small shared utilities.
 */
import { escapeXml, formatCount, formatDuration, formatError, getErrorCode, getFileLabel, getPackageVersion, initDebugFilter, isAnyDebugEnabled,
  isCategoryEnabled, runWithFileContext } from "../src/utils/index.js";

describe("debug filter", () => {

  afterEach(() => {

    initDebugFilter("");
  });

  it("enables a category and its sub-categories", () => {

    initDebugFilter("parser");

    expect(isCategoryEnabled("parser")).toBe(true);
    expect(isCategoryEnabled("parser:records")).toBe(true);
    expect(isCategoryEnabled("parsers")).toBe(false);
    expect(isCategoryEnabled("pipeline:gpx")).toBe(false);
  });

  it("lets exclusions win over includes and the wildcard", () => {

    initDebugFilter("*,-parser:atoms");

    expect(isCategoryEnabled("parser:atoms")).toBe(false);
    expect(isCategoryEnabled("parser:records")).toBe(true);
    expect(isCategoryEnabled("pipeline:ffmpeg")).toBe(true);
  });

  it("disables everything for an empty pattern", () => {

    initDebugFilter(" , ");

    expect(isAnyDebugEnabled()).toBe(false);
    expect(isCategoryEnabled("parser")).toBe(false);
  });
});

describe("file context", () => {

  it("is only visible inside the context", async () => {

    expect(getFileLabel()).toBeUndefined();

    const label = await runWithFileContext({ label: "clip.mp4", path: "/videos/clip.mp4" }, async () => {

      await new Promise((resolve) => setImmediate(resolve));

      return getFileLabel();
    });

    expect(label).toBe("clip.mp4");
    expect(getFileLabel()).toBeUndefined();
  });
});

describe("formatting", () => {

  it("formats durations", () => {

    expect(formatDuration(17000)).toBe("17s");
    expect(formatDuration(399000)).toBe("6m 39s");
    expect(formatDuration(4980000)).toBe("1h 23m");
  });

  it("pluralizes counts", () => {

    expect(formatCount(1, "frame")).toBe("1 frame");
    expect(formatCount(0, "frame")).toBe("0 frames");
  });

  it("escapes XML", () => {

    expect(escapeXml("a & \"b\" <c> 'd'")).toBe("a &amp; &quot;b&quot; &lt;c&gt; &apos;d&apos;");
  });
});

describe("errors", () => {

  it("formats thrown values without trailing punctuation", () => {

    expect(formatError(new Error("FFmpeg exited with code 1."))).toBe("FFmpeg exited with code 1");
    expect(formatError({ message: "odd!" })).toBe("odd");
    expect(formatError(42)).toBe("42");
  });

  it("reads system error codes", () => {

    expect(getErrorCode(Object.assign(new Error("missing"), { code: "ENOENT" }))).toBe("ENOENT");
    expect(getErrorCode(new Error("plain"))).toBeUndefined();
    expect(getErrorCode(null)).toBeUndefined();
  });
});

describe("getPackageVersion", () => {

  it("reads the version from package.json", () => {

    expect(getPackageVersion()).toBe("1.0.0");
  });
});

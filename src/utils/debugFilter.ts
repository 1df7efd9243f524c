/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Category-based debug log filtering for dashgeo.
 */

/* Debug output is grouped into colon-separated categories such as "parser:records" or "pipeline:ffmpeg". The DASHGEO_DEBUG environment variable selects which ones are
 * printed with a comma-separated list of patterns:
 *
 *   "*"           every category
 *   "parser"      "parser" itself and every "parser:..." sub-category
 *   "-parser:atoms"  never this category, even under "*"
 *
 * Example: DASHGEO_DEBUG=*,-parser:atoms prints everything except the box-by-box walk.
 */

interface FilterState {

  // Whether any pattern is configured. Lets LOG.debug() bail out before touching the category string.
  enabled: boolean;
  excludes: Set<string>;
  includes: Set<string>;
  wildcard: boolean;
}

const state: FilterState = { enabled: false, excludes: new Set(), includes: new Set(), wildcard: false };

/**
 * Checks whether a category equals a pattern or is one of its sub-categories.
 * @param category - The category to test.
 * @param patterns - The patterns to test against.
 * @returns True if any pattern covers the category.
 */
function covers(category: string, patterns: Set<string>): boolean {

  if(patterns.has(category)) {

    return true;
  }

  return [...patterns].some((pattern) => category.startsWith(pattern + ":"));
}

/**
 * Replaces the filter configuration with a comma-separated pattern list. An empty string disables debug output.
 * @param pattern - The pattern list (e.g., "parser,-parser:atoms").
 */
export function initDebugFilter(pattern: string): void {

  state.includes.clear();
  state.excludes.clear();
  state.wildcard = false;
  state.enabled = false;

  for(const part of pattern.split(",").map((p) => p.trim())) {

    if(part.length === 0) {

      continue;
    }

    state.enabled = true;

    if(part === "*") {

      state.wildcard = true;
    } else if(part.startsWith("-")) {

      state.excludes.add(part.slice(1));
    } else {

      state.includes.add(part);
    }
  }
}

/**
 * Checks whether debug output for a category should be produced.
 * @param category - The debug category.
 * @returns True if the category is enabled and not excluded.
 */
export function isCategoryEnabled(category: string): boolean {

  if(!state.enabled || covers(category, state.excludes)) {

    return false;
  }

  return state.wildcard || covers(category, state.includes);
}

/**
 * Fast-path check for whether any debug pattern is configured.
 * @returns True if debug output may be produced for some category.
 */
export function isAnyDebugEnabled(): boolean {

  return state.enabled;
}

/**
 * A known debug category and what it covers. Listed by --help.
 */
export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "parser:atoms", description: "Every MP4 box visited while looking for the GPS index." },
  { category: "parser:records", description: "GPS records skipped as malformed, and per-file decode counts." },
  { category: "pipeline:exif", description: "EXIF writes and frame moves." },
  { category: "pipeline:ffmpeg", description: "FFmpeg command lines and stderr output." },
  { category: "pipeline:filters", description: "Frames and files dropped by filter stages." },
  { category: "pipeline:gpx", description: "GPX track export." }
];

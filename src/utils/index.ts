/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Utility module exports for dashgeo.
 */
export * from "./debugFilter.js";
export * from "./errors.js";
export * from "./exif.js";
export * from "./ffmpeg.js";
export * from "./fileContext.js";
export * from "./fileLogger.js";
export * from "./format.js";
export * from "./logger.js";
export * from "./version.js";
export * from "./xml.js";

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * interpolator.ts: Synthetic GPS points between two samples.
 */
import type { GpsSample, InterpolatedPoint } from "../types/index.js";

/* The camera samples once per tick but we may extract several frames per tick, so each frame gets a point interpolated between the two samples that bracket it. Scalar
 * fields and time are interpolated linearly. Bearing is interpolated along the shorter arc, so 350 degrees to 10 degrees passes through north rather than south, and
 * the result is normalized into [0, 360).
 */

/**
 * Linear interpolation. Returns `from` exactly at ratio 0.
 * @param from - Value at ratio 0.
 * @param to - Value at ratio 1.
 * @param ratio - Position between the two.
 * @returns The interpolated value.
 */
export function lerp(from: number, to: number, ratio: number): number {

  return from + ((to - from) * ratio);
}

/**
 * Normalizes an angle in degrees into [0, 360).
 * @param degrees - Any finite angle.
 * @returns The equivalent angle in [0, 360).
 */
export function normalizeBearing(degrees: number): number {

  const normalized = ((degrees % 360) + 360) % 360;

  // Rounding in the modulo can land exactly on 360 for tiny negative inputs.
  return (normalized >= 360) ? 0 : normalized;
}

/**
 * Returns the signed difference from one bearing to another along the shorter arc, in [-180, 180).
 * @param from - Starting bearing in degrees.
 * @param to - Target bearing in degrees.
 * @returns The signed angular difference.
 */
export function shortestAngle(from: number, to: number): number {

  return normalizeBearing((to - from) + 180) - 180;
}

/**
 * Interpolates a bearing along the shorter arc.
 * @param from - Bearing at ratio 0.
 * @param to - Bearing at ratio 1.
 * @param ratio - Position between the two.
 * @returns The interpolated bearing in [0, 360).
 */
export function interpolateBearing(from: number, to: number, ratio: number): number {

  return normalizeBearing(from + (shortestAngle(from, to) * ratio));
}

/**
 * Interpolates a timestamp at millisecond resolution. The result never leaves [prev, next] for ratios in [0, 1].
 * @param prev - Instant at ratio 0.
 * @param next - Instant at ratio 1.
 * @param ratio - Position between the two.
 * @returns The interpolated instant.
 */
export function interpolateTime(prev: Date, next: Date, ratio: number): Date {

  const start = prev.getTime();

  return new Date(start + Math.round((next.getTime() - start) * ratio));
}

/**
 * Produces a point between two chronologically ordered samples. Ratio 0 reproduces `prev`, and the point approaches `next` as ratio approaches 1. Passing the same
 * sample twice yields that sample for any ratio, which is how a track that starts with a gap is handled.
 * @param prev - The earlier sample.
 * @param next - The later sample.
 * @param ratio - Position between the two, in [0, 1).
 * @returns The interpolated point.
 */
export function interpolatePoint(prev: GpsSample, next: GpsSample, ratio: number): InterpolatedPoint {

  return {

    bearing: interpolateBearing(prev.bearing, next.bearing, ratio),
    latitude: lerp(prev.latitude, next.latitude, ratio),
    longitude: lerp(prev.longitude, next.longitude, ratio),
    speed: lerp(prev.speed, next.speed, ratio),
    timestamp: interpolateTime(prev.timestamp, next.timestamp, ratio)
  };
}

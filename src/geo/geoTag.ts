/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * geoTag.ts: Conversion of interpolated points into metadata-ready geotag fields.
 */
import type { InterpolatedPoint, Nullable } from "../types/index.js";
import df from "dateformat";
import { normalizeBearing } from "./interpolator.js";

/* EXIF stores GPS coordinates as three unsigned rationals (degrees, minutes, seconds) plus a hemisphere reference letter, and the image direction as one rational plus
 * a reference ('T' for true north). We compute exact numerator/denominator pairs here so the metadata writer never has to round.
 *
 * Seconds are kept to five decimal places, which is about 0.3 mm on the ground. Rounding can carry into the minutes and degrees (59.999996 seconds becomes 60), so the
 * carry is propagated to keep every component in range.
 */

// Seconds are expressed in units of 1/SECONDS_SCALE.
const SECONDS_SCALE = 100000;

// Bearings are expressed in centidegrees.
const BEARING_SCALE = 100;

/**
 * An exact rational as [numerator, denominator].
 */
export type Rational = readonly [number, number];

/**
 * A coordinate magnitude split into rational degrees, minutes and seconds.
 */
export interface DegreesMinutesSeconds {

  readonly degrees: Rational;
  readonly minutes: Rational;
  readonly seconds: Rational;
}

/**
 * The fields a metadata writer needs for one frame.
 */
export interface GeoTag {

  // Image direction in centidegrees relative to true north, or null when the bearing is exactly zero. A zero bearing cannot be told apart from "unknown" in this
  // format, so it is not written.
  readonly bearing: Nullable<{ readonly direction: Rational; readonly reference: "T" }>;

  // The frame's instant.
  readonly captureTime: Date;

  // Capture time in UTC as "YYYY:MM:DD HH:MM:SS".
  readonly dateTimeOriginal: string;

  // Name the tagged frame is stored under. Sorts lexicographically in capture order.
  readonly fileName: string;

  readonly latitude: DegreesMinutesSeconds;

  // Empty on the equator.
  readonly latitudeRef: "" | "N" | "S";

  readonly longitude: DegreesMinutesSeconds;

  // Empty on the prime meridian.
  readonly longitudeRef: "" | "E" | "W";

  // Milliseconds of the capture time as three digits.
  readonly subSecTimeOriginal: string;
}

/**
 * Greatest common divisor of two non-negative integers.
 */
function gcd(a: number, b: number): number {

  let x = a;
  let y = b;

  while(y !== 0) {

    [ x, y ] = [ y, x % y ];
  }

  return x;
}

/**
 * Reduces a fraction to lowest terms. A zero numerator reduces to 0/1.
 * @param numerator - The numerator.
 * @param denominator - The denominator.
 * @returns The reduced rational.
 * @throws RangeError if either part is not a safe integer.
 */
export function reduceRational(numerator: number, denominator: number): Rational {

  if(!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator)) {

    throw new RangeError([ "cannot reduce ", String(numerator), "/", String(denominator) ].join(""));
  }

  if(numerator === 0) {

    return [ 0, 1 ];
  }

  const divisor = gcd(numerator, denominator);

  return [ numerator / divisor, denominator / divisor ];
}

/**
 * Splits the magnitude of a decimal-degree value into whole degrees, whole minutes and seconds with a fractional part.
 * @param value - Decimal degrees. The sign is ignored.
 * @returns The rational components.
 * @throws RangeError if the value is not finite.
 */
export function toDegreesMinutesSeconds(value: number): DegreesMinutesSeconds {

  if(!Number.isFinite(value)) {

    throw new RangeError("coordinate is not a finite number: " + String(value));
  }

  const magnitude = Math.abs(value);
  let degrees = Math.trunc(magnitude);
  const fractionalMinutes = (magnitude - degrees) * 60;
  let minutes = Math.trunc(fractionalMinutes);
  let scaledSeconds = Math.round((fractionalMinutes - minutes) * 60 * SECONDS_SCALE);

  if(scaledSeconds >= (60 * SECONDS_SCALE)) {

    scaledSeconds -= 60 * SECONDS_SCALE;
    minutes++;
  }

  if(minutes >= 60) {

    minutes -= 60;
    degrees++;
  }

  return {

    degrees: [ degrees, 1 ],
    minutes: [ minutes, 1 ],
    seconds: reduceRational(scaledSeconds, SECONDS_SCALE)
  };
}

/**
 * Returns the hemisphere letter for a signed value. Exactly zero has no hemisphere.
 * @param value - Signed decimal degrees.
 * @param negative - Letter for negative values.
 * @param positive - Letter for positive values.
 * @returns The letter, or an empty string for zero.
 */
function hemisphere<N extends string, P extends string>(value: number, negative: N, positive: P): "" | N | P {

  if(value < 0) {

    return negative;
  }

  return (value > 0) ? positive : "";
}

/**
 * Returns the file name a frame captured at the given instant is stored under: frame-YYYY-MM-DD-HH-MM-SS-mmm.jpg in UTC. Every field is fixed width, so names sort in
 * capture order.
 * @param captureTime - The frame's instant.
 * @returns The file name.
 */
export function frameFileName(captureTime: Date): string {

  return [ "frame-", df(captureTime, "yyyy-mm-dd-HH-MM-ss-l", true), ".jpg" ].join("");
}

/**
 * Converts an interpolated point into geotag fields.
 * @param point - The point for one frame.
 * @returns The geotag.
 */
export function buildGeoTag(point: InterpolatedPoint): GeoTag {

  return {

    bearing: (point.bearing === 0) ? null : { direction: [ Math.trunc(normalizeBearing(point.bearing) * BEARING_SCALE), BEARING_SCALE ], reference: "T" },
    captureTime: point.timestamp,
    dateTimeOriginal: df(point.timestamp, "yyyy:mm:dd HH:MM:ss", true),
    fileName: frameFileName(point.timestamp),
    latitude: toDegreesMinutesSeconds(point.latitude),
    latitudeRef: hemisphere(point.latitude, "S", "N"),
    longitude: toDegreesMinutesSeconds(point.longitude),
    longitudeRef: hemisphere(point.longitude, "W", "E"),
    subSecTimeOriginal: df(point.timestamp, "l", true)
  };
}

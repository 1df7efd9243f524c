/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * exif.ts: EXIF metadata writer for tagged frames.
 */
import * as piexif from "piexifjs";
import type { DegreesMinutesSeconds, GeoTag, Rational } from "../geo/geoTag.js";
import { LOG } from "./logger.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/*
 * EXIF LAYOUT
 *
 * piexifjs works on JPEG data held in a binary string and takes the metadata as IFD dictionaries keyed by numeric tag. We write:
 *
 * GPS IFD:  0 GPSVersionID, 1/2 latitude reference and value, 3/4 longitude reference and value, 16/17 image direction reference and value.
 * Exif IFD: 36867 DateTimeOriginal, 37521 SubSecTimeOriginal.
 *
 * Both times are UTC. An empty hemisphere reference (a coordinate of exactly zero) leaves that reference tag out.
 */

const GPS_VERSION_ID = 0;
const GPS_LATITUDE_REF = 1;
const GPS_LATITUDE = 2;
const GPS_LONGITUDE_REF = 3;
const GPS_LONGITUDE = 4;
const GPS_IMG_DIRECTION_REF = 16;
const GPS_IMG_DIRECTION = 17;

const EXIF_DATE_TIME_ORIGINAL = 36867;
const EXIF_SUB_SEC_TIME_ORIGINAL = 37521;

/**
 * A value in an IFD dictionary: ASCII, a byte list, one rational or a list of rationals.
 */
export type ExifValue = string | number[] | number[][];

/**
 * The IFD dictionaries written for one frame.
 */
export interface ExifObject {

  "0th": Record<string, ExifValue>;
  Exif: Record<string, ExifValue>;
  GPS: Record<string, ExifValue>;
}

/**
 * Copies a rational into the mutable pair piexifjs expects.
 */
function pair(rational: Rational): number[] {

  return [ rational[0], rational[1] ];
}

/**
 * Returns the three rationals of a coordinate.
 */
function coordinate(value: DegreesMinutesSeconds): number[][] {

  return [ pair(value.degrees), pair(value.minutes), pair(value.seconds) ];
}

/**
 * Builds the EXIF dictionaries for a geotag.
 * @param tag - The frame's geotag.
 * @returns The IFD dictionaries.
 */
export function buildExifObject(tag: GeoTag): ExifObject {

  const gps: Record<string, ExifValue> = {

    [GPS_VERSION_ID]: [ 2, 0, 0, 0 ],
    [GPS_LATITUDE]: coordinate(tag.latitude),
    [GPS_LONGITUDE]: coordinate(tag.longitude)
  };

  if(tag.latitudeRef) {

    gps[GPS_LATITUDE_REF] = tag.latitudeRef;
  }

  if(tag.longitudeRef) {

    gps[GPS_LONGITUDE_REF] = tag.longitudeRef;
  }

  if(tag.bearing) {

    gps[GPS_IMG_DIRECTION_REF] = tag.bearing.reference;
    gps[GPS_IMG_DIRECTION] = pair(tag.bearing.direction);
  }

  return {

    "0th": {},
    Exif: {

      [EXIF_DATE_TIME_ORIGINAL]: tag.dateTimeOriginal,
      [EXIF_SUB_SEC_TIME_ORIGINAL]: tag.subSecTimeOriginal
    },
    GPS: gps
  };
}

/**
 * Returns JPEG data with the geotag's EXIF block inserted, replacing any existing one.
 * @param jpeg - The JPEG file contents.
 * @param tag - The frame's geotag.
 * @returns The tagged JPEG.
 * @throws If the data is not a JPEG.
 */
export function embedGeoTag(jpeg: Buffer, tag: GeoTag): Buffer {

  const exifBytes = piexif.dump(buildExifObject(tag));

  return Buffer.from(piexif.insert(exifBytes, jpeg.toString("binary")), "binary");
}

/**
 * Writes a geotag into a JPEG file in place.
 * @param imagePath - The JPEG to tag.
 * @param tag - The frame's geotag.
 */
export async function writeGeoTag(imagePath: string, tag: GeoTag): Promise<void> {

  const jpeg = await fsPromises.readFile(imagePath);

  await fsPromises.writeFile(imagePath, embedGeoTag(jpeg, tag));

  LOG.debug("pipeline:exif", "Tagged %s with %s.", imagePath, tag.dateTimeOriginal);
}

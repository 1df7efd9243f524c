/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * gpx.ts: GPX 1.0 track export.
 */
import type { GpsSample, Track } from "../types/index.js";
import { LOG, escapeXml, formatCount } from "../utils/index.js";
import df from "dateformat";
import fs from "node:fs";
import { trackSamples } from "./filters.js";

const { promises: fsPromises } = fs;

/* One <trkpt> per decoded sample, in slot order. Empty slots are left out, so the track is continuous even where the receiver lost its fix. Speed (m/s) and bearing
 * (degrees) use the GPX 1.0 <speed> and <course> elements.
 */

/**
 * Renders one track point.
 */
function renderPoint(sample: GpsSample): string {

  return [

    "\t\t<trkpt lat=\"", sample.latitude.toFixed(6), "\" lon=\"", sample.longitude.toFixed(6), "\">",
    "<time>", df(sample.timestamp, "isoUtcDateTime"), "</time>",
    "<course>", sample.bearing.toFixed(6), "</course>",
    "<speed>", sample.speed.toFixed(6), "</speed>",
    "</trkpt>\n"
  ].join("");
}

/**
 * Renders a track as a GPX 1.0 document.
 * @param track - The track.
 * @param name - Name for the document and its track, normally the video's file name.
 * @returns The GPX document.
 */
export function renderGpx(track: Track, name: string): string {

  const escapedName = escapeXml(name);

  return [

    "<?xml version=\"1.0\" encoding=\"UTF-8\"?>\n",
    "<gpx version=\"1.0\"\n",
    "\tcreator=\"dashgeo\"\n",
    "\txmlns:xsi=\"http://www.w3.org/2001/XMLSchema-instance\"\n",
    "\txmlns=\"http://www.topografix.com/GPX/1/0\"\n",
    "\txsi:schemaLocation=\"http://www.topografix.com/GPX/1/0 http://www.topografix.com/GPX/1/0/gpx.xsd\">\n",
    "\t<name>", escapedName, "</name>\n",
    "\t<trk><name>", escapedName, "</name><trkseg>\n",
    ...trackSamples(track).map(renderPoint),
    "\t</trkseg></trk>\n",
    "</gpx>\n"
  ].join("");
}

/**
 * Writes a track to a GPX file.
 * @param track - The track.
 * @param filePath - Destination file.
 * @param name - Name for the document and its track.
 * @throws If the file cannot be written.
 */
export async function writeGpx(track: Track, filePath: string, name: string): Promise<void> {

  await fsPromises.writeFile(filePath, renderGpx(track, name), "utf-8");

  LOG.debug("pipeline:gpx", "Wrote %s to %s.", formatCount(trackSamples(track).length, "track point"), filePath);
}

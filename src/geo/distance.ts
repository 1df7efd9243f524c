/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * distance.ts: Great-circle distance between coordinates.
 */

// Mean Earth radius in meters.
const EARTH_RADIUS_METERS = 6371000;

/**
 * Converts degrees to radians.
 */
function toRadians(degrees: number): number {

  return (degrees * Math.PI) / 180;
}

/**
 * Haversine distance between two points given in decimal degrees.
 * @param lat1 - Latitude of the first point.
 * @param lon1 - Longitude of the first point.
 * @param lat2 - Latitude of the second point.
 * @param lon2 - Longitude of the second point.
 * @returns Distance in meters.
 */
export function haversineDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {

  const phi1 = toRadians(lat1);
  const phi2 = toRadians(lat2);
  const deltaPhi = toRadians(lat2 - lat1);
  const deltaLambda = toRadians(lon2 - lon1);

  const a = (Math.sin(deltaPhi / 2) ** 2) + (Math.cos(phi1) * Math.cos(phi2) * (Math.sin(deltaLambda / 2) ** 2));

  return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/**
 * Geo Distance Scorer
 *
 * Great-circle distance with a piecewise-linear decay: full score within
 * 5 km, falling linearly to zero at 150 km.
 */

import type { GeoPoint } from "@shared/schema";

export const EARTH_RADIUS_KM = 6371.2;
export const FULL_SCORE_RADIUS_KM = 5;
export const ZERO_SCORE_RADIUS_KM = 150;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

function isValidPoint(point: GeoPoint | undefined): point is GeoPoint {
  return (
    point !== undefined &&
    Number.isFinite(point.lat) &&
    Number.isFinite(point.lon) &&
    Math.abs(point.lat) <= 90 &&
    Math.abs(point.lon) <= 180
  );
}

/**
 * Haversine distance in kilometers, or null when either point is missing
 */
export function haversineKm(a: GeoPoint | undefined, b: GeoPoint | undefined): number | null {
  if (!isValidPoint(a) || !isValidPoint(b)) {
    return null;
  }

  const dLat = toRadians(b.lat - a.lat);
  const dLon = toRadians(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLon / 2) ** 2;

  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function distanceScore(km: number): number {
  if (km <= FULL_SCORE_RADIUS_KM) {
    return 1;
  }
  if (km >= ZERO_SCORE_RADIUS_KM) {
    return 0;
  }
  return 1 - (km - FULL_SCORE_RADIUS_KM) / (ZERO_SCORE_RADIUS_KM - FULL_SCORE_RADIUS_KM);
}

export interface DistanceComponent {
  km: number;
  score: number;
}

/**
 * Distance and its score, or null (component omitted) when a coordinate is absent
 */
export function scoreDistance(
  a: GeoPoint | undefined,
  b: GeoPoint | undefined
): DistanceComponent | null {
  const km = haversineKm(a, b);
  if (km === null) {
    return null;
  }
  return { km, score: distanceScore(km) };
}

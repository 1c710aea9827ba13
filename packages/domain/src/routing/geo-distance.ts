import type { Location } from '../entities/location.js';

export const EARTH_RADIUS_KM = 6371.0;

const toRadians = (degrees: number): number => degrees * (Math.PI / 180);

/**
 * Great-circle distance in kilometres (haversine, spherical Earth).
 *
 * Symmetric, never negative, and exactly 0 for identical coordinates.
 */
export function distanceKm(a: Location, b: Location): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLon = toRadians(b.lon - a.lon);

  const raw =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLon / 2) ** 2;
  // rounding can push h a hair outside [0, 1]
  const h = Math.min(1, Math.max(0, raw));

  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Great-circle distance between coordinates, in the kilometre unit used for
 * connection distances.
 */

import type { Coordinate } from "@linehop/types";

const EARTH_RADIUS_KM = 6371;

/**
 * Haversine distance between two coordinates in kilometers.
 */
export function haversineDistanceKm(a: Coordinate, b: Coordinate): number {
  const toRad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * toRad;
  const dLng = (b.lng - a.lng) * toRad;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * toRad) * Math.cos(b.lat * toRad) * sinHalfLng * sinHalfLng;
  // Rounding can push h a hair above 1 for antipodal points
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(Math.min(1, h)));
}

/**
 * Geographic utility types.
 */

/** Geographic coordinate (WGS84) */
export interface Coordinate {
  lat: number;
  lng: number;
}

import type { GeoPoint } from "../domain/GeoPoint";

export const EARTH_RADIUS_MILES = 3958.8;
export const METERS_PER_MILE = 1609.344;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

// Great-circle distance (haversine) in miles.
// Inputs are degrees; callers guarantee finite values.
export function distanceMiles(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const phi1 = toRadians(lat1);
  const phi2 = toRadians(lat2);
  const dPhi = toRadians(lat2 - lat1);
  const dLambda = toRadians(lon2 - lon1);

  const a =
    Math.sin(dPhi / 2) ** 2 +
    Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;

  // Clamp: rounding can push `a` a hair above 1 for near-antipodal points.
  return 2 * EARTH_RADIUS_MILES * Math.asin(Math.sqrt(Math.min(1, a)));
}

export function distanceBetween(a: GeoPoint, b: GeoPoint): number {
  return distanceMiles(a.lat, a.lng, b.lat, b.lng);
}

export function milesToMeters(miles: number): number {
  return Math.round(miles * METERS_PER_MILE);
}

export function roundToTenth(miles: number): number {
  return Math.round(miles * 10) / 10;
}

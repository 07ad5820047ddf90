// A point on the globe in decimal degrees.
// Constructed only from finite numbers; the geocoder rejects anything else.
export type GeoPoint = Readonly<{ lat: number; lng: number }>;

export type PostalLookup = Readonly<{
  point: GeoPoint;

  // Two-letter state code. May be empty when the lookup could not infer one.
  regionCode: string;
}>;

export function isFiniteGeoPoint(value: { lat?: unknown; lng?: unknown } | undefined): value is GeoPoint {
  if (!value) return false;
  const { lat, lng } = value;
  return typeof lat === "number" && Number.isFinite(lat) && typeof lng === "number" && Number.isFinite(lng);
}

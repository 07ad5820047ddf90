import { describeError } from "../domain/Errors";
import { isFiniteGeoPoint, type PostalLookup } from "../domain/GeoPoint";
import { TtlCache, type Cache } from "./TtlCache";

// External geocoding boundary: postal code -> coordinates + region code.
// Implementations may throw on transport failure; ZipGeocoder absorbs it.
export type GeocodeRecord = Readonly<{
  latitude: number;
  longitude: number;
  regionCode?: string | null;
}>;

export interface GeocodingService {
  lookup(postalCode: string): Promise<GeocodeRecord | null>;
}

// Asks each service in turn; the first record wins. A throw from any of them propagates.
export class ChainedGeocodingService implements GeocodingService {
  constructor(private readonly services: readonly GeocodingService[]) {}

  async lookup(postalCode: string): Promise<GeocodeRecord | null> {
    for (const service of this.services) {
      const record = await service.lookup(postalCode);
      if (record) return record;
    }
    return null;
  }
}

const ZIP_PATTERN = /^\s*(\d{5})(?:-\d{4})?\s*$/;

// "33351", " 33351-1234 " -> "33351"; anything else -> null.
export function normalizeZip(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const m = ZIP_PATTERN.exec(raw);
  return m ? m[1] : null;
}

export const DEFAULT_GEOCODE_TTL_MS = 15 * 60 * 1000;

export class ZipGeocoder {
  constructor(
    private readonly service: GeocodingService,
    // `null` entries record genuine misses.
    private readonly cache: Cache<PostalLookup | null> = new TtlCache<PostalLookup | null>(DEFAULT_GEOCODE_TTL_MS),
  ) {}

  // Expects an already-normalized five-digit code. Never throws.
  async resolve(postalCode: string): Promise<PostalLookup | null> {
    const hit = this.cache.get(postalCode);
    if (hit !== undefined) return hit;

    let record: GeocodeRecord | null;
    try {
      record = await this.service.lookup(postalCode);
    } catch (err) {
      // Not cached: a transport failure may clear up on the next attempt.
      console.warn(`[Geocoder] Lookup failed for ${postalCode}:`, describeError(err));
      return null;
    }

    const point = record ? { lat: record.latitude, lng: record.longitude } : undefined;
    const result: PostalLookup | null =
      record && isFiniteGeoPoint(point)
        ? { point, regionCode: (record.regionCode ?? "").trim() }
        : null;

    return this.cache.setIfAbsent(postalCode, result);
  }
}

/*
Maps client
- Thin wrapper around the Places Nearby Search, Place Details and Geocoding HTTP endpoints.
- No ranking and no distance logic here; callers own both.
- Every call has a hard timeout; expiry surfaces as a rejected promise.
*/

import type { GeoPoint } from "../domain/GeoPoint";
import type { Page } from "./Pagination";
import {
  GeocodeResponseSchema,
  PlaceDetailsResponseSchema,
  PlacesNearbyResponseSchema,
  type PlaceDetails,
  type PlacesResult,
} from "./RawRecords";
import type { GeocodeRecord, GeocodingService } from "./ZipGeocoder";

const PLACES_NEARBY_URL = "https://maps.googleapis.com/maps/api/place/nearbysearch/json";
const PLACE_DETAILS_URL = "https://maps.googleapis.com/maps/api/place/details/json";
const GEOCODE_URL = "https://maps.googleapis.com/maps/api/geocode/json";

const DETAILS_FIELDS = [
  "name",
  "formatted_address",
  "formatted_phone_number",
  "geometry/location",
  "opening_hours",
  "current_opening_hours",
  "website",
  "url",
];

// Statuses that mean "the request worked", even if nothing matched.
const OK_STATUSES = new Set(["OK", "ZERO_RESULTS"]);

export type FetchLike = (
  input: string,
  init?: { method?: string; headers?: Record<string, string>; body?: string; signal?: AbortSignal },
) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}>;

export type NearbySearchParams = Readonly<{
  location: GeoPoint;
  radiusMeters: number;
  keyword?: string;

  // Places type bucket, e.g. "health" or "pharmacy".
  type?: string;
  pageToken?: string;
}>;

export type NearbySearchPage = Page<PlacesResult> & Readonly<{ status?: string }>;

function assertFiniteNumber(value: unknown, label: string): asserts value is number {
  if (typeof value !== "number" || !Number.isFinite(value)) throw new Error(`${label} must be a finite number.`);
}

// The HTTP call succeeded but the API answered with a non-OK status (INVALID_REQUEST, OVER_QUERY_LIMIT, ...).
export class UpstreamStatusError extends Error {
  constructor(
    readonly api: string,
    readonly status: string,
    detail?: string,
  ) {
    super(`${api} returned ${status}${detail ? `: ${detail}` : ""}`);
    this.name = "UpstreamStatusError";
  }
}

function assertUpstreamStatus(api: string, status: string | undefined, message: string | undefined): void {
  if (status && !OK_STATUSES.has(status)) {
    throw new UpstreamStatusError(api, status, message);
  }
}

function buildNearbySearchUrl(apiKey: string, params: NearbySearchParams): string {
  const query = new URLSearchParams();
  query.set("key", apiKey);
  query.set("location", `${params.location.lat},${params.location.lng}`);
  query.set("radius", String(params.radiusMeters));
  if (params.type) query.set("type", params.type);
  if (params.keyword) query.set("keyword", params.keyword);
  if (params.pageToken) query.set("pagetoken", params.pageToken);
  return `${PLACES_NEARBY_URL}?${query.toString()}`;
}

export class GoogleMapsClient implements GeocodingService {
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: { apiKey?: string; fetchImpl?: FetchLike; timeoutMs?: number }) {
    if (!options.apiKey) {
      throw new Error("Missing Google Maps API key. Set GOOGLE_MAPS_API_KEY in your environment (.env).");
    }
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  private async getJson(url: string, api: string): Promise<unknown> {
    const resp = await this.fetchImpl(url, { method: "GET", signal: AbortSignal.timeout(this.timeoutMs) });
    if (!resp.ok) {
      throw new Error(`${api} request failed: HTTP ${resp.status}`);
    }
    return resp.json();
  }

  async nearbySearch(params: NearbySearchParams): Promise<NearbySearchPage> {
    assertFiniteNumber(params.location.lat, "location.lat");
    assertFiniteNumber(params.location.lng, "location.lng");
    assertFiniteNumber(params.radiusMeters, "radiusMeters");

    const raw = await this.getJson(buildNearbySearchUrl(this.apiKey, params), "Places nearby search");
    const parsed = PlacesNearbyResponseSchema.parse(raw);
    assertUpstreamStatus("Places nearby search", parsed.status, parsed.error_message);

    // Upstream order is preserved; ranking happens downstream.
    return {
      items: parsed.results ?? [],
      nextToken: parsed.next_page_token || undefined,
      status: parsed.status,
    };
  }

  async placeDetails(placeId: string): Promise<PlaceDetails> {
    if (!placeId.trim()) throw new Error("placeId must be a non-empty string.");

    const query = new URLSearchParams({ key: this.apiKey, place_id: placeId, fields: DETAILS_FIELDS.join(",") });
    const raw = await this.getJson(`${PLACE_DETAILS_URL}?${query.toString()}`, "Place details");
    const parsed = PlaceDetailsResponseSchema.parse(raw);
    assertUpstreamStatus("Place details", parsed.status, parsed.error_message);

    return parsed.result ?? {};
  }

  async lookup(postalCode: string): Promise<GeocodeRecord | null> {
    const query = new URLSearchParams({ key: this.apiKey, components: `postal_code:${postalCode}|country:US` });
    const raw = await this.getJson(`${GEOCODE_URL}?${query.toString()}`, "Geocoding");
    const parsed = GeocodeResponseSchema.parse(raw);
    assertUpstreamStatus("Geocoding", parsed.status, parsed.error_message);

    const first = parsed.results?.[0];
    const location = first?.geometry?.location;
    if (!first || !location || location.lat === undefined || location.lng === undefined) return null;

    const state = (first.address_components ?? []).find((c) => c.types?.includes("administrative_area_level_1"));

    return {
      latitude: location.lat,
      longitude: location.lng,
      regionCode: state?.short_name ?? "",
    };
  }
}

import { describeError, SourceUnavailableError } from "../domain/Errors";
import type { GeoPoint } from "../domain/GeoPoint";
import type { SourceId } from "../domain/Search";
import { milesToMeters } from "./Distance";
import { UpstreamStatusError, type GoogleMapsClient } from "./MapsClient";
import { collectPages, type Sleep } from "./Pagination";
import type { RawRecord } from "./RawRecords";
import type { EnumerationType, RegistryClient } from "./RegistryClient";
import { specializationToQueryTerm } from "./SpecializationQueryMap";

// A search source turns (region, origin, query) into raw upstream records.
// - Sources never filter by distance; the orchestrator owns that.
// - Any upstream failure leaves as SourceUnavailableError tagged with the source id.

export type SourceQuery = Readonly<{
  region: string;
  origin: GeoPoint;
  radiusMiles: number;
  queryText: string;
}>;

export interface SearchSource {
  readonly id: SourceId;

  // Identifies the upstream request for the raw-result cache.
  cacheKey(query: SourceQuery): string;

  fetch(query: SourceQuery): Promise<readonly RawRecord[]>;
}

async function guard<T>(sourceId: SourceId, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (err instanceof SourceUnavailableError) throw err;
    throw new SourceUnavailableError(sourceId, describeError(err), { cause: err });
  }
}

export class RegistrySource implements SearchSource {
  constructor(
    readonly id: Extract<SourceId, "registry-individual" | "registry-organization">,
    private readonly client: RegistryClient,
    private readonly limit = 1200,
  ) {}

  private get enumerationType(): EnumerationType {
    return this.id === "registry-individual" ? "NPI-1" : "NPI-2";
  }

  cacheKey(query: SourceQuery): string {
    return `${this.id}|${query.region.toUpperCase()}|${query.queryText.trim().toLowerCase()}`;
  }

  async fetch(query: SourceQuery): Promise<readonly RawRecord[]> {
    const results = await guard(this.id, () =>
      this.client.search({
        regionCode: query.region,
        taxonomyDescription: query.queryText.trim(),
        enumerationType: this.enumerationType,
        limit: this.limit,
      }),
    );

    return results.map((record): RawRecord => ({ kind: "registry", source: this.id, record }));
  }
}

// Nearby Search rejects radii above 50 km.
const MAX_PLACES_RADIUS_METERS = 50_000;

function placesRadiusMeters(radiusMiles: number): number {
  return Math.min(milesToMeters(radiusMiles), MAX_PLACES_RADIUS_METERS);
}

export type PlacesSourceOptions = Readonly<{
  // Places type bucket ("health", "pharmacy", "doctor").
  type?: string;

  // Fixed keyword; when absent the query text is mapped to a neutral search term.
  keyword?: string;

  maxPages: number;
  pageDelayMs: number;
  sleep?: Sleep;
}>;

export class PlacesSource implements SearchSource {
  constructor(
    readonly id: Extract<SourceId, "places-doctor" | "places-lab" | "places-pharmacy">,
    private readonly client: Pick<GoogleMapsClient, "nearbySearch">,
    private readonly options: PlacesSourceOptions,
  ) {}

  private keywordFor(query: SourceQuery): string | undefined {
    if (this.options.keyword) return this.options.keyword;
    return query.queryText.trim() ? specializationToQueryTerm(query.queryText) : undefined;
  }

  cacheKey(query: SourceQuery): string {
    const { lat, lng } = query.origin;
    return `${this.id}|${lat.toFixed(4)},${lng.toFixed(4)}|${placesRadiusMeters(query.radiusMiles)}|${this.keywordFor(query) ?? ""}`;
  }

  async fetch(query: SourceQuery): Promise<readonly RawRecord[]> {
    const keyword = this.keywordFor(query);
    const radiusMeters = placesRadiusMeters(query.radiusMiles);

    const results = await guard(this.id, () =>
      collectPages({
        fetchPage: (pageToken) =>
          this.client.nearbySearch({
            location: query.origin,
            radiusMeters,
            type: this.options.type,
            keyword,
            pageToken,
          }),
        maxPages: this.options.maxPages,
        delayMs: this.options.pageDelayMs,
        sleep: this.options.sleep,
        // A stale or premature next_page_token comes back as INVALID_REQUEST.
        endsChain: (err) => {
          if (!(err instanceof UpstreamStatusError)) return false;
          console.warn(`[Search] ${this.id}: stopped paging after ${err.status}; keeping earlier pages.`);
          return true;
        },
      }),
    );

    return results.map((record): RawRecord => ({ kind: "places", source: this.id, record }));
  }
}

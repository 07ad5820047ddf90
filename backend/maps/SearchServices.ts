import type { AppConfig } from "../config";
import type { PostalLookup } from "../domain/GeoPoint";
import { FacilityFinder } from "./FacilityFinder";
import { GoogleMapsClient, type FetchLike } from "./MapsClient";
import { OfflineZipDataset } from "./OfflineZipDataset";
import type { Sleep } from "./Pagination";
import { RadiusSearchOrchestrator } from "./RadiusSearch";
import type { RawRecord } from "./RawRecords";
import { RegistryClient } from "./RegistryClient";
import { ResultNormalizer } from "./ResultNormalizer";
import { PlacesSource, RegistrySource, type SearchSource } from "./SearchSources";
import { TtlCache } from "./TtlCache";
import { ChainedGeocodingService, ZipGeocoder, type GeocodingService } from "./ZipGeocoder";

// Composition root for the search subsystem.
// The only place that decides which upstreams exist and how they are cached.

export type SearchServices = Readonly<{
  geocoder: ZipGeocoder;
  orchestrator: RadiusSearchOrchestrator;
  facilities: FacilityFinder;
}>;

const missingMapsKey: Pick<GoogleMapsClient, "placeDetails" | "nearbySearch"> = {
  async placeDetails() {
    throw new Error("Place details unavailable: GOOGLE_MAPS_API_KEY is not set.");
  },
  async nearbySearch() {
    throw new Error("Places search unavailable: GOOGLE_MAPS_API_KEY is not set.");
  },
};

export function createSearchServices(
  config: AppConfig,
  overrides: { fetchImpl?: FetchLike; sleep?: Sleep; geocoding?: GeocodingService } = {},
): SearchServices {
  const google = config.maps.googleApiKey
    ? new GoogleMapsClient({ apiKey: config.maps.googleApiKey, fetchImpl: overrides.fetchImpl })
    : undefined;
  const maps = google ?? missingMapsKey;

  if (!google) {
    console.warn("[Search] GOOGLE_MAPS_API_KEY not set: places sources are disabled.");
  }

  // The offline dataset answers almost every ZIP; Google only sees the ones it lacks.
  const geocoding =
    overrides.geocoding ??
    (google ? new ChainedGeocodingService([new OfflineZipDataset(), google]) : new OfflineZipDataset());
  const geocoder = new ZipGeocoder(geocoding, new TtlCache<PostalLookup | null>(config.search.geocodeCacheTtlMs));
  const registry = new RegistryClient({ baseUrl: config.maps.registryUrl, fetchImpl: overrides.fetchImpl });

  const placesOptions = {
    maxPages: config.search.placesMaxPages,
    pageDelayMs: config.search.placesPageDelayMs,
    sleep: overrides.sleep,
  };

  const sources: SearchSource[] = [
    new RegistrySource("registry-individual", registry),
    new RegistrySource("registry-organization", registry),
    new PlacesSource("places-lab", maps, { ...placesOptions, type: "health", keyword: "laboratory" }),
    new PlacesSource("places-pharmacy", maps, { ...placesOptions, type: "pharmacy" }),
  ];
  if (google) {
    sources.push(new PlacesSource("places-doctor", maps, { ...placesOptions, type: "doctor" }));
  }

  const orchestrator = new RadiusSearchOrchestrator({
    geocoder,
    normalizer: new ResultNormalizer(geocoder),
    sources,
    cache: new TtlCache<readonly RawRecord[]>(config.search.searchCacheTtlMs),
  });

  return {
    geocoder,
    orchestrator,
    facilities: new FacilityFinder(orchestrator, maps),
  };
}

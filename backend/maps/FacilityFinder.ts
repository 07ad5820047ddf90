import type { Candidate } from "../domain/Candidate";
import { describeError } from "../domain/Errors";
import type { SearchMeta, SourceId } from "../domain/Search";
import type { GoogleMapsClient } from "./MapsClient";
import { isOpen24Hours } from "./OpeningHours";
import type { RadiusSearchOrchestrator } from "./RadiusSearch";
import { sortCandidates } from "./RadiusSearch";
import type { PlaceDetails } from "./RawRecords";

// Labs / pharmacies nearby
// - Nearby search through the orchestrator, then Place Details for the nearest slice only.
// - A failed details call degrades to "no details" for that facility.
// - Enrichment builds new candidates; nothing is edited in place.

export type FacilityKind = "lab" | "pharmacy";

export const FACILITY_SOURCES: Readonly<Record<FacilityKind, SourceId>> = {
  lab: "places-lab",
  pharmacy: "places-pharmacy",
};

export const HOW_MANY_CHOICES = [5, 10, 15, 20, 30, 50] as const;
export type HowMany = (typeof HOW_MANY_CHOICES)[number];

export type FacilitySearchParams = Readonly<{
  kind: FacilityKind;
  zip: string;
  radiusMiles: number;
  howMany: HowMany;
}>;

export type FacilityViews = Readonly<{
  all: readonly Candidate[];
  openNow: readonly Candidate[];
  open24Hours: readonly Candidate[];
}>;

export type FacilitySearchResult = Readonly<{
  views: FacilityViews;
  meta: SearchMeta;
}>;

// Overfetch details so each view still has enough entries after filtering.
export function detailsBudget(available: number, howMany: number): number {
  return Math.min(available, Math.max(howMany * 2, howMany + 10));
}

export function telLink(phone: string): string {
  const digits = phone.replace(/[^\d+]/g, "");
  return digits ? `tel:${digits}` : "";
}

export function enrichWithDetails(candidate: Candidate, details: PlaceDetails): Candidate {
  const hours = details.current_opening_hours ?? details.opening_hours;
  const phone = (details.formatted_phone_number ?? "").trim();
  const weekdayText = hours?.weekday_text ?? [];
  const openNow = hours?.open_now ?? candidate.extra.openNow;

  return {
    ...candidate,
    address: details.formatted_address?.trim() || candidate.address,
    phone,
    extra: {
      ...candidate.extra,
      ...(openNow !== undefined ? { openNow } : {}),
      website: details.website ?? "",
      weekdayText,
      open24Hours: isOpen24Hours({ weekday_text: weekdayText, periods: hours?.periods ?? [] }),
      mapsUrl: details.url || candidate.extra.mapsUrl,
      phoneTel: telLink(phone),
    },
  };
}

export class FacilityFinder {
  constructor(
    private readonly orchestrator: RadiusSearchOrchestrator,
    private readonly maps: Pick<GoogleMapsClient, "placeDetails">,
  ) {}

  private async detailsFor(placeId: string): Promise<PlaceDetails> {
    if (!placeId) return {};
    try {
      return await this.maps.placeDetails(placeId);
    } catch (err) {
      console.warn(`[Facilities] Place details failed for ${placeId}:`, describeError(err));
      return {};
    }
  }

  async find(params: FacilitySearchParams): Promise<FacilitySearchResult> {
    const result = await this.orchestrator.search({
      originZip: params.zip,
      radiusMiles: params.radiusMiles,
      queryText: params.kind === "lab" ? "laboratory" : "pharmacy",
      sourcePreference: [FACILITY_SOURCES[params.kind]],
    });

    // Facilities without a resolvable location cannot be placed on the list.
    const located = sortCandidates(result.candidates.filter((c) => c.distanceMiles !== undefined));
    const picked = located.slice(0, detailsBudget(located.length, params.howMany));

    const enriched: Candidate[] = [];
    for (const candidate of picked) {
      enriched.push(enrichWithDetails(candidate, await this.detailsFor(candidate.id)));
    }

    return {
      views: {
        all: enriched.slice(0, params.howMany),
        openNow: enriched.filter((c) => c.extra.openNow === true).slice(0, params.howMany),
        open24Hours: enriched.filter((c) => c.extra.open24Hours === true).slice(0, params.howMany),
      },
      meta: result.meta,
    };
  }
}

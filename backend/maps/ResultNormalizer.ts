import type { Candidate } from "../domain/Candidate";
import { isFiniteGeoPoint, type GeoPoint } from "../domain/GeoPoint";
import type { SourceId } from "../domain/Search";
import { distanceBetween, roundToTenth } from "./Distance";
import type {
  PlacesRawRecord,
  RawRecord,
  RegistryAddress,
  RegistryRawRecord,
  RegistryTaxonomy,
} from "./RawRecords";
import type { ZipGeocoder } from "./ZipGeocoder";

// Result normalization
// - One extraction function per upstream shape; the switch over `kind` is exhaustive.
// - Total: missing nested fields become "" or an absent distance, never an exception.

const PLACEHOLDER_NAMES: Readonly<Record<SourceId, string>> = {
  "registry-individual": "(Provider)",
  "registry-organization": "(Provider)",
  "places-doctor": "(Provider)",
  "places-lab": "(Lab)",
  "places-pharmacy": "(Pharmacy)",
};

// Place types that say nothing about what the facility is.
const GENERIC_PLACE_TYPES = new Set(["point_of_interest", "establishment", "health"]);

// "..., FL 33351" or "..., FL 33351-1234"
const ADDRESS_ZIP_PATTERN = /\b[A-Z]{2}\s+(\d{5})(?:-\d{4})?\b/;

function text(value: string | undefined): string {
  return (value ?? "").trim();
}

export function zip5(value: string | undefined): string {
  return text(value).slice(0, 5);
}

export function pickRegistryAddress(addresses: readonly RegistryAddress[]): RegistryAddress {
  return addresses.find((a) => text(a.address_purpose).toLowerCase() === "location") ?? addresses[0] ?? {};
}

export function pickPrimaryTaxonomy(taxonomies: readonly RegistryTaxonomy[]): RegistryTaxonomy | undefined {
  return taxonomies.find((t) => t.primary === true) ?? taxonomies[0];
}

export function formatAddress(parts: {
  line1?: string;
  line2?: string;
  city?: string;
  state?: string;
  postalCode?: string;
}): string {
  const street = [text(parts.line1), text(parts.line2)].filter(Boolean).join(" ");
  const stateZip = [text(parts.state), text(parts.postalCode)].filter(Boolean).join(" ");
  return [street, text(parts.city), stateZip].filter(Boolean).join(", ");
}

function humanizePlaceType(type: string): string {
  const words = type.replace(/_/g, " ");
  return words.charAt(0).toUpperCase() + words.slice(1);
}

export function mapsUrlFor(placeId: string, name: string): string {
  if (placeId) return `https://www.google.com/maps/place/?q=place_id:${placeId}`;
  return `https://www.google.com/maps/search/?${new URLSearchParams({ api: "1", query: name }).toString()}`;
}

export class ResultNormalizer {
  constructor(private readonly geocoder: ZipGeocoder) {}

  async normalize(raw: RawRecord, origin: GeoPoint): Promise<Candidate> {
    switch (raw.kind) {
      case "registry":
        return this.fromRegistry(raw, origin);
      case "places":
        return this.fromPlaces(raw, origin);
    }
  }

  async normalizeAll(raws: readonly RawRecord[], origin: GeoPoint): Promise<Candidate[]> {
    // Sequential: later records reuse ZIP lookups cached by earlier ones.
    const out: Candidate[] = [];
    for (const raw of raws) out.push(await this.normalize(raw, origin));
    return out;
  }

  private async distanceToPostalCode(postalCode: string, origin: GeoPoint): Promise<number | undefined> {
    if (!/^\d{5}$/.test(postalCode)) return undefined;
    const lookup = await this.geocoder.resolve(postalCode);
    return lookup ? roundToTenth(distanceBetween(origin, lookup.point)) : undefined;
  }

  private async fromRegistry(raw: RegistryRawRecord, origin: GeoPoint): Promise<Candidate> {
    const rec = raw.record;
    const basic = rec.basic ?? {};
    const addresses = rec.addresses ?? [];

    const location = pickRegistryAddress(addresses);
    const postalCode = zip5(location.postal_code);

    const phone =
      text(location.telephone_number) ||
      text(addresses.find((a) => text(a.telephone_number))?.telephone_number);

    const taxonomy = pickPrimaryTaxonomy(rec.taxonomies ?? []);

    const personName = `${text(basic.first_name)} ${text(basic.last_name)}`.trim();
    const displayName = personName || text(basic.organization_name) || PLACEHOLDER_NAMES[raw.source];

    return {
      id: text(rec.number),
      displayName,
      category: text(taxonomy?.desc) || text(taxonomy?.code),
      phone,
      address: formatAddress({
        line1: location.address_1,
        line2: location.address_2,
        city: location.city,
        state: location.state,
        postalCode,
      }),
      postalCode,
      distanceMiles: await this.distanceToPostalCode(postalCode, origin),
      source: raw.source,
      extra: {},
    };
  }

  private async fromPlaces(raw: PlacesRawRecord, origin: GeoPoint): Promise<Candidate> {
    const rec = raw.record;
    const id = text(rec.place_id);
    const displayName = text(rec.name) || PLACEHOLDER_NAMES[raw.source];
    const address = text(rec.vicinity) || text(rec.formatted_address);
    const postalCode = ADDRESS_ZIP_PATTERN.exec(address)?.[1] ?? "";

    const categoryType = (rec.types ?? []).find((t) => !GENERIC_PLACE_TYPES.has(t));

    const loc = rec.geometry?.location;
    let distanceMiles: number | undefined;
    if (isFiniteGeoPoint(loc)) {
      distanceMiles = roundToTenth(distanceBetween(origin, loc));
    } else {
      distanceMiles = await this.distanceToPostalCode(postalCode, origin);
    }

    const openNow = rec.opening_hours?.open_now;

    return {
      id,
      displayName,
      category: categoryType ? humanizePlaceType(categoryType) : "",
      phone: "",
      address,
      postalCode,
      distanceMiles,
      source: raw.source,
      extra: {
        ...(openNow !== undefined ? { openNow } : {}),
        mapsUrl: mapsUrlFor(id, displayName),
      },
    };
  }
}

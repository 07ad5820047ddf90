import { z } from "zod";
import type { SourceId } from "../domain/Search";

// Upstream payload shapes, parsed field-by-field.
// Every field degrades to `undefined` on a type mismatch instead of failing the whole record:
// a malformed record still normalizes, it just carries less information.

const optString = z.string().optional().catch(undefined);
const optBoolean = z.boolean().optional().catch(undefined);
const optNumber = z.number().optional().catch(undefined);
const optStringArray = z.array(z.string()).optional().catch(undefined);

// --- Provider registry (NPI) ---

export const RegistryAddressSchema = z.object({
  address_purpose: optString,
  address_1: optString,
  address_2: optString,
  city: optString,
  state: optString,
  postal_code: optString,
  telephone_number: optString,
});

export const RegistryTaxonomySchema = z.object({
  code: optString,
  desc: optString,
  primary: optBoolean,
});

export const RegistryResultSchema = z.object({
  number: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  enumeration_type: optString,
  basic: z
    .object({
      first_name: optString,
      last_name: optString,
      organization_name: optString,
    })
    .optional()
    .catch(undefined),
  addresses: z.array(RegistryAddressSchema.catch({})).optional().catch(undefined),
  taxonomies: z.array(RegistryTaxonomySchema.catch({})).optional().catch(undefined),
});

export type RegistryAddress = z.infer<typeof RegistryAddressSchema>;
export type RegistryTaxonomy = z.infer<typeof RegistryTaxonomySchema>;
export type RegistryResult = z.infer<typeof RegistryResultSchema>;

export const RegistryResponseSchema = z.object({
  result_count: optNumber,
  results: z.array(RegistryResultSchema.catch({})).optional().catch(undefined),
  Errors: z
    .array(z.object({ description: optString, field: optString }).catch({}))
    .optional()
    .catch(undefined),
});

// --- Places (nearby search, details) ---

const LatLngSchema = z.object({ lat: optNumber, lng: optNumber });

const GeometrySchema = z.object({
  location: LatLngSchema.optional().catch(undefined),
});

export const PlacesResultSchema = z.object({
  place_id: optString,
  name: optString,
  vicinity: optString,
  formatted_address: optString,
  types: optStringArray,
  geometry: GeometrySchema.optional().catch(undefined),
  opening_hours: z.object({ open_now: optBoolean }).optional().catch(undefined),
});

export type PlacesResult = z.infer<typeof PlacesResultSchema>;

export const PlacesNearbyResponseSchema = z.object({
  status: optString,
  error_message: optString,
  next_page_token: optString,
  results: z.array(PlacesResultSchema.catch({})).optional().catch(undefined),
});

const OpeningPointSchema = z.object({ day: optNumber, time: optString });

export const OpeningHoursSchema = z.object({
  open_now: optBoolean,
  weekday_text: optStringArray,
  periods: z
    .array(
      z
        .object({
          open: OpeningPointSchema.optional().catch(undefined),
          close: OpeningPointSchema.optional().catch(undefined),
        })
        .catch({}),
    )
    .optional()
    .catch(undefined),
});

export type OpeningHours = z.infer<typeof OpeningHoursSchema>;

export const PlaceDetailsSchema = z.object({
  name: optString,
  formatted_address: optString,
  formatted_phone_number: optString,
  website: optString,
  url: optString,
  geometry: GeometrySchema.optional().catch(undefined),
  opening_hours: OpeningHoursSchema.optional().catch(undefined),
  current_opening_hours: OpeningHoursSchema.optional().catch(undefined),
});

export type PlaceDetails = z.infer<typeof PlaceDetailsSchema>;

export const PlaceDetailsResponseSchema = z.object({
  status: optString,
  error_message: optString,
  result: PlaceDetailsSchema.optional().catch(undefined),
});

// --- Geocoding ---

export const GeocodeResponseSchema = z.object({
  status: optString,
  error_message: optString,
  results: z
    .array(
      z
        .object({
          geometry: GeometrySchema.optional().catch(undefined),
          address_components: z
            .array(z.object({ short_name: optString, types: optStringArray }).catch({}))
            .optional()
            .catch(undefined),
        })
        .catch({}),
    )
    .optional()
    .catch(undefined),
});

// --- Tagged variant consumed by the normalizer ---

export type RegistryRawRecord = Readonly<{ kind: "registry"; source: SourceId; record: RegistryResult }>;
export type PlacesRawRecord = Readonly<{ kind: "places"; source: SourceId; record: PlacesResult }>;

export type RawRecord = RegistryRawRecord | PlacesRawRecord;

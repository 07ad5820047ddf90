/*
Doctor finder
- Registry first: individual practitioners, then organizations only if no individual matched.
- Places keyword search is the last resort, and only when a maps key is configured.
- The specialty usually arrives pre-filled from the symptom step; the user may override it.
*/

import type { SearchRequest, SearchResult, SourceId } from "../domain/Search";
import type { RadiusSearchOrchestrator } from "./RadiusSearch";

export const DOCTOR_SOURCE_PREFERENCE: readonly SourceId[] = [
  "registry-individual",
  "registry-organization",
  "places-doctor",
];

export const DEFAULT_DOCTOR_RADIUS_MILES = 25;

export type DoctorSearchParams = Readonly<{
  zip: string;
  specialty: string;
  radiusMiles?: number;
}>;

export type DoctorSearch = Readonly<{
  request: SearchRequest;
  result: SearchResult;
}>;

export async function findDoctors(
  orchestrator: RadiusSearchOrchestrator,
  params: DoctorSearchParams,
): Promise<DoctorSearch> {
  const specialty = params.specialty.trim();
  if (!specialty) throw new Error("Doctor search requires a specialty.");

  const request: SearchRequest = {
    originZip: params.zip,
    radiusMiles: params.radiusMiles ?? DEFAULT_DOCTOR_RADIUS_MILES,
    queryText: specialty,
    sourcePreference: DOCTOR_SOURCE_PREFERENCE.filter((id) => orchestrator.hasSource(id)),
  };

  const result = await orchestrator.search(request);
  return { request, result };
}

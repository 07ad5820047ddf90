import type { Candidate } from "./Candidate";

export type SourceId =
  | "registry-individual"
  | "registry-organization"
  | "places-doctor"
  | "places-lab"
  | "places-pharmacy";

export type SearchRequest = Readonly<{
  originZip: string;
  radiusMiles: number;

  // Specialty or keyword. Registry sources match it against taxonomy descriptions.
  queryText: string;

  // Tried in order; the first source that returns any raw record wins.
  sourcePreference: readonly SourceId[];
}>;

export type SearchMeta = Readonly<{
  resolvedRegion: string;

  // Normalized candidate count before the radius filter.
  totalRawCount: number;

  reasonIfEmpty?: string;

  // True when nothing fell inside the radius and the unfiltered set was returned instead.
  radiusRelaxed: boolean;

  sourceUsed?: SourceId;
}>;

export type SearchResult = Readonly<{
  candidates: readonly Candidate[];
  meta: SearchMeta;
}>;

export function emptySearchResult(reasonIfEmpty: string, resolvedRegion = ""): SearchResult {
  return {
    candidates: [],
    meta: { resolvedRegion, totalRawCount: 0, reasonIfEmpty, radiusRelaxed: false },
  };
}

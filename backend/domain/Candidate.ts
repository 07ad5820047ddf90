import type { SourceId } from "./Search";

// NOTE: Candidates are immutable once constructed.
// - The search pipeline filters and reorders lists of candidates; it never edits one.
// - Enrichment (place details) produces a new candidate via spread.

export type CandidateExtra = Readonly<{
  website?: string;
  openNow?: boolean;
  open24Hours?: boolean;
  weekdayText?: readonly string[];
  mapsUrl?: string;

  // `tel:` link built from the display phone (digits and "+" only).
  phoneTel?: string;
}>;

export type Candidate = Readonly<{
  // Stable external identifier (registry number or place id). May be empty.
  id: string;

  // Never empty; falls back to a placeholder such as "(Provider)".
  displayName: string;

  // Taxonomy description or facility type.
  category: string;

  phone: string;
  address: string;

  // Five digits, or empty when the source omitted it.
  postalCode: string;

  // Absent only when the candidate's own location could not be resolved. Never negative.
  distanceMiles?: number;

  source: SourceId;
  extra: CandidateExtra;
}>;

import type { Candidate } from "./Candidate";
import type { SearchRequest, SearchResult } from "./Search";

// The intake session is the explicit context object passed between steps.
// - Each step reads only the fields it needs and writes a new snapshot.
// - No step mutates a snapshot in place.

export type SessionId = string;

export type Sex = "Male" | "Female";

export interface PatientIdentity {
  readonly firstName: string;
  readonly lastName: string;
  readonly email?: string;

  // Normalized five-digit ZIP, when the patient supplied a valid one.
  readonly zipCode?: string;
}

export interface Diagnosis {
  readonly name: string;
  readonly explanation: string;
}

export interface SymptomSummary {
  // Human-readable line built from the intake form ("fever, cough, Age 22, Male, 3 days of symptoms").
  readonly symptomsInput: string;

  // Markdown summary returned by the condition suggester.
  readonly conditionSummary: string;
  readonly diagnoses: readonly Diagnosis[];

  readonly suggestedSpecialties: readonly string[];
  readonly primarySpecialty?: string;

  readonly emergencyKeywords: readonly string[];
  readonly age?: number;
}

export interface StoredSearch {
  readonly request: SearchRequest;
  readonly result: SearchResult;
}

export interface IntakeRunRef {
  readonly runId: string;
  readonly contactId: number;
}

export type IntakeSession = Readonly<{
  sessionId: SessionId;
  createdAt: string;

  patient?: PatientIdentity;
  symptoms?: SymptomSummary;
  run?: IntakeRunRef;

  lastSearch?: StoredSearch;
  selectedProvider?: Candidate;
}>;

/*
Symptom intake step
- Calls the condition suggester with the structured form fields.
- Derives emergency keywords and specialty suggestions from the returned text.
- Persists contact, symptoms and ranked diagnoses; a storage failure is reported, not thrown.
*/

import { randomUUID } from "crypto";
import { suggestConditions } from "../ai/ConditionSuggester";
import { callLLM, type LLMCaller } from "../ai/PromptBuilders";
import { describeError } from "../domain/Errors";
import type { IntakeRunRef, PatientIdentity, Sex, SymptomSummary } from "../domain/IntakeSession";
import type { IntakeRepository } from "../repository/IntakeRepository";
import { detectEmergency, suggestSpecialties } from "./SpecialtySuggester";

export const NO_FREE_TEXT_SYMPTOMS = "No free-text symptoms provided; AI summary only.";
export const UNKNOWN_NAME = "(Unknown)";

export type SymptomIntakeInput = Readonly<{
  firstName: string;
  lastName: string;
  email?: string;

  // Already normalized to five digits by request validation.
  zipCode?: string;

  symptomsText: string;
  age?: number;
  sex?: Sex;
  durationDays?: number;
}>;

export type SymptomIntakeOutcome = Readonly<{
  patient: PatientIdentity;
  summary: SymptomSummary;
  run?: IntakeRunRef;
  saved: boolean;
  fallback: boolean;
}>;

export function splitSymptoms(text: string): string[] {
  return text
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function hasAnyDetail(input: SymptomIntakeInput): boolean {
  return Boolean(input.symptomsText.trim() || input.age || input.sex || input.durationDays);
}

// "fever, cough, Age 22, Male, 3 days of symptoms"
export function buildSymptomsInput(input: SymptomIntakeInput): string {
  const parts: string[] = [];
  const symptoms = splitSymptoms(input.symptomsText);
  if (symptoms.length) parts.push(symptoms.join(", "));
  if (input.age !== undefined) parts.push(`Age ${input.age}`);
  if (input.sex) parts.push(input.sex);
  if (input.durationDays !== undefined) parts.push(`${input.durationDays} days of symptoms`);

  return parts.join(", ").trim() || NO_FREE_TEXT_SYMPTOMS;
}

export async function runSymptomIntake(
  deps: { repository: IntakeRepository; llm?: LLMCaller },
  input: SymptomIntakeInput,
): Promise<SymptomIntakeOutcome> {
  if (!hasAnyDetail(input)) throw new Error("Please enter at least one detail.");

  const suggestion = await suggestConditions(
    {
      symptoms: splitSymptoms(input.symptomsText),
      age: input.age,
      sex: input.sex,
      duration: input.durationDays ? `${input.durationDays} days` : undefined,
    },
    deps.llm ?? callLLM,
  );

  const specialties = suggestSpecialties(suggestion.summaryMarkdown);
  const emergencyKeywords = detectEmergency(suggestion.summaryMarkdown, suggestion.diagnoses);

  const summary: SymptomSummary = {
    symptomsInput: buildSymptomsInput(input),
    conditionSummary: suggestion.summaryMarkdown,
    diagnoses: suggestion.diagnoses,
    suggestedSpecialties: specialties,
    primarySpecialty: specialties[0],
    emergencyKeywords,
    age: input.age,
  };

  const patient: PatientIdentity = {
    firstName: input.firstName.trim(),
    lastName: input.lastName.trim(),
    email: input.email?.trim() || undefined,
    zipCode: input.zipCode,
  };

  if (emergencyKeywords.length) {
    console.warn(`[Intake] Emergency keywords matched: ${emergencyKeywords.join(", ")}`);
  }

  try {
    const run = await deps.repository.saveIntake({
      contact: {
        ...patient,
        firstName: patient.firstName || UNKNOWN_NAME,
        lastName: patient.lastName || UNKNOWN_NAME,
      },
      runId: randomUUID(),
      age: input.age,
      sex: input.sex,
      durationDays: input.durationDays,
      symptomsText: input.symptomsText,
      diagnoses: suggestion.diagnoses,
    });
    return { patient, summary, run, saved: true, fallback: suggestion.fallback };
  } catch (err) {
    console.error(`[Intake] Failed to save intake: ${describeError(err)}`);
    return { patient, summary, saved: false, fallback: suggestion.fallback };
  }
}

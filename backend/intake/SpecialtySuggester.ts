import type { Diagnosis } from "../domain/IntakeSession";

// Keyword rules over the AI summary text.
// - Matching is case-insensitive substring containment.
// - Groups contribute in declaration order; duplicates are dropped.
// - Generalists are always appended so there is always a primary specialty.

type SpecialtyRule = Readonly<{ keywords: readonly string[]; specialties: readonly string[] }>;

const SPECIALTY_RULES: readonly SpecialtyRule[] = [
  { keywords: ["heart", "chest pain", "arrhythmia", "angina"], specialties: ["Cardiology", "Emergency Medicine", "Internal Medicine"] },
  { keywords: ["shortness of breath", "wheezing", "pneumonia", "bronchitis"], specialties: ["Pulmonary Disease", "Internal Medicine"] },
  { keywords: ["covid", "influenza", "flu", "infection", "malaria"], specialties: ["Infectious Disease", "Internal Medicine"] },
  { keywords: ["migraine", "headache", "seizure", "numbness"], specialties: ["Neurology", "Emergency Medicine"] },
  { keywords: ["anxiety", "depression", "panic"], specialties: ["Psychiatry", "Psychology"] },
  { keywords: ["rash", "acne", "eczema", "psoriasis"], specialties: ["Dermatology"] },
  { keywords: ["stomach", "abdominal pain", "gastro", "ulcer", "diarrhea"], specialties: ["Gastroenterology", "Internal Medicine"] },
  { keywords: ["uti", "urinary", "kidney stone"], specialties: ["Urology"] },
];

export const GENERALIST_SPECIALTIES: readonly string[] = ["Family Medicine", "Internal Medicine", "General Practice"];

export const EMERGENCY_KEYWORDS: readonly string[] = [
  "heart attack",
  "myocardial infarction",
  "stroke",
  "cva",
  "brain hemorrhage",
  "pulmonary embolism",
  "aortic dissection",
  "sepsis",
  "anaphylaxis",
  "anaphylactic shock",
];

export function suggestSpecialties(summary: string): string[] {
  const text = summary.toLowerCase();
  const out: string[] = [];

  for (const rule of SPECIALTY_RULES) {
    if (!rule.keywords.some((k) => text.includes(k))) continue;
    for (const s of rule.specialties) if (!out.includes(s)) out.push(s);
  }
  for (const g of GENERALIST_SPECIALTIES) if (!out.includes(g)) out.push(g);

  return out;
}

// Returns the matched keywords; empty means no emergency.
export function detectEmergency(summary: string, diagnoses: readonly Diagnosis[]): string[] {
  const blocks = [summary.toLowerCase(), ...diagnoses.map((d) => `${d.name} ${d.explanation}`.toLowerCase())];
  return EMERGENCY_KEYWORDS.filter((k) => blocks.some((b) => b.includes(k)));
}

/*
Specialty label -> places search keyword.
- Registry sources match taxonomy descriptions directly and do not use this map.
- Places keyword search works better with the practitioner noun ("cardiologist") than the field ("Cardiology").
*/

const MAP: Readonly<Record<string, string>> = {
  Cardiology: "cardiologist",
  Dermatology: "dermatologist",
  "Emergency Medicine": "emergency room",
  Endocrinology: "endocrinologist",
  Gastroenterology: "gastroenterologist",
  "Infectious Disease": "infectious disease specialist",
  Neurology: "neurologist",
  Oncology: "oncologist",
  Ophthalmology: "ophthalmologist",
  "Orthopaedic Surgery": "orthopedic surgeon",
  Otolaryngology: "ENT specialist",
  Pediatrics: "pediatrician",
  Psychiatry: "psychiatrist",
  Psychology: "psychologist",
  "Pulmonary Disease": "pulmonologist",
  Rheumatology: "rheumatologist",
  Urology: "urologist",

  "Family Medicine": "family doctor",
  "General Practice": "general practitioner",
  "Internal Medicine": "internist",
  "Primary Care": "primary care physician",

  "Obstetrics & Gynecology": "obstetrician gynecologist",
  "Physical Therapy": "physical therapist",
};

function normalizeKey(s: string): string {
  return s.trim().replace(/\s+/g, " ");
}

export function specializationToQueryTerm(specializationLabel: string): string {
  if (!specializationLabel.trim()) {
    throw new Error("specializationLabel must be a non-empty string.");
  }

  const key = normalizeKey(specializationLabel);
  const mapped = MAP[key];
  if (mapped) return mapped;

  // Unknown labels go through as typed, lowercased.
  return key.toLowerCase();
}

export function getSupportedSpecializationMappings(): Readonly<Record<string, string>> {
  return MAP;
}

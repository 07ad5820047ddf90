import type { Diagnosis, IntakeRunRef, PatientIdentity, Sex } from "../domain/IntakeSession";

// Repository boundary
// - The ONLY layer that reads/writes intake records.
// - No AI, no maps, no HTTP.
// - Records are insert-only, except the contact row which is upserted on its normalized identity.

export type ContactRecord = PatientIdentity;

export type IntakeRecord = Readonly<{
  contact: ContactRecord;
  runId: string;
  age?: number;
  sex?: Sex;
  durationDays?: number;
  symptomsText?: string;

  // Stored with rank = position + 1.
  diagnoses: readonly Diagnosis[];
}>;

export type AppointmentRecord = Readonly<{
  run?: IntakeRunRef;
  providerId: string;
  providerName: string;
  providerSource: string;
  patientFirstName: string;
  patientLastName: string;
  phone: string;
  insurance: string;

  // YYYY-MM-DD and HH:MM
  date: string;
  time: string;
  reason: string;
}>;

export type AuditRecord = Readonly<{
  sessionId?: string;
  action: string;
  resource?: string;
  detail?: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
}>;

export interface IntakeRepository {
  saveIntake(record: IntakeRecord): Promise<IntakeRunRef>;
  saveAppointment(record: AppointmentRecord): Promise<number>;
  writeAudit(entry: AuditRecord): Promise<void>;
}

// Identity key used for contact de-duplication (mirrors the generated columns in schema.sql).
export function contactKey(c: ContactRecord): string {
  return [
    c.firstName.trim().toLowerCase(),
    c.lastName.trim().toLowerCase(),
    (c.email ?? "").trim().toLowerCase(),
    (c.zipCode ?? "").trim(),
  ].join("|");
}

import type { IntakeRunRef } from "../domain/IntakeSession";
import { query, withTransaction } from "../database/connection";
import type { AppointmentRecord, AuditRecord, IntakeRecord, IntakeRepository } from "./IntakeRepository";

// =========================================================================
// PostgreSQL intake repository
//
// Production storage backend. Same contract as InMemoryIntakeRepository:
// - Contact upsert keyed on normalized (first, last, email, zip)
// - Symptoms and ranked diagnoses written in one transaction per run
// - Appointments and audit entries are insert-only
// =========================================================================

interface IdRow {
  [key: string]: unknown;
  id: number;
}

const UPSERT_CONTACT = `
  INSERT INTO contacts (first_name, last_name, email, zip_code)
  VALUES ($1, $2, $3, $4)
  ON CONFLICT (first_name_key, last_name_key, email_key, zip_key)
  DO UPDATE SET email = EXCLUDED.email, zip_code = EXCLUDED.zip_code
  RETURNING id`;

const INSERT_SYMPTOMS = `
  INSERT INTO symptoms (contact_id, run_id, age, sex, duration_days, symptoms_text)
  VALUES ($1, $2, $3, $4, $5, $6)`;

const INSERT_DIAGNOSIS = `
  INSERT INTO diagnoses (contact_id, run_id, rank, condition, explanation)
  VALUES ($1, $2, $3, $4, $5)`;

export class PostgresIntakeRepository implements IntakeRepository {
  async saveIntake(record: IntakeRecord): Promise<IntakeRunRef> {
    return withTransaction(async (client) => {
      const c = record.contact;
      const contact = await client.query<IdRow>(UPSERT_CONTACT, [
        c.firstName,
        c.lastName,
        c.email ?? null,
        c.zipCode ?? null,
      ]);
      const contactId = contact.rows[0]?.id;
      if (contactId === undefined) throw new Error("Contact upsert returned no id.");

      await client.query(INSERT_SYMPTOMS, [
        contactId,
        record.runId,
        record.age ?? null,
        record.sex ?? null,
        record.durationDays ?? null,
        record.symptomsText || null,
      ]);

      for (const [i, d] of record.diagnoses.entries()) {
        await client.query(INSERT_DIAGNOSIS, [contactId, record.runId, i + 1, d.name, d.explanation]);
      }

      return { runId: record.runId, contactId };
    });
  }

  async saveAppointment(record: AppointmentRecord): Promise<number> {
    const result = await query<IdRow>(
      `INSERT INTO appointments (
         contact_id, run_id, provider_id, provider_name, provider_source,
         patient_first_name, patient_last_name, phone, insurance,
         appointment_date, appointment_time, reason
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       RETURNING id`,
      [
        record.run?.contactId ?? null,
        record.run?.runId ?? null,
        record.providerId,
        record.providerName,
        record.providerSource,
        record.patientFirstName,
        record.patientLastName,
        record.phone,
        record.insurance,
        record.date,
        record.time,
        record.reason,
      ],
    );

    const id = result.rows[0]?.id;
    if (id === undefined) throw new Error("Appointment insert returned no id.");
    return id;
  }

  async writeAudit(entry: AuditRecord): Promise<void> {
    await query(
      `INSERT INTO audit_log (session_id, action, resource, detail, ip_address, user_agent)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        entry.sessionId || null,
        entry.action,
        entry.resource || null,
        entry.detail ? JSON.stringify(entry.detail) : null,
        entry.ipAddress || null,
        entry.userAgent || null,
      ],
    );
  }
}

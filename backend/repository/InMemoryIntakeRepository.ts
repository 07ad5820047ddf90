import type { IntakeRunRef } from "../domain/IntakeSession";
import {
  contactKey,
  type AppointmentRecord,
  type AuditRecord,
  type ContactRecord,
  type IntakeRecord,
  type IntakeRepository,
} from "./IntakeRepository";

// In-memory repository
// - For local runs without DATABASE_URL, and for tests.
// - NOT production storage.
// - Stores clones so callers cannot mutate stored records through shared references.

export const MAX_AUDIT_ENTRIES = 10000;

type StoredContact = ContactRecord & { readonly id: number };

export class InMemoryIntakeRepository implements IntakeRepository {
  private readonly contacts = new Map<string, StoredContact>();
  private readonly intakes: IntakeRecord[] = [];
  private readonly appointments: (AppointmentRecord & { readonly id: number })[] = [];
  private readonly audit: AuditRecord[] = [];
  private nextContactId = 1;

  async saveIntake(record: IntakeRecord): Promise<IntakeRunRef> {
    const key = contactKey(record.contact);
    const existing = this.contacts.get(key);
    const id = existing?.id ?? this.nextContactId++;

    // Upsert: later email/zip spellings replace earlier ones.
    this.contacts.set(key, { ...structuredClone(record.contact), id });
    this.intakes.push(structuredClone(record));

    return { runId: record.runId, contactId: id };
  }

  async saveAppointment(record: AppointmentRecord): Promise<number> {
    const id = this.appointments.length + 1;
    this.appointments.push({ ...structuredClone(record), id });
    return id;
  }

  async writeAudit(entry: AuditRecord): Promise<void> {
    this.audit.push(structuredClone(entry));
    if (this.audit.length > MAX_AUDIT_ENTRIES) {
      this.audit.splice(0, this.audit.length - MAX_AUDIT_ENTRIES);
    }
  }

  // Read helpers for tests and diagnostics.
  listContacts(): readonly StoredContact[] {
    return [...this.contacts.values()];
  }

  listIntakes(): readonly IntakeRecord[] {
    return this.intakes;
  }

  listAppointments(): readonly AppointmentRecord[] {
    return this.appointments;
  }

  listAudit(): readonly AuditRecord[] {
    return this.audit;
  }
}

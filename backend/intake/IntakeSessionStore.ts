import { randomUUID } from "crypto";
import type { Candidate } from "../domain/Candidate";
import { PreconditionError, SessionNotFoundError } from "../domain/Errors";
import type {
  IntakeRunRef,
  IntakeSession,
  PatientIdentity,
  SessionId,
  StoredSearch,
  SymptomSummary,
} from "../domain/IntakeSession";
import { selectCandidate } from "./Selection";

// In-process session store.
// - Every write replaces the stored snapshot with a new object.
// - Sessions expire after `ttlMs` of inactivity; expiry is checked on access.

export const DEFAULT_SESSION_TTL_MS = 2 * 60 * 60 * 1000;

type Entry = { session: IntakeSession; touchedAt: number };

export class IntakeSessionStore {
  private readonly entries = new Map<SessionId, Entry>();

  constructor(
    private readonly ttlMs: number = DEFAULT_SESSION_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  create(): IntakeSession {
    this.sweep();
    const session: IntakeSession = { sessionId: randomUUID(), createdAt: new Date(this.now()).toISOString() };
    this.entries.set(session.sessionId, { session, touchedAt: this.now() });
    return session;
  }

  get(sessionId: SessionId): IntakeSession | undefined {
    const entry = this.entries.get(sessionId);
    if (!entry) return undefined;
    if (this.now() - entry.touchedAt > this.ttlMs) {
      this.entries.delete(sessionId);
      return undefined;
    }
    return entry.session;
  }

  require(sessionId: SessionId): IntakeSession {
    const session = this.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  private write(sessionId: SessionId, next: (s: IntakeSession) => IntakeSession): IntakeSession {
    const updated = next(this.require(sessionId));
    this.entries.set(sessionId, { session: updated, touchedAt: this.now() });
    return updated;
  }

  recordIntake(
    sessionId: SessionId,
    args: { patient: PatientIdentity; symptoms: SymptomSummary; run?: IntakeRunRef },
  ): IntakeSession {
    return this.write(sessionId, (s) => ({ ...s, patient: args.patient, symptoms: args.symptoms, run: args.run }));
  }

  // A new search invalidates any earlier selection.
  storeSearch(sessionId: SessionId, search: StoredSearch): IntakeSession {
    return this.write(sessionId, (s) => ({ ...s, lastSearch: search, selectedProvider: undefined }));
  }

  select(sessionId: SessionId, index: number): Candidate {
    const session = this.require(sessionId);
    if (!session.lastSearch) throw new PreconditionError("No search results to select from. Run a search first.");

    const candidate = selectCandidate(session.lastSearch.result, index);
    this.write(sessionId, (s) => ({ ...s, selectedProvider: candidate }));
    return candidate;
  }

  get size(): number {
    return this.entries.size;
  }

  private sweep(): void {
    const now = this.now();
    for (const [id, entry] of this.entries) {
      if (now - entry.touchedAt > this.ttlMs) this.entries.delete(id);
    }
  }
}

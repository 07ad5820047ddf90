import type { SourceId } from "./Search";

// Error taxonomy for the intake backend.
// - Geocoding misses and malformed upstream records are NOT errors; lower layers degrade them.
// - SourceUnavailableError is the only hard failure the search pipeline lets through.

export class SourceUnavailableError extends Error {
  readonly sourceId: SourceId;

  constructor(sourceId: SourceId, message: string, options?: { cause?: unknown }) {
    super(`Search source ${sourceId} unavailable: ${message}`, options);
    this.name = "SourceUnavailableError";
    this.sourceId = sourceId;
  }
}

export class IndexOutOfRangeError extends Error {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super(`Selection index ${index} is out of range (${size} candidate(s) available).`);
    this.name = "IndexOutOfRangeError";
    this.index = index;
    this.size = size;
  }
}

export class SessionNotFoundError extends Error {
  constructor(sessionId: string) {
    super(`Intake session ${sessionId} not found or expired.`);
    this.name = "SessionNotFoundError";
  }
}

// A step was called before the step it depends on (e.g. booking before a provider was selected).
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

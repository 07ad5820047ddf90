import type { Candidate } from "../domain/Candidate";
import { IndexOutOfRangeError } from "../domain/Errors";
import type { SearchResult } from "../domain/Search";

// The selected candidate is returned by reference, unchanged.
// Downstream steps (booking) use it as-is and never re-derive it from the source record.
export function selectCandidate(result: SearchResult, index: number): Candidate {
  const size = result.candidates.length;
  if (!Number.isInteger(index) || index < 0 || index >= size) throw new IndexOutOfRangeError(index, size);

  const candidate = result.candidates[index];
  if (!candidate) throw new IndexOutOfRangeError(index, size);
  return candidate;
}

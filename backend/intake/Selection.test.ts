import type { Candidate } from '../domain/Candidate';
import { IndexOutOfRangeError } from '../domain/Errors';
import type { SearchResult } from '../domain/Search';
import { selectCandidate } from './Selection';

function candidate(id: string, distanceMiles: number): Candidate {
  return {
    id,
    displayName: `Dr ${id}`,
    category: 'Cardiology',
    phone: '',
    address: '',
    postalCode: '',
    distanceMiles,
    source: 'registry-individual',
    extra: {},
  };
}

const RESULT: SearchResult = {
  candidates: [candidate('a', 1.2), candidate('b', 3.4)],
  meta: { resolvedRegion: 'FL', totalRawCount: 2, radiusRelaxed: false, sourceUsed: 'registry-individual' },
};

test('selectCandidate returns the candidate at the index by reference', () => {
  expect(selectCandidate(RESULT, 1)).toBe(RESULT.candidates[1]);
  expect(selectCandidate(RESULT, 0).id).toBe('a');
});

test('selectCandidate rejects indexes outside the list', () => {
  expect(() => selectCandidate(RESULT, 2)).toThrow(IndexOutOfRangeError);
  expect(() => selectCandidate(RESULT, -1)).toThrow('Selection index -1 is out of range (2 candidate(s) available).');
  expect(() => selectCandidate(RESULT, 0.5)).toThrow(IndexOutOfRangeError);
});

test('selectCandidate rejects any index on an empty result', () => {
  const empty: SearchResult = { candidates: [], meta: { resolvedRegion: '', totalRawCount: 0, radiusRelaxed: false } };
  expect(() => selectCandidate(empty, 0)).toThrow('Selection index 0 is out of range (0 candidate(s) available).');
});

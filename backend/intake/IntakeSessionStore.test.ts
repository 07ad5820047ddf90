import type { Candidate } from '../domain/Candidate';
import { IndexOutOfRangeError, PreconditionError, SessionNotFoundError } from '../domain/Errors';
import type { StoredSearch } from '../domain/IntakeSession';
import { IntakeSessionStore } from './IntakeSessionStore';

function candidate(id: string): Candidate {
  return {
    id,
    displayName: `Clinic ${id}`,
    category: 'Clinic',
    phone: '',
    address: '',
    postalCode: '',
    distanceMiles: 1,
    source: 'registry-organization',
    extra: {},
  };
}

function search(...ids: string[]): StoredSearch {
  return {
    request: { originZip: '33351', radiusMiles: 25, queryText: 'Cardiology', sourcePreference: ['registry-organization'] },
    result: {
      candidates: ids.map(candidate),
      meta: { resolvedRegion: 'FL', totalRawCount: ids.length, radiusRelaxed: false },
    },
  };
}

test('create issues distinct sessions', () => {
  const store = new IntakeSessionStore(1000, () => 0);
  const a = store.create();
  const b = store.create();
  expect(a.sessionId).not.toBe(b.sessionId);
  expect(a.createdAt).toBe('1970-01-01T00:00:00.000Z');
  expect(store.size).toBe(2);
});

test('sessions expire after the idle period', () => {
  let now = 0;
  const store = new IntakeSessionStore(1000, () => now);
  const { sessionId } = store.create();

  now = 1000;
  expect(store.get(sessionId)?.sessionId).toBe(sessionId);

  now = 2001;
  expect(store.get(sessionId)).toBeUndefined();
  expect(() => store.require(sessionId)).toThrow(SessionNotFoundError);
});

test('writes refresh the idle timer', () => {
  let now = 0;
  const store = new IntakeSessionStore(1000, () => now);
  const { sessionId } = store.create();

  now = 900;
  store.storeSearch(sessionId, search('a'));
  now = 1800;
  expect(store.get(sessionId)).toBeDefined();
});

test('create sweeps expired sessions', () => {
  let now = 0;
  const store = new IntakeSessionStore(1000, () => now);
  store.create();
  now = 5000;
  store.create();
  expect(store.size).toBe(1);
});

test('select carries the chosen candidate forward', () => {
  const store = new IntakeSessionStore();
  const { sessionId } = store.create();
  const stored = search('a', 'b');
  store.storeSearch(sessionId, stored);

  const chosen = store.select(sessionId, 1);

  expect(chosen).toBe(stored.result.candidates[1]);
  expect(store.require(sessionId).selectedProvider).toBe(chosen);
});

test('select requires a prior search', () => {
  const store = new IntakeSessionStore();
  const { sessionId } = store.create();
  expect(() => store.select(sessionId, 0)).toThrow(PreconditionError);
  expect(() => store.select(sessionId, 0)).toThrow('No search results to select from. Run a search first.');
});

test('select leaves the session unchanged on a bad index', () => {
  const store = new IntakeSessionStore();
  const { sessionId } = store.create();
  store.storeSearch(sessionId, search('a'));
  store.select(sessionId, 0);

  expect(() => store.select(sessionId, 3)).toThrow(IndexOutOfRangeError);
  expect(store.require(sessionId).selectedProvider?.id).toBe('a');
});

test('a new search clears the selection', () => {
  const store = new IntakeSessionStore();
  const { sessionId } = store.create();
  store.storeSearch(sessionId, search('a'));
  store.select(sessionId, 0);

  store.storeSearch(sessionId, search('b'));

  expect(store.require(sessionId).selectedProvider).toBeUndefined();
});

test('writes replace snapshots instead of mutating them', () => {
  const store = new IntakeSessionStore();
  const first = store.create();
  store.storeSearch(first.sessionId, search('a'));

  expect(first.lastSearch).toBeUndefined();
  expect(store.require(first.sessionId)).not.toBe(first);
});

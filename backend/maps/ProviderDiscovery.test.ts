import { findDoctors } from './ProviderDiscovery';
import { RadiusSearchOrchestrator } from './RadiusSearch';
import type { RawRecord } from './RawRecords';
import { ResultNormalizer } from './ResultNormalizer';
import type { SearchSource } from './SearchSources';
import { specializationToQueryTerm } from './SpecializationQueryMap';
import { NoopCache } from './TtlCache';
import { ZipGeocoder } from './ZipGeocoder';

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

function setup(sources: SearchSource[]) {
  const geocoder = new ZipGeocoder({ lookup: async () => ({ latitude: 26, longitude: -80, regionCode: 'FL' }) });
  return new RadiusSearchOrchestrator({
    geocoder,
    normalizer: new ResultNormalizer(geocoder),
    sources,
    cache: new NoopCache<readonly RawRecord[]>(),
  });
}

test('findDoctors only plans the sources that are configured', async () => {
  const individual: SearchSource = { id: 'registry-individual', cacheKey: () => 'i', fetch: async () => [] };
  const organization: SearchSource = { id: 'registry-organization', cacheKey: () => 'o', fetch: async () => [] };

  const { request, result } = await findDoctors(setup([individual, organization]), {
    zip: '33351',
    specialty: ' Cardiology ',
  });

  expect(request).toEqual({
    originZip: '33351',
    radiusMiles: 25,
    queryText: 'Cardiology',
    sourcePreference: ['registry-individual', 'registry-organization'],
  });
  expect(result.meta.reasonIfEmpty).toBe('no matching records');
});

test('findDoctors requires a specialty', async () => {
  await expect(findDoctors(setup([]), { zip: '33351', specialty: '  ' })).rejects.toThrow(
    'Doctor search requires a specialty.',
  );
});

test('specializationToQueryTerm maps known labels and passes others through', () => {
  expect(specializationToQueryTerm('Orthopaedic  Surgery')).toBe('orthopedic surgeon');
  expect(specializationToQueryTerm('Sleep Medicine')).toBe('sleep medicine');
  expect(() => specializationToQueryTerm(' ')).toThrow('specializationLabel must be a non-empty string.');
});

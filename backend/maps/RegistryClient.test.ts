import { fakeFetch } from '../testing/fakeFetch';
import { RegistryClient } from './RegistryClient';

const BASE = 'https://registry.test/api/';

function results(count: number, offset = 0) {
  return Array.from({ length: count }, (_, i) => ({ number: String(offset + i) }));
}

const PARAMS = { regionCode: 'FL', taxonomyDescription: 'Cardiology', enumerationType: 'NPI-1' } as const;

test('search pages with skip until a short page', async () => {
  const { fetchImpl, requests } = fakeFetch([
    {
      prefix: BASE,
      respond: (url) => {
        const skip = Number(url.searchParams.get('skip') ?? '0');
        return { result_count: 0, results: skip === 0 ? results(200) : results(50, 200) };
      },
    },
  ]);
  const client = new RegistryClient({ baseUrl: BASE, fetchImpl });

  const found = await client.search(PARAMS);

  expect(found).toHaveLength(250);
  expect(requests).toHaveLength(2);
  expect(requests[0]?.url.searchParams.has('skip')).toBe(false);
  expect(requests[1]?.url.searchParams.get('skip')).toBe('200');
  expect(requests[0]?.url.searchParams.get('state')).toBe('FL');
  expect(requests[0]?.url.searchParams.get('taxonomy_description')).toBe('Cardiology');
  expect(requests[0]?.url.searchParams.get('enumeration_type')).toBe('NPI-1');
  expect(requests[0]?.url.searchParams.get('version')).toBe('2.1');
});

test('search stops at the limit', async () => {
  const { fetchImpl, requests } = fakeFetch([{ prefix: BASE, respond: () => ({ results: results(200) }) }]);
  const client = new RegistryClient({ baseUrl: BASE, fetchImpl });

  const found = await client.search({ ...PARAMS, limit: 300 });

  expect(found).toHaveLength(300);
  expect(requests[1]?.url.searchParams.get('limit')).toBe('100');
});

test('a rejected query reads as no matches', async () => {
  const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  const { fetchImpl, requests } = fakeFetch([
    {
      prefix: BASE,
      body: { Errors: [{ description: 'Field taxonomy_description requires at least 2 characters', field: 'taxonomy_description' }] },
    },
  ]);
  const client = new RegistryClient({ baseUrl: BASE, fetchImpl });

  expect(await client.search({ ...PARAMS, taxonomyDescription: 'C' })).toEqual([]);
  expect(requests).toHaveLength(1);
  expect(warn).toHaveBeenCalledWith('[Registry] Query rejected: Field taxonomy_description requires at least 2 characters');
  warn.mockRestore();
});

test('HTTP failures are thrown', async () => {
  const { fetchImpl } = fakeFetch([{ prefix: BASE, status: 503, body: {} }]);
  const client = new RegistryClient({ baseUrl: BASE, fetchImpl });

  await expect(client.search(PARAMS)).rejects.toThrow('Registry request failed: HTTP 503');
});

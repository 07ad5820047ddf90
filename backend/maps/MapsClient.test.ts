import { fakeFetch } from '../testing/fakeFetch';
import { GoogleMapsClient, UpstreamStatusError } from './MapsClient';

const GEOCODE = 'https://maps.googleapis.com/maps/api/geocode/json';
const NEARBY = 'https://maps.googleapis.com/maps/api/place/nearbysearch/json';
const DETAILS = 'https://maps.googleapis.com/maps/api/place/details/json';

test('GoogleMapsClient requires an API key', () => {
  expect(() => new GoogleMapsClient({})).toThrow(
    'Missing Google Maps API key. Set GOOGLE_MAPS_API_KEY in your environment (.env).',
  );
});

test('lookup returns coordinates and the state short name', async () => {
  const { fetchImpl, requests } = fakeFetch([
    {
      prefix: GEOCODE,
      body: {
        status: 'OK',
        results: [
          {
            geometry: { location: { lat: 26.17, lng: -80.28 } },
            address_components: [
              { short_name: '33351', types: ['postal_code'] },
              { short_name: 'FL', types: ['administrative_area_level_1', 'political'] },
            ],
          },
        ],
      },
    },
  ]);
  const client = new GoogleMapsClient({ apiKey: 'test-key', fetchImpl });

  expect(await client.lookup('33351')).toEqual({ latitude: 26.17, longitude: -80.28, regionCode: 'FL' });
  expect(requests[0]?.url.searchParams.get('components')).toBe('postal_code:33351|country:US');
});

test('lookup returns null for ZERO_RESULTS', async () => {
  const { fetchImpl } = fakeFetch([{ prefix: GEOCODE, body: { status: 'ZERO_RESULTS', results: [] } }]);
  const client = new GoogleMapsClient({ apiKey: 'test-key', fetchImpl });

  expect(await client.lookup('00000')).toBeNull();
});

test('lookup throws on an error status', async () => {
  const { fetchImpl } = fakeFetch([
    { prefix: GEOCODE, body: { status: 'REQUEST_DENIED', error_message: 'bad key' } },
  ]);
  const client = new GoogleMapsClient({ apiKey: 'test-key', fetchImpl });

  await expect(client.lookup('33351')).rejects.toThrow('Geocoding returned REQUEST_DENIED: bad key');
});

test('nearbySearch passes parameters and returns the next page token', async () => {
  const { fetchImpl, requests } = fakeFetch([
    {
      prefix: NEARBY,
      body: { status: 'OK', next_page_token: 'tok-2', results: [{ place_id: 'p1', name: 'Lab One' }] },
    },
  ]);
  const client = new GoogleMapsClient({ apiKey: 'test-key', fetchImpl });

  const page = await client.nearbySearch({
    location: { lat: 26, lng: -80 },
    radiusMeters: 8047,
    type: 'pharmacy',
  });

  expect(page.items).toEqual([{ place_id: 'p1', name: 'Lab One' }]);
  expect(page.nextToken).toBe('tok-2');

  const params = requests[0]?.url.searchParams;
  expect(params?.get('location')).toBe('26,-80');
  expect(params?.get('radius')).toBe('8047');
  expect(params?.get('type')).toBe('pharmacy');
  expect(params?.has('keyword')).toBe(false);
});

test('nearbySearch reports a non-OK status as UpstreamStatusError', async () => {
  const { fetchImpl } = fakeFetch([{ prefix: NEARBY, body: { status: 'INVALID_REQUEST' } }]);
  const client = new GoogleMapsClient({ apiKey: 'test-key', fetchImpl });

  const failure = client.nearbySearch({ location: { lat: 26, lng: -80 }, radiusMeters: 1000, pageToken: 'tok' });
  await expect(failure).rejects.toBeInstanceOf(UpstreamStatusError);
  await expect(failure).rejects.toMatchObject({ status: 'INVALID_REQUEST' });
});

test('nearbySearch fails on HTTP errors', async () => {
  const { fetchImpl } = fakeFetch([{ prefix: NEARBY, status: 500, body: {} }]);
  const client = new GoogleMapsClient({ apiKey: 'test-key', fetchImpl });

  await expect(
    client.nearbySearch({ location: { lat: 26, lng: -80 }, radiusMeters: 1000 }),
  ).rejects.toThrow('Places nearby search request failed: HTTP 500');
});

test('placeDetails returns the parsed result', async () => {
  const { fetchImpl } = fakeFetch([
    {
      prefix: DETAILS,
      body: { status: 'OK', result: { formatted_phone_number: '(954) 555-0100', website: 'https://lab.example' } },
    },
  ]);
  const client = new GoogleMapsClient({ apiKey: 'test-key', fetchImpl });

  expect(await client.placeDetails('p1')).toEqual({
    formatted_phone_number: '(954) 555-0100',
    website: 'https://lab.example',
  });
});

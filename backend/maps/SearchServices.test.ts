import { loadConfig } from '../config';
import { fakeFetch } from '../testing/fakeFetch';
import { createSearchServices } from './SearchServices';

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

test('ZIPs resolve from the offline dataset without a maps key or any request', async () => {
  const { fetchImpl, requests } = fakeFetch([]);
  const services = createSearchServices(loadConfig({ SESSION_SECRET: 'test-secret' }), { fetchImpl });

  const found = await services.geocoder.resolve('90210');

  expect(found?.regionCode).toBe('CA');
  expect(found?.point.lat).toBeCloseTo(34.09, 0);
  expect(found?.point.lng).toBeCloseTo(-118.41, 0);
  expect(requests).toHaveLength(0);
});

test('with a maps key, known ZIPs still skip the Geocoding API', async () => {
  const { fetchImpl, requests } = fakeFetch([]);
  const config = loadConfig({ GOOGLE_MAPS_API_KEY: 'test-key', SESSION_SECRET: 'test-secret' });

  expect((await createSearchServices(config, { fetchImpl }).geocoder.resolve('33351'))?.regionCode).toBe('FL');
  expect(requests).toHaveLength(0);
});

test('with a maps key, ZIPs missing from the dataset go to the Geocoding API', async () => {
  const { fetchImpl, requests } = fakeFetch([
    {
      prefix: 'https://maps.googleapis.com/maps/api/geocode/',
      body: {
        status: 'OK',
        results: [
          {
            geometry: { location: { lat: 40.1, lng: -75.2 } },
            address_components: [{ short_name: 'PA', types: ['administrative_area_level_1'] }],
          },
        ],
      },
    },
  ]);
  const config = loadConfig({ GOOGLE_MAPS_API_KEY: 'test-key', SESSION_SECRET: 'test-secret' });

  const found = await createSearchServices(config, { fetchImpl }).geocoder.resolve('00000');

  expect(found).toEqual({ point: { lat: 40.1, lng: -75.2 }, regionCode: 'PA' });
  expect(requests).toHaveLength(1);
});

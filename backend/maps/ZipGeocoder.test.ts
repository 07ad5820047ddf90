import { ChainedGeocodingService, normalizeZip, ZipGeocoder, type GeocodeRecord, type GeocodingService } from './ZipGeocoder';

function fakeService(impl: (zip: string) => Promise<GeocodeRecord | null>) {
  const lookup = jest.fn(impl);
  const service: GeocodingService = { lookup };
  return { service, lookup };
}

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

test('normalizeZip accepts five digits and ZIP+4', () => {
  expect(normalizeZip('33351')).toBe('33351');
  expect(normalizeZip(' 33351-1234 ')).toBe('33351');
});

test('normalizeZip rejects everything else', () => {
  expect(normalizeZip('3335')).toBeNull();
  expect(normalizeZip('33351-12')).toBeNull();
  expect(normalizeZip('abcde')).toBeNull();
  expect(normalizeZip('')).toBeNull();
  expect(normalizeZip(undefined)).toBeNull();
});

test('resolve returns the point and trimmed region code', async () => {
  const { service } = fakeService(async () => ({ latitude: 26.17, longitude: -80.28, regionCode: ' FL ' }));
  const geocoder = new ZipGeocoder(service);

  expect(await geocoder.resolve('33351')).toEqual({ point: { lat: 26.17, lng: -80.28 }, regionCode: 'FL' });
});

test('resolve maps a missing region code to an empty string', async () => {
  const { service } = fakeService(async () => ({ latitude: 1, longitude: 2, regionCode: null }));
  const geocoder = new ZipGeocoder(service);

  expect(await geocoder.resolve('12345')).toEqual({ point: { lat: 1, lng: 2 }, regionCode: '' });
});

test('resolve caches hits', async () => {
  const { service, lookup } = fakeService(async () => ({ latitude: 26, longitude: -80, regionCode: 'FL' }));
  const geocoder = new ZipGeocoder(service);

  await geocoder.resolve('33351');
  await geocoder.resolve('33351');
  expect(lookup).toHaveBeenCalledTimes(1);
});

test('resolve caches genuine misses', async () => {
  const { service, lookup } = fakeService(async () => null);
  const geocoder = new ZipGeocoder(service);

  expect(await geocoder.resolve('00000')).toBeNull();
  expect(await geocoder.resolve('00000')).toBeNull();
  expect(lookup).toHaveBeenCalledTimes(1);
});

test('resolve treats non-finite coordinates as a miss', async () => {
  const { service } = fakeService(async () => ({ latitude: Number.NaN, longitude: -80, regionCode: 'FL' }));
  const geocoder = new ZipGeocoder(service);

  expect(await geocoder.resolve('33351')).toBeNull();
});

test('resolve absorbs lookup failures without caching them', async () => {
  const { service, lookup } = fakeService(async () => {
    throw new Error('network down');
  });
  const geocoder = new ZipGeocoder(service);

  expect(await geocoder.resolve('33351')).toBeNull();
  expect(await geocoder.resolve('33351')).toBeNull();
  expect(lookup).toHaveBeenCalledTimes(2);
  expect(console.warn).toHaveBeenCalledWith('[Geocoder] Lookup failed for 33351:', 'network down');
});

test('ChainedGeocodingService falls through to the next service on a miss', async () => {
  const first = fakeService(async (zip) => (zip === '33351' ? { latitude: 26.17, longitude: -80.28, regionCode: 'FL' } : null));
  const second = fakeService(async () => ({ latitude: 18.4, longitude: -66.06, regionCode: 'PR' }));
  const chain = new ChainedGeocodingService([first.service, second.service]);

  expect(await chain.lookup('33351')).toEqual({ latitude: 26.17, longitude: -80.28, regionCode: 'FL' });
  expect(second.lookup).not.toHaveBeenCalled();

  expect(await chain.lookup('00901')).toEqual({ latitude: 18.4, longitude: -66.06, regionCode: 'PR' });
  expect(second.lookup).toHaveBeenCalledWith('00901');
});

test('ChainedGeocodingService returns null when every service misses', async () => {
  const chain = new ChainedGeocodingService([fakeService(async () => null).service, fakeService(async () => null).service]);
  expect(await chain.lookup('00000')).toBeNull();
});

import { loadConfig } from './index';

test('loadConfig applies defaults', () => {
  const config = loadConfig({});

  expect(config.port).toBe(3001);
  expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:5500']);
  expect(config.database.url).toBeUndefined();
  expect(config.database.ssl).toEqual({ rejectUnauthorized: true });
  expect(config.openai.model).toBe('gpt-4o-mini');
  expect(config.maps.registryUrl).toBe('https://npiregistry.cms.hhs.gov/api/');
  expect(config.search).toEqual({
    geocodeCacheTtlMs: 900000,
    searchCacheTtlMs: 600000,
    placesMaxPages: 3,
    placesPageDelayMs: 2000,
  });
  expect(config.mail.contactTo).toBe('support@example.com');
});

test('loadConfig reads overrides and ignores blank secrets', () => {
  const config = loadConfig({
    PORT: '8080',
    CORS_ORIGINS: 'https://a.test, https://b.test,',
    DB_SSL: 'false',
    OPENAI_API_KEY: '  ',
    GOOGLE_MAPS_API_KEY: 'test-key',
    PLACES_MAX_PAGES: 'two',
  });

  expect(config.port).toBe(8080);
  expect(config.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
  expect(config.database.ssl).toBe(false);
  expect(config.openai.apiKey).toBeUndefined();
  expect(config.maps.googleApiKey).toBe('test-key');
  expect(config.search.placesMaxPages).toBe(3);
});

test('loadConfig rejects a malformed registry URL', () => {
  expect(() => loadConfig({ NPI_REGISTRY_URL: 'not a url' })).toThrow();
});

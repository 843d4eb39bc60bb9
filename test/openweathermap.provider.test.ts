import { OpenWeatherMapProvider, extractOzone } from '@/services/providers/openweathermap.provider';
import { toDobsonUnits } from '@/services/providers/ozone-units';
import { HttpGet, IHttpResponse } from '@/utils/http-client';

const location = { latitude: 28.6139, longitude: 77.209 };
const BASE_URL = 'https://example.test/air';

const jsonResponse = (body: unknown, status = 200): IHttpResponse => ({
  ok: status >= 200 && status < 300,
  status,
  json: async () => body,
});

const airPollution = (o3: unknown) => ({
  coord: { lon: 77.209, lat: 28.6139 },
  list: [{ main: { aqi: 3 }, components: { co: 201.94, o3, pm2_5: 8.3 }, dt: 1700000000 }],
});

const providerWith = (httpGet: HttpGet, apiKey = 'test-key') =>
  new OpenWeatherMapProvider(apiKey, httpGet, BASE_URL);

test('converts µg/m³ to Dobson Units rounded to two decimals', () => {
  expect(toDobsonUnits(642.45)).toBe(300);
  expect(toDobsonUnits(100)).toBe(46.7);
  expect(toDobsonUnits(50)).toBe(23.35);
});

test('requests the air pollution endpoint for the coordinate', async () => {
  const httpGet = jest.fn<ReturnType<HttpGet>, Parameters<HttpGet>>(async () =>
    jsonResponse(airPollution(642.45)),
  );
  const reading = await providerWith(httpGet).getOzone(location);

  expect(reading).toEqual({ kind: 'measurement', dobsonUnits: 300, provider: 'openweathermap' });
  expect(httpGet).toHaveBeenCalledTimes(1);
  expect(httpGet.mock.calls[0][0]).toBe(
    'https://example.test/air?lat=28.6139&lon=77.209&appid=test-key',
  );
});

test('reports unavailable without a request when no key is configured', async () => {
  const httpGet = jest.fn<ReturnType<HttpGet>, Parameters<HttpGet>>();
  const reading = await providerWith(httpGet, '').getOzone(location);

  expect(reading).toEqual({ kind: 'unavailable', reason: 'openweathermap: no API key configured' });
  expect(httpGet).not.toHaveBeenCalled();
});

test.each([
  ['non-2xx status', jsonResponse({ cod: 401 }, 401), 'openweathermap: HTTP 401'],
  ['empty list', jsonResponse({ list: [] }), 'openweathermap: ozone value missing from response'],
  ['missing o3', jsonResponse(airPollution(undefined)), 'openweathermap: ozone value missing from response'],
  ['string o3', jsonResponse(airPollution('64')), 'openweathermap: ozone value missing from response'],
  ['zero o3', jsonResponse(airPollution(0)), 'openweathermap: non-positive ozone value 0'],
])('%s is unavailable', async (_label, response, reason) => {
  const reading = await providerWith(async () => response).getOzone(location);
  expect(reading).toEqual({ kind: 'unavailable', reason });
});

test('network failures are unavailable, never thrown', async () => {
  const reading = await providerWith(async () => {
    throw new Error('socket hang up');
  }).getOzone(location);
  expect(reading).toEqual({ kind: 'unavailable', reason: 'openweathermap: socket hang up' });
});

test('unparseable bodies are unavailable', async () => {
  const reading = await providerWith(async () => ({
    ok: true,
    status: 200,
    json: async () => {
      throw new SyntaxError('Unexpected token < in JSON');
    },
  })).getOzone(location);
  expect(reading).toEqual({
    kind: 'unavailable',
    reason: 'openweathermap: Unexpected token < in JSON',
  });
});

test('extractOzone tolerates arbitrary shapes', () => {
  expect(extractOzone(null)).toBeUndefined();
  expect(extractOzone({ list: 'nope' })).toBeUndefined();
  expect(extractOzone({ list: [{ components: null }] })).toBeUndefined();
  expect(extractOzone(airPollution(12.5))).toBe(12.5);
});

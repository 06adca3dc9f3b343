/**
 * OpenWeatherMap Client Tests
 *
 * fetch is stubbed; no request leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenWeatherClient, WeatherAPIError, summarizeWeather } from '../client.js';
import { _clearEnvCache } from '../../config/env.js';

const berlinResponse = {
  name: 'Berlin',
  main: { temp: 12.5, feels_like: 11.2, humidity: 71 },
  weather: [{ main: 'Clouds', description: 'broken clouds' }],
  wind: { speed: 4.1 },
  sys: { country: 'DE' },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('OpenWeatherClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    _clearEnvCache();
    vi.stubEnv('OPENWEATHER_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('requests metric units for the location', async () => {
    fetchMock.mockResolvedValue(jsonResponse(berlinResponse));
    const client = new OpenWeatherClient({ apiKey: 'test-secret' });

    await client.fetch('Berlin');

    const [url] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBeInstanceOf(URL);
    if (url instanceof URL) {
      expect(url.origin + url.pathname).toBe('https://api.openweathermap.org/data/2.5/weather');
      expect(url.searchParams.get('q')).toBe('Berlin');
      expect(url.searchParams.get('appid')).toBe('test-secret');
      expect(url.searchParams.get('units')).toBe('metric');
    }
  });

  it('normalizes the response into a WeatherPayload', async () => {
    fetchMock.mockResolvedValue(jsonResponse(berlinResponse));
    const client = new OpenWeatherClient({ apiKey: 'test-secret' });

    await expect(client.fetch('Berlin')).resolves.toEqual({
      locationName: 'Berlin',
      temperature: 12.5,
      condition: 'broken clouds',
      feelsLike: 11.2,
      humidity: 71,
      windSpeed: 4.1,
      country: 'DE',
    });
  });

  it('reads the key from OPENWEATHER_API_KEY', async () => {
    vi.stubEnv('OPENWEATHER_API_KEY', 'test-weather-key');
    fetchMock.mockResolvedValue(jsonResponse(berlinResponse));

    await new OpenWeatherClient().fetch('Berlin');

    const [url] = fetchMock.mock.calls[0] ?? [];
    expect(url instanceof URL ? url.searchParams.get('appid') : null).toBe('test-weather-key');
  });

  it('fails without calling the API when no key is set', async () => {
    const client = new OpenWeatherClient();

    await expect(client.fetch('Berlin')).rejects.toThrow('OPENWEATHER_API_KEY is not set.');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports HTTP errors with status and body', async () => {
    fetchMock.mockResolvedValue(new Response('{"cod":"404","message":"city not found"}', { status: 404 }));
    const client = new OpenWeatherClient({ apiKey: 'test-secret' });

    const error = await client.fetch('Atlantis').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WeatherAPIError);
    if (error instanceof WeatherAPIError) {
      expect(error.message).toBe('Weather API error 404: {"cod":"404","message":"city not found"}');
      expect(error.status).toBe(404);
    }
  });

  it('rejects a malformed body', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ name: 'Nowhere' }));
    const client = new OpenWeatherClient({ apiKey: 'test-secret' });

    await expect(client.fetch('Nowhere')).rejects.toThrow(/^Unexpected weather API response/);
  });
});

describe('summarizeWeather', () => {
  it('renders place, temperature and condition', () => {
    expect(
      summarizeWeather({ locationName: 'Berlin', temperature: 12.5, condition: 'broken clouds', country: 'DE' })
    ).toBe('Berlin, DE: 12.5°C, broken clouds');
  });

  it('uses the unit symbol', () => {
    expect(
      summarizeWeather({ locationName: 'Austin', temperature: 80, condition: 'clear sky' }, 'imperial')
    ).toBe('Austin: 80°F, clear sky');
  });
});

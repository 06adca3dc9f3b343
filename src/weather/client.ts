/**
 * OpenWeatherMap Client
 *
 * Current-weather lookups over the REST API with the global fetch.
 * The response is validated with zod before it reaches the synthesizer.
 */

import { z } from 'zod';
import { getEnv } from '../config/env.js';
import type {
  WeatherClientOptions,
  WeatherPayload,
  WeatherProvider,
  WeatherUnits,
} from './types.js';

export const DEFAULT_WEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';
const DEFAULT_TIMEOUT_MS = 10000;

/**
 * Raised for any failed lookup: missing key, HTTP error, malformed body.
 */
export class WeatherAPIError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'WeatherAPIError';
  }
}

/**
 * The subset of the OpenWeatherMap response we use.
 */
const OpenWeatherResponseSchema = z.object({
  name: z.string(),
  main: z.object({
    temp: z.number(),
    feels_like: z.number().optional(),
    humidity: z.number().optional(),
  }),
  weather: z
    .array(z.object({ main: z.string(), description: z.string().optional() }))
    .min(1),
  wind: z.object({ speed: z.number() }).partial().optional(),
  sys: z.object({ country: z.string() }).partial().optional(),
});

type OpenWeatherResponse = z.infer<typeof OpenWeatherResponseSchema>;

function toPayload(data: OpenWeatherResponse): WeatherPayload {
  const [first] = data.weather;
  return {
    locationName: data.name,
    temperature: data.main.temp,
    condition: first?.description ?? first?.main ?? 'unknown',
    feelsLike: data.main.feels_like,
    humidity: data.main.humidity,
    windSpeed: data.wind?.speed,
    country: data.sys?.country,
  };
}

/**
 * WeatherProvider backed by OpenWeatherMap.
 *
 * @example
 * ```typescript
 * const weather = new OpenWeatherClient({ units: 'metric' });
 * const payload = await weather.fetch('Berlin');
 * payload.temperature; // 12.3
 * ```
 */
export class OpenWeatherClient implements WeatherProvider {
  private readonly baseUrl: string;
  private readonly units: WeatherUnits;
  private readonly timeoutMs: number;

  constructor(private readonly options: WeatherClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_WEATHER_URL;
    this.units = options.units ?? 'metric';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetch(location: string): Promise<WeatherPayload> {
    // Read per call so a key added to the environment later is picked up
    const apiKey = this.options.apiKey ?? getEnv('OPENWEATHER_API_KEY');
    if (!apiKey) {
      throw new WeatherAPIError('OPENWEATHER_API_KEY is not set.');
    }

    const url = new URL(this.baseUrl);
    url.searchParams.set('q', location);
    url.searchParams.set('appid', apiKey);
    url.searchParams.set('units', this.units);

    const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (response.status !== 200) {
      const body = await response.text();
      throw new WeatherAPIError(`Weather API error ${response.status}: ${body}`, response.status);
    }

    const parsed = OpenWeatherResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new WeatherAPIError(
        `Unexpected weather API response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`
      );
    }
    return toPayload(parsed.data);
  }
}

/**
 * One-line description used as the "context" of a weather answer.
 */
export function summarizeWeather(payload: WeatherPayload, units: WeatherUnits = 'metric'): string {
  const symbol = units === 'metric' ? '°C' : units === 'imperial' ? '°F' : 'K';
  const place = payload.country ? `${payload.locationName}, ${payload.country}` : payload.locationName;
  return `${place}: ${payload.temperature}${symbol}, ${payload.condition}`;
}

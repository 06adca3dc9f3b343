/**
 * Weather Types
 */

/**
 * Current conditions for one place, normalized from the provider response.
 * Temperatures follow the configured units (°C for the default "metric").
 */
export interface WeatherPayload {
  locationName: string;
  temperature: number;
  condition: string;
  feelsLike?: number;
  humidity?: number;
  windSpeed?: number;
  country?: string;
}

/**
 * Live weather lookup by place name.
 */
export interface WeatherProvider {
  fetch(location: string): Promise<WeatherPayload>;
}

export type WeatherUnits = 'metric' | 'imperial' | 'standard';

export interface WeatherClientOptions {
  /** OpenWeatherMap key; falls back to OPENWEATHER_API_KEY */
  apiKey?: string;
  /** Current-weather endpoint */
  baseUrl?: string;
  /** @default 'metric' */
  units?: WeatherUnits;
  /** @default 10000 */
  timeoutMs?: number;
}

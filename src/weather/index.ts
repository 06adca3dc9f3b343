/**
 * Weather Module
 */

export {
  OpenWeatherClient,
  WeatherAPIError,
  summarizeWeather,
  DEFAULT_WEATHER_URL,
} from './client.js';
export { extractLocation } from './location.js';
export type {
  WeatherPayload,
  WeatherProvider,
  WeatherUnits,
  WeatherClientOptions,
} from './types.js';

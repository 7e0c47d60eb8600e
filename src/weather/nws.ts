import { z } from 'zod';
import type { ResponseCaches } from '../cache/response-cache.js';
import type { Weather } from '../types/conditions.js';
import { emptyWeather } from '../types/conditions.js';
import { fetchJsonCached, type FetchOptions } from '../workers/http-client.js';
import { logger } from '../utils/logger.js';

const NWS_BASE_URL = 'https://api.weather.gov';

const pointsSchema = z.object({
  properties: z.object({
    forecast: z.string().url().nullish(),
  }),
});

const periodSchema = z.object({
  name: z.string().nullish(),
  temperature: z.number().nullish(),
  temperatureUnit: z.string().nullish(),
  windSpeed: z.string().nullish(),
  shortForecast: z.string().nullish(),
});

const forecastSchema = z.object({
  properties: z.object({
    periods: z.array(periodSchema),
  }),
});

export type ForecastPeriod = z.infer<typeof periodSchema>;

export interface WeatherResult {
  weather: Weather;
  pointsUrl: string;
  forecastUrl: string | null;
}

export function pointsUrlFor(lat: number, lon: number): string {
  return `${NWS_BASE_URL}/points/${lat},${lon}`;
}

/**
 * "10 mph", "10 to 20 mph" (upper bound wins) and "… gusts to 35 mph".
 * Returns `[wind_mph, wind_gust_mph]`.
 */
export function parseWind(windSpeed: string | null | undefined): [number | null, number | null] {
  if (!windSpeed) return [null, null];

  let wind: number | null = null;
  const speed = windSpeed.match(/(\d+)\s*(?:to\s*(\d+))?\s*mph/i);
  if (speed?.[1]) {
    wind = parseFloat(speed[2] ?? speed[1]);
  }

  const gust = windSpeed.match(/gust(?:ing|s)?\s*(?:to\s*)?(\d+)\s*mph/i);
  return [wind, gust?.[1] ? parseFloat(gust[1]) : null];
}

export function parseForecastPeriod(period: ForecastPeriod): Weather {
  const weather = emptyWeather();

  if (period.temperature !== null && period.temperature !== undefined) {
    weather.temp_f =
      period.temperatureUnit === 'C' ? (period.temperature * 9) / 5 + 32 : period.temperature;
  }

  [weather.wind_mph, weather.wind_gust_mph] = parseWind(period.windSpeed);
  weather.short_forecast = period.shortForecast ?? null;
  weather.forecast_period_name = period.name ?? null;
  return weather;
}

/**
 * Current-period forecast from api.weather.gov: a points lookup for the
 * coordinates, then the forecast URL it names. Each step has its own cache.
 * Failures are logged and yield null weather fields.
 */
export async function fetchWeather(
  lat: number,
  lon: number,
  caches: Pick<ResponseCaches, 'nwsPoints' | 'nwsForecast'>,
  opts: FetchOptions = {},
): Promise<WeatherResult> {
  const pointsUrl = pointsUrlFor(lat, lon);
  const result: WeatherResult = { weather: emptyWeather(), pointsUrl, forecastUrl: null };
  const log = logger.child({ lat, lon });

  try {
    const points = pointsSchema.parse(await fetchJsonCached(pointsUrl, caches.nwsPoints, opts));
    const forecastUrl = points.properties.forecast;
    if (!forecastUrl) {
      log.warn('No forecast URL in NWS points response');
      return result;
    }
    result.forecastUrl = forecastUrl;

    const forecast = forecastSchema.parse(await fetchJsonCached(forecastUrl, caches.nwsForecast, opts));
    const current = forecast.properties.periods[0];
    if (!current) {
      log.warn('No forecast periods in NWS response');
      return result;
    }

    result.weather = parseForecastPeriod(current);
    log.debug({ tempF: result.weather.temp_f, windMph: result.weather.wind_mph }, 'NWS weather fetched');
  } catch (err) {
    log.warn({ err }, 'Failed to fetch NWS weather');
  }

  return result;
}

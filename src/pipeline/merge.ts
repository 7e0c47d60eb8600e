import type { ResortConditions, Operations, Snow } from '../types/conditions.js';
import { emptyOperations, emptySnow, emptyWeather } from '../types/conditions.js';
import type { ResortConfig } from '../types/resort.js';
import type { WeatherResult } from '../weather/nws.js';

export function buildFreshRecord(
  resort: ResortConfig,
  parsed: { ops: Operations; snow: Snow },
  weather: WeatherResult,
  fetchedAt: Date,
): ResortConditions {
  return {
    slug: resort.slug,
    name: resort.name,
    fetched_at_utc: fetchedAt.toISOString(),
    stale: false,
    sources: {
      ops_url: resort.source_url,
      weather_points_url: weather.pointsUrl,
      weather_forecast_url: weather.forecastUrl,
    },
    ops: parsed.ops,
    snow: parsed.snow,
    weather: weather.weather,
  };
}

/**
 * Last-known-good record re-emitted as stale. `fetched_at_utc` keeps the time
 * the data was actually fetched.
 */
export function staleFromPrevious(resort: ResortConfig, previous: ResortConditions): ResortConditions {
  return {
    ...previous,
    slug: resort.slug,
    name: resort.name,
    stale: true,
  };
}

/** Placeholder for a resort that has never been fetched successfully. */
export function skeletonRecord(resort: ResortConfig, now: Date): ResortConditions {
  return {
    slug: resort.slug,
    name: resort.name,
    fetched_at_utc: now.toISOString(),
    stale: true,
    sources: {
      ops_url: resort.source_url,
      weather_points_url: null,
      weather_forecast_url: null,
    },
    ops: emptyOperations(),
    snow: emptySnow(),
    weather: emptyWeather(),
  };
}

export function fallbackRecord(
  resort: ResortConfig,
  previous: ResortConditions | null,
  now: Date,
): ResortConditions {
  return previous ? staleFromPrevious(resort, previous) : skeletonRecord(resort, now);
}

import type { Logger } from 'pino';
import { findAdapter } from '../adapters/index.js';
import type { Operations, ResortConditions, Snow } from '../types/conditions.js';
import { emptyWeather } from '../types/conditions.js';
import type { ResortConfig } from '../types/resort.js';
import { pointsUrlFor, type WeatherResult } from '../weather/nws.js';
import { logger } from '../utils/logger.js';
import { buildFreshRecord, fallbackRecord } from './merge.js';

export interface ProcessDeps {
  fetchPage(url: string): Promise<string>;
  fetchWeather(lat: number, lon: number): Promise<WeatherResult>;
  now(): Date;
}

type FreshData = { ops: Operations; snow: Snow };

async function fetchAndParse(resort: ResortConfig, deps: ProcessDeps, log: Logger): Promise<FreshData | null> {
  const adapter = findAdapter(resort.kind);
  if (!adapter) {
    log.warn({ kind: resort.kind }, 'Unknown adapter kind, not fetching');
    return null;
  }
  if (adapter.config.fetchMethod === 'headless') {
    log.warn({ kind: resort.kind }, 'Source needs headless rendering, not fetching');
    return null;
  }

  try {
    const html = await deps.fetchPage(resort.source_url);
    const result = adapter.parse(html);
    if (!result.ok) {
      log.warn({ error: result.error, needsHeadless: result.needsHeadless }, 'Parse failed');
      return null;
    }
    return { ops: result.ops, snow: result.snow };
  } catch (err) {
    log.warn({ err }, 'Fetch or parse failed');
    return null;
  }
}

async function fetchWeatherSafely(resort: ResortConfig, deps: ProcessDeps, log: Logger): Promise<WeatherResult> {
  try {
    return await deps.fetchWeather(resort.lat, resort.lon);
  } catch (err) {
    log.warn({ err }, 'Weather lookup failed');
    return { weather: emptyWeather(), pointsUrl: pointsUrlFor(resort.lat, resort.lon), forecastUrl: null };
  }
}

/**
 * Fresh record when the resort's page fetches and parses; otherwise the
 * previous record marked stale, or a stale skeleton when there is none.
 * Weather is looked up only for fresh records and never causes a fallback.
 */
export async function processResort(
  resort: ResortConfig,
  previous: ResortConditions | null,
  deps: ProcessDeps,
): Promise<ResortConditions> {
  const log = logger.child({ resort: resort.slug });
  log.debug({ kind: resort.kind, url: resort.source_url }, 'Processing resort');

  const fresh = await fetchAndParse(resort, deps, log);
  if (!fresh) {
    const record = fallbackRecord(resort, previous, deps.now());
    log.warn(
      { lastFetched: previous ? previous.fetched_at_utc : null },
      previous ? 'Using last-known-good record' : 'No previous record, emitting skeleton',
    );
    return record;
  }

  const weather = await fetchWeatherSafely(resort, deps, log);
  const record = buildFreshRecord(resort, fresh, weather, deps.now());

  const liftsAvailable = (record.ops.lifts_open ?? 0) + (record.ops.lifts_scheduled ?? 0);
  log.info({ lifts: `${liftsAvailable}/${record.ops.lifts_total ?? '?'}`, open: record.ops.open_flag }, 'Parsed conditions');
  return record;
}

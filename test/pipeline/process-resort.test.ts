import { describe, it, expect, vi } from 'vitest';
import { processResort, type ProcessDeps } from '../../src/pipeline/process-resort.js';
import { FetchError } from '../../src/workers/http-client.js';
import type { WeatherResult } from '../../src/weather/nws.js';
import { makeRecord, makeResort } from '../helpers/records.js';

const NOW = new Date('2026-01-15T14:00:00.000Z');
const POINTS_URL = 'https://api.weather.gov/points/39.3149,-119.8853';
const FORECAST_URL = 'https://api.weather.gov/gridpoints/REV/33,87/forecast';

const WEATHER: WeatherResult = {
  weather: {
    temp_f: 24,
    wind_mph: 20,
    wind_gust_mph: 35,
    short_forecast: 'Snow Showers',
    forecast_period_name: 'Tonight',
  },
  pointsUrl: POINTS_URL,
  forecastUrl: FORECAST_URL,
};

function makeDeps(overrides: Partial<ProcessDeps> = {}): ProcessDeps {
  return {
    fetchPage: vi.fn(async (url: string) => {
      throw new FetchError('HTTP 503', url, 503);
    }),
    fetchWeather: vi.fn(async () => WEATHER),
    now: () => NOW,
    ...overrides,
  };
}

describe('processResort', () => {
  it('should emit a fresh record reflecting the parsed counts', async () => {
    const resort = makeResort();
    const deps = makeDeps({
      fetchPage: vi.fn(async () => '<html><body><div class="lift-status">5 / 10 Lifts Open</div></body></html>'),
    });

    const record = await processResort(resort, null, deps);

    expect(record.slug).toBe('mt-rose');
    expect(record.name).toBe('Mt. Rose Ski Tahoe');
    expect(record.stale).toBe(false);
    expect(record.fetched_at_utc).toBe('2026-01-15T14:00:00.000Z');
    expect(record.ops.lifts_open).toBe(5);
    expect(record.ops.lifts_total).toBe(10);
    expect(record.weather).toEqual(WEATHER.weather);
    expect(record.sources).toEqual({
      ops_url: 'https://skirose.com/snow-report/',
      weather_points_url: POINTS_URL,
      weather_forecast_url: FORECAST_URL,
    });
    expect(deps.fetchPage).toHaveBeenCalledWith('https://skirose.com/snow-report/');
  });

  it('should re-emit the previous record as stale when the fetch fails', async () => {
    const resort = makeResort({
      slug: 'diamond-peak',
      name: 'Diamond Peak',
      kind: 'diamond_peak',
      source_url: 'https://www.diamondpeak.com/mountain/conditions',
    });
    const previous = makeRecord({
      slug: 'diamond-peak',
      name: 'Diamond Peak',
      fetched_at_utc: '2026-01-14T08:30:00.000Z',
      snow: {
        new_snow_24h_in: 2,
        new_snow_48h_in: null,
        base_depth_in: 40,
        season_total_in: 112,
        surface: null,
      },
    });
    const deps = makeDeps();

    const record = await processResort(resort, previous, deps);

    expect(record).toEqual({ ...previous, stale: true });
    expect(record.snow.base_depth_in).toBe(40);
    expect(record.fetched_at_utc).toBe('2026-01-14T08:30:00.000Z');
    expect(deps.fetchWeather).not.toHaveBeenCalled();
  });

  it('should emit a stale skeleton when there is no previous record', async () => {
    const record = await processResort(makeResort(), null, makeDeps());

    expect(record).toEqual(
      makeRecord({
        stale: true,
        fetched_at_utc: '2026-01-15T14:00:00.000Z',
      }),
    );
  });

  it('should fall back when the adapter cannot parse the page', async () => {
    const resort = makeResort({ slug: 'boreal', name: 'Boreal', kind: 'boreal' });
    const previous = makeRecord({ slug: 'boreal', name: 'Boreal' });
    const deps = makeDeps({ fetchPage: vi.fn(async () => '<html><body><div id="root"></div></body></html>') });

    const record = await processResort(resort, previous, deps);

    expect(record).toEqual({ ...previous, stale: true });
  });

  it('should never fetch headless-only or unknown kinds', async () => {
    for (const kind of ['placeholder_headless', 'snowbasin']) {
      const deps = makeDeps();

      const record = await processResort(makeResort({ kind }), null, deps);

      expect(record.stale).toBe(true);
      expect(deps.fetchPage).not.toHaveBeenCalled();
    }
  });

  it('should keep fresh ops when the weather lookup throws', async () => {
    const deps = makeDeps({
      fetchPage: vi.fn(async () => '<html><body><div class="lift-status">5 / 10 Lifts Open</div></body></html>'),
      fetchWeather: vi.fn(async () => {
        throw new Error('forecast offline');
      }),
    });

    const record = await processResort(makeResort(), null, deps);

    expect(record.stale).toBe(false);
    expect(record.ops.lifts_open).toBe(5);
    expect(record.weather).toEqual({
      temp_f: null,
      wind_mph: null,
      wind_gust_mph: null,
      short_forecast: null,
      forecast_period_name: null,
    });
    expect(record.sources.weather_points_url).toBe(POINTS_URL);
    expect(record.sources.weather_forecast_url).toBeNull();
  });
});

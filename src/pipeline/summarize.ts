import type { ResortConditions } from '../types/conditions.js';
import type { Summary, SummaryCounts } from '../types/summary.js';
import { formatUtcMinutes } from '../utils/date.js';

const WINDY_MPH = 15;
const COLD_F = 32;

function whole(value: number): string {
  return value.toFixed(0);
}

/** Element with the largest key; the first one wins ties. */
function maxBy<T>(items: T[], key: (item: T) => number): T | undefined {
  let best: T | undefined;
  let bestKey = -Infinity;
  for (const item of items) {
    const value = key(item);
    if (best === undefined || value > bestKey) {
      best = item;
      bestKey = value;
    }
  }
  return best;
}

/** One-sentence status line for a resort. */
export function generateBlurb(record: ResortConditions): string {
  if (record.stale) {
    return (
      'Latest update unavailable; showing last known conditions ' +
      `from ${formatUtcMinutes(record.fetched_at_utc)} UTC.`
    );
  }

  const parts = [`${record.name}:`];
  const { ops, snow, weather } = record;

  // Scheduled lifts and trails count as available.
  const liftsAvailable = (ops.lifts_open ?? 0) + (ops.lifts_scheduled ?? 0);
  const trailsAvailable = (ops.trails_open ?? 0) + (ops.trails_scheduled ?? 0);

  if (ops.lifts_total !== null) {
    const end = ops.trails_total === null ? '.' : '';
    parts.push(`${liftsAvailable}/${ops.lifts_total} lifts${end}`);
  }
  if (ops.trails_total !== null) {
    parts.push(`${trailsAvailable}/${ops.trails_total} trails.`);
  }

  if (snow.new_snow_24h_in !== null) {
    parts.push(`New snow (24h): ${whole(snow.new_snow_24h_in)}".`);
  } else if (snow.base_depth_in !== null) {
    parts.push(`Base: ${whole(snow.base_depth_in)}".`);
  }

  const forecast: string[] = [];
  if (weather.short_forecast) forecast.push(weather.short_forecast);
  if (weather.temp_f !== null) forecast.push(`${whole(weather.temp_f)}°F`);
  if (weather.wind_mph !== null) forecast.push(`wind ${whole(weather.wind_mph)} mph`);
  if (forecast.length > 0) {
    parts.push(`Forecast: ${forecast.join(', ')}.`);
  }

  return parts.join(' ');
}

/** Notable conditions among resorts that are open and fresh. */
export function computeHighlights(records: ResortConditions[]): string[] {
  const active = records.filter((r) => !r.stale && r.ops.open_flag === true);
  if (active.length === 0) {
    return ['All resorts are currently closed or unavailable.'];
  }

  const highlights: string[] = [];

  const withTrails = active.flatMap((r) =>
    r.ops.trails_open && r.ops.trails_total
      ? [{ name: r.name, open: r.ops.trails_open, total: r.ops.trails_total }]
      : [],
  );
  const bestTerrain = maxBy(withTrails, (t) => t.open / t.total);
  if (bestTerrain) {
    const pct = (bestTerrain.open / bestTerrain.total) * 100;
    highlights.push(
      `Most open terrain: ${bestTerrain.name} (${bestTerrain.open}/${bestTerrain.total} trails, ${whole(pct)}%)`,
    );
  }

  const withSnow = active.flatMap((r) =>
    r.snow.new_snow_24h_in !== null && r.snow.new_snow_24h_in > 0
      ? [{ name: r.name, inches: r.snow.new_snow_24h_in }]
      : [],
  );
  const snowiest = maxBy(withSnow, (s) => s.inches);
  if (snowiest) {
    highlights.push(`Most new snow: ${snowiest.name} (${whole(snowiest.inches)}" in 24h)`);
  }

  const withWind = active.flatMap((r) =>
    r.weather.wind_mph !== null ? [{ name: r.name, mph: r.weather.wind_mph }] : [],
  );
  const windiest = maxBy(withWind, (w) => w.mph);
  if (windiest && windiest.mph >= WINDY_MPH) {
    highlights.push(`Windiest: ${windiest.name} (${whole(windiest.mph)} mph)`);
  }

  const withTemp = active.flatMap((r) =>
    r.weather.temp_f !== null ? [{ name: r.name, tempF: r.weather.temp_f }] : [],
  );
  const coldest = maxBy(withTemp, (t) => -t.tempF);
  if (coldest && coldest.tempF <= COLD_F) {
    highlights.push(`Coldest: ${coldest.name} (${whole(coldest.tempF)}°F)`);
  }

  return highlights;
}

export function generateSummary(records: ResortConditions[], now: Date = new Date()): Summary {
  const counts: SummaryCounts = { open_resorts: 0, closed_resorts: 0, stale_resorts: 0 };
  const blurbs: Record<string, string> = {};

  for (const record of records) {
    blurbs[record.slug] = generateBlurb(record);

    if (record.stale) counts.stale_resorts++;
    else if (record.ops.open_flag === true) counts.open_resorts++;
    else counts.closed_resorts++;
  }

  return {
    last_updated_utc: now.toISOString(),
    counts,
    highlights: computeHighlights(records),
    blurbs,
  };
}

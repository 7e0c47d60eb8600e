import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { runUpdate } from '../../src/pipeline/update.js';
import { RegistryError } from '../../src/registry/loader.js';
import { resortFilePath, writeJsonAtomic } from '../../src/output/writer.js';
import type { ProcessDeps } from '../../src/pipeline/process-resort.js';
import type { Summary } from '../../src/types/summary.js';
import { emptySnow } from '../../src/types/conditions.js';
import { makeRecord } from '../helpers/records.js';

const NOW = new Date('2026-01-15T14:00:00.000Z');

const REGISTRY = `resorts:
  - slug: mt-rose
    name: Mt. Rose Ski Tahoe
    kind: mt_rose
    source_url: https://skirose.com/snow-report/
    lat: 39.3149
    lon: -119.8853
  - slug: diamond-peak
    name: Diamond Peak
    kind: diamond_peak
    source_url: https://www.diamondpeak.com/mountain/conditions
    lat: 39.2538
    lon: -119.9214
  - slug: kirkwood
    name: Kirkwood
    kind: placeholder_headless
    source_url: https://www.kirkwood.com/the-mountain/mountain-conditions/
    lat: 38.6849
    lon: -120.0652
  - slug: boreal
    name: Boreal
    kind: boreal
    source_url: https://www.rideboreal.com/mountain/conditions
    lat: 39.3363
    lon: -120.3497
    enabled: false
`;

describe('runUpdate', () => {
  let dir: string;
  let resortsFile: string;
  let outputDir: string;

  function readJson(file: string): unknown {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
  }

  function makeDeps(): ProcessDeps {
    return {
      fetchPage: vi.fn(async (url: string) => {
        if (url === 'https://skirose.com/snow-report/') {
          return '<html><body><div class="lift-status">5 / 10 Lifts Open</div></body></html>';
        }
        throw new Error(`unreachable: ${url}`);
      }),
      fetchWeather: vi.fn(async (lat: number, lon: number) => ({
        weather: {
          temp_f: 24,
          wind_mph: 12,
          wind_gust_mph: null,
          short_forecast: 'Snow Showers',
          forecast_period_name: 'Today',
        },
        pointsUrl: `https://api.weather.gov/points/${lat},${lon}`,
        forecastUrl: null,
      })),
      now: () => NOW,
    };
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'update-'));
    resortsFile = path.join(dir, 'resorts.yaml');
    outputDir = path.join(dir, 'public', 'data');
    fs.writeFileSync(resortsFile, REGISTRY);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should process enabled resorts in registry order and write every output', async () => {
    const previous = makeRecord({
      slug: 'diamond-peak',
      name: 'Diamond Peak',
      fetched_at_utc: '2026-01-14T08:30:00.000Z',
      sources: {
        ops_url: 'https://www.diamondpeak.com/mountain/conditions',
        weather_points_url: null,
        weather_forecast_url: null,
      },
      snow: { ...emptySnow(), base_depth_in: 40 },
    });
    await writeJsonAtomic(resortFilePath(outputDir, 'diamond-peak'), previous);
    const deps = makeDeps();

    const { records, summary } = await runUpdate({ resortsFile, outputDir, deps });

    expect(records.map((r) => r.slug)).toEqual(['mt-rose', 'diamond-peak', 'kirkwood']);
    expect(records.map((r) => r.stale)).toEqual([false, true, true]);
    expect(records[0]?.ops.lifts_open).toBe(5);
    expect(records[0]?.sources.weather_points_url).toBe('https://api.weather.gov/points/39.3149,-119.8853');
    expect(records[1]).toEqual({ ...previous, stale: true });
    expect(records[2]?.fetched_at_utc).toBe('2026-01-15T14:00:00.000Z');
    expect(deps.fetchWeather).toHaveBeenCalledTimes(1);

    const latest = readJson(path.join(outputDir, 'latest.json'));
    expect(latest).toEqual(records);

    const written = readJson(path.join(outputDir, 'summary.json'));
    expect(written).toEqual(summary);
    const expectedCounts: Summary['counts'] = { open_resorts: 1, closed_resorts: 0, stale_resorts: 2 };
    expect(summary.counts).toEqual(expectedCounts);
    expect(summary.last_updated_utc).toBe('2026-01-15T14:00:00.000Z');
    expect(summary.blurbs['diamond-peak']).toBe(
      'Latest update unavailable; showing last known conditions from 2026-01-14 08:30 UTC.',
    );

    expect(readJson(resortFilePath(outputDir, 'kirkwood'))).toEqual(records[2]);
    expect(fs.existsSync(resortFilePath(outputDir, 'boreal'))).toBe(false);
  });

  it('should reject a registry without enabled resorts', async () => {
    fs.writeFileSync(
      resortsFile,
      `resorts:
  - slug: boreal
    name: Boreal
    kind: boreal
    source_url: https://www.rideboreal.com/mountain/conditions
    lat: 39.3363
    lon: -120.3497
    enabled: false
`,
    );

    await expect(runUpdate({ resortsFile, outputDir, deps: makeDeps() })).rejects.toBeInstanceOf(RegistryError);
    expect(fs.existsSync(outputDir)).toBe(false);
  });

  it('should write nothing when the registry is invalid', async () => {
    fs.writeFileSync(resortsFile, 'resorts: mt-rose\n');

    await expect(runUpdate({ resortsFile, outputDir, deps: makeDeps() })).rejects.toThrow(
      /^Invalid resort registry /,
    );
    expect(fs.existsSync(outputDir)).toBe(false);
  });
});

import { config } from '../config.js';
import { createCaches } from '../cache/response-cache.js';
import { getEnabledResorts, RegistryError } from '../registry/loader.js';
import { loadPreviousRecords, writeAllOutputs } from '../output/writer.js';
import type { ResortConditions } from '../types/conditions.js';
import type { Summary } from '../types/summary.js';
import { fetchWeather } from '../weather/nws.js';
import { fetchCached } from '../workers/http-client.js';
import { logger } from '../utils/logger.js';
import { fallbackRecord } from './merge.js';
import { processResort, type ProcessDeps } from './process-resort.js';
import { generateSummary } from './summarize.js';

export interface UpdateOptions {
  resortsFile?: string;
  outputDir?: string;
  /** Replaces network access and the clock, e.g. in tests. */
  deps?: Partial<ProcessDeps>;
}

export interface UpdateResult {
  records: ResortConditions[];
  summary: Summary;
}

function defaultDeps(): ProcessDeps {
  const caches = createCaches();
  return {
    fetchPage: (url) => fetchCached(url, caches.conditions),
    fetchWeather: (lat, lon) => fetchWeather(lat, lon, caches),
    now: () => new Date(),
  };
}

/**
 * One update cycle: load the enabled resorts and the last-known-good
 * snapshot, process each resort in registry order, then write every output.
 * Registry and write errors propagate; per-resort failures never do.
 */
export async function runUpdate(options: UpdateOptions = {}): Promise<UpdateResult> {
  const resortsFile = options.resortsFile ?? config.RESORTS_FILE;
  const outputDir = options.outputDir ?? config.OUTPUT_DIR;
  const deps: ProcessDeps = { ...defaultDeps(), ...options.deps };

  const resorts = await getEnabledResorts(resortsFile);
  if (resorts.length === 0) {
    throw new RegistryError(`No enabled resorts in ${resortsFile}`);
  }
  logger.info({ resorts: resorts.length, resortsFile }, 'Starting update');

  const previous = await loadPreviousRecords(
    outputDir,
    resorts.map((resort) => resort.slug),
  );

  const records: ResortConditions[] = [];
  for (const resort of resorts) {
    const last = previous.get(resort.slug) ?? null;
    try {
      records.push(await processResort(resort, last, deps));
    } catch (err) {
      logger.error({ err, resort: resort.slug }, 'Unexpected error processing resort');
      records.push(fallbackRecord(resort, last, deps.now()));
    }
  }

  const summary = generateSummary(records, deps.now());
  await writeAllOutputs(outputDir, records, summary);

  logger.info(summary.counts, 'Update complete');
  return { records, summary };
}

import { createHash } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { config, type Config } from '../config.js';
import { logger } from '../utils/logger.js';

const entrySchema = z.object({
  url: z.string(),
  storedAt: z.number(),
  body: z.string(),
});

type CacheEntry = z.infer<typeof entrySchema>;

export interface ResponseCacheOptions {
  /** Subdirectory of the cache dir and the `cache` field in log lines. */
  namespace: string;
  ttlSeconds: number;
  /** Directory for persisted entries; memory-only when null. */
  dir: string | null;
  now?: () => number;
}

function buildKey(url: string): string {
  return createHash('sha256').update(url).digest('hex').slice(0, 16);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * URL-keyed TTL cache for response bodies. Entries live in memory and, when a
 * directory is set, in `<dir>/<sha256(url)[0..16]>.json` so later runs inside
 * the TTL window skip the network. Failures reading or writing entries are
 * logged and treated as misses.
 */
export class ResponseCache {
  readonly namespace: string;
  private readonly ttlMs: number;
  private readonly dir: string | null;
  private readonly now: () => number;
  private readonly memory = new Map<string, CacheEntry>();

  constructor(options: ResponseCacheOptions) {
    this.namespace = options.namespace;
    this.ttlMs = options.ttlSeconds * 1000;
    this.dir = options.dir;
    this.now = options.now ?? Date.now;
  }

  async get(url: string): Promise<string | null> {
    const inMemory = this.memory.get(url);
    if (inMemory && this.isFresh(inMemory)) return inMemory.body;

    const onDisk = await this.readEntry(url);
    if (onDisk && this.isFresh(onDisk)) {
      this.memory.set(url, onDisk);
      return onDisk.body;
    }
    return null;
  }

  async set(url: string, body: string): Promise<void> {
    const entry: CacheEntry = { url, storedAt: this.now(), body };
    this.memory.set(url, entry);
    if (!this.dir) return;

    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(this.entryPath(this.dir, url), JSON.stringify(entry), 'utf-8');
    } catch (err) {
      logger.warn({ err, cache: this.namespace, url }, 'Cache write failed');
    }
  }

  private isFresh(entry: CacheEntry): boolean {
    return this.now() - entry.storedAt < this.ttlMs;
  }

  private entryPath(dir: string, url: string): string {
    return path.join(dir, `${buildKey(url)}.json`);
  }

  private async readEntry(url: string): Promise<CacheEntry | null> {
    if (!this.dir) return null;

    try {
      const raw = await readFile(this.entryPath(this.dir, url), 'utf-8');
      const parsed = entrySchema.safeParse(JSON.parse(raw));
      // A hash collision stores another URL's entry under this key.
      if (parsed.success && parsed.data.url === url) return parsed.data;
      logger.warn({ cache: this.namespace, url }, 'Ignoring malformed cache entry');
    } catch (err) {
      if (!isMissingFile(err)) {
        logger.warn({ err, cache: this.namespace, url }, 'Cache read failed');
      }
    }
    return null;
  }
}

export interface ResponseCaches {
  conditions: ResponseCache;
  nwsPoints: ResponseCache;
  nwsForecast: ResponseCache;
}

/** One cache per upstream dependency, each with its own TTL. */
export function createCaches(
  settings: Pick<
    Config,
    | 'CACHE_DIR'
    | 'CONDITIONS_CACHE_TTL_SECONDS'
    | 'NWS_POINTS_CACHE_TTL_SECONDS'
    | 'NWS_FORECAST_CACHE_TTL_SECONDS'
  > & { persist?: boolean } = config,
): ResponseCaches {
  const persist = settings.persist ?? true;
  const make = (namespace: string, ttlSeconds: number) =>
    new ResponseCache({
      namespace,
      ttlSeconds,
      dir: persist ? path.join(settings.CACHE_DIR, namespace) : null,
    });

  return {
    conditions: make('conditions', settings.CONDITIONS_CACHE_TTL_SECONDS),
    nwsPoints: make('nws-points', settings.NWS_POINTS_CACHE_TTL_SECONDS),
    nwsForecast: make('nws-forecast', settings.NWS_FORECAST_CACHE_TTL_SECONDS),
  };
}

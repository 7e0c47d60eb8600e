import { request } from 'undici';
import { config, USER_AGENT } from '../config.js';
import { waitForHost } from '../compliance/rate-limiter.js';
import type { ResponseCache } from '../cache/response-cache.js';
import { logger } from '../utils/logger.js';

export interface HttpResult {
  body: string;
  status: number;
}

export interface FetchOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** Extra attempts after the first, for network errors and 5xx responses. */
  maxRetries?: number;
  /** First backoff delay; doubles on every retry. */
  retryDelayMs?: number;
  /** Minimum gap between requests to one host. */
  rateLimitMs?: number;
}

export class FetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': USER_AGENT,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

const JSON_ACCEPT = 'application/geo+json,application/json';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * GET with per-host rate limiting and exponential backoff. Network errors and
 * 5xx responses are retried; any other non-2xx status fails immediately.
 */
export async function fetchHttp(url: string, opts: FetchOptions = {}): Promise<HttpResult> {
  const {
    headers = {},
    timeoutMs = config.REQUEST_TIMEOUT_MS,
    maxRetries = config.MAX_RETRIES,
    retryDelayMs = config.RETRY_BASE_DELAY_MS,
    rateLimitMs = config.RATE_LIMIT_MS,
  } = opts;
  let lastError: FetchError | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const backoffMs = retryDelayMs * 2 ** (attempt - 1);
      logger.debug({ url, attempt, backoffMs, err: lastError?.message }, 'Retrying request');
      await sleep(backoffMs);
    }

    await waitForHost(url, rateLimitMs);

    let status: number;
    let body: string;
    try {
      logger.debug({ url, attempt }, 'Fetching');
      const response = await request(url, {
        method: 'GET',
        headers: { ...DEFAULT_HEADERS, ...headers },
        maxRedirections: 3,
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
      });
      status = response.statusCode;
      body = await response.body.text();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      lastError = new FetchError(`Request failed: ${message}`, url, null, { cause: err });
      continue;
    }

    if (status >= 500) {
      lastError = new FetchError(`HTTP ${status}`, url, status);
      continue;
    }
    if (status < 200 || status >= 300) {
      throw new FetchError(`HTTP ${status}`, url, status);
    }
    return { body, status };
  }

  throw lastError ?? new FetchError('Request was not attempted', url);
}

/** Body from the cache when fresh, otherwise fetched and stored. */
export async function fetchCached(
  url: string,
  cache: ResponseCache,
  opts: FetchOptions = {},
): Promise<string> {
  const cached = await cache.get(url);
  if (cached !== null) {
    logger.debug({ url, cache: cache.namespace }, 'Cache hit');
    return cached;
  }

  const { body } = await fetchHttp(url, opts);
  await cache.set(url, body);
  return body;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; error: unknown } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error };
  }
}

/** Like {@link fetchCached}, for JSON APIs. Bodies that do not parse are never cached. */
export async function fetchJsonCached(
  url: string,
  cache: ResponseCache,
  opts: FetchOptions = {},
): Promise<unknown> {
  const cached = await cache.get(url);
  if (cached !== null) {
    const parsed = parseJson(cached);
    if (parsed.ok) {
      logger.debug({ url, cache: cache.namespace }, 'Cache hit');
      return parsed.value;
    }
  }

  const { body } = await fetchHttp(url, {
    ...opts,
    headers: { Accept: JSON_ACCEPT, ...opts.headers },
  });
  const parsed = parseJson(body);
  if (!parsed.ok) {
    throw new FetchError('Response is not valid JSON', url, null, { cause: parsed.error });
  }

  await cache.set(url, body);
  return parsed.value;
}

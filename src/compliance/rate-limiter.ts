import { logger } from '../utils/logger.js';

/** Start time of the latest request per host, for the life of the process. */
const lastRequestAt = new Map<string, number>();

/**
 * Delays until `minDelayMs` has passed since the previous request to the
 * URL's host, then records this one. Resolves to the milliseconds waited.
 */
export async function waitForHost(url: string, minDelayMs: number): Promise<number> {
  const host = new URL(url).host;
  const last = lastRequestAt.get(host);
  const waitMs = last === undefined ? 0 : Math.max(0, last + minDelayMs - Date.now());

  if (waitMs > 0) {
    logger.debug({ host, waitMs }, 'Waiting for host rate limit');
    await new Promise((resolve) => setTimeout(resolve, waitMs));
  }

  lastRequestAt.set(host, Date.now());
  return waitMs;
}

import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
  name: 'tahoe-conditions',
  level: config.LOG_LEVEL,
});

/** Lowers the level to debug for `--verbose` runs. */
export function enableVerbose(): void {
  logger.level = 'debug';
}

import { z } from 'zod';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  /** Sent in the User-Agent; api.weather.gov rejects anonymous clients. */
  CONTACT_EMAIL: z.string().email().default('tahoe-conditions-bot@example.com'),
  RESORTS_FILE: z.string().default('./resorts.yaml'),
  OUTPUT_DIR: z.string().default('./public/data'),
  CACHE_DIR: z.string().default('./.cache'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  RATE_LIMIT_MS: z.coerce.number().int().nonnegative().default(1500),
  MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  CONDITIONS_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(900),
  NWS_POINTS_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(86400),
  NWS_FORECAST_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(3600),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;

export const USER_AGENT = `TahoeConditionsBot/0.1 (${config.CONTACT_EMAIL})`;

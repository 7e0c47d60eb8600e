import { z } from 'zod';

export const sourcesSchema = z.object({
  ops_url: z.string(),
  weather_points_url: z.string().nullable(),
  weather_forecast_url: z.string().nullable(),
});
export type Sources = z.infer<typeof sourcesSchema>;

export const operationsSchema = z.object({
  open_flag: z.boolean().nullable(),
  lifts_open: z.number().int().nullable(),
  /** Lifts planned to open later today. */
  lifts_scheduled: z.number().int().nullable(),
  lifts_total: z.number().int().nullable(),
  trails_open: z.number().int().nullable(),
  trails_scheduled: z.number().int().nullable(),
  trails_total: z.number().int().nullable(),
});
export type Operations = z.infer<typeof operationsSchema>;

export const snowSchema = z.object({
  new_snow_24h_in: z.number().nullable(),
  new_snow_48h_in: z.number().nullable(),
  base_depth_in: z.number().nullable(),
  season_total_in: z.number().nullable(),
  surface: z.string().nullable(),
});
export type Snow = z.infer<typeof snowSchema>;

export const weatherSchema = z.object({
  temp_f: z.number().nullable(),
  wind_mph: z.number().nullable(),
  wind_gust_mph: z.number().nullable(),
  short_forecast: z.string().nullable(),
  forecast_period_name: z.string().nullable(),
});
export type Weather = z.infer<typeof weatherSchema>;

/** The per-resort record written to public/data/resorts/<slug>.json. */
export const resortConditionsSchema = z.object({
  slug: z.string().min(1),
  name: z.string().min(1),
  fetched_at_utc: z.string().datetime({ offset: true }),
  stale: z.boolean(),
  sources: sourcesSchema,
  ops: operationsSchema,
  snow: snowSchema,
  weather: weatherSchema,
});
export type ResortConditions = z.infer<typeof resortConditionsSchema>;

export function emptyOperations(): Operations {
  return {
    open_flag: null,
    lifts_open: null,
    lifts_scheduled: null,
    lifts_total: null,
    trails_open: null,
    trails_scheduled: null,
    trails_total: null,
  };
}

export function emptySnow(): Snow {
  return {
    new_snow_24h_in: null,
    new_snow_48h_in: null,
    base_depth_in: null,
    season_total_in: null,
    surface: null,
  };
}

export function emptyWeather(): Weather {
  return {
    temp_f: null,
    wind_mph: null,
    wind_gust_mph: null,
    short_forecast: null,
    forecast_period_name: null,
  };
}

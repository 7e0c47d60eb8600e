import { z } from 'zod';
import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import type { Operations, Snow } from '../types/conditions.js';
import { emptySnow } from '../types/conditions.js';
import { firstNumber, firstPair } from '../utils/parse.js';
import { logger } from '../utils/logger.js';

const terrainFeedSchema = z
  .object({
    Lifts: z.array(z.object({ Status: z.union([z.number(), z.string()]).optional() }).passthrough()).optional(),
    GroomingAreas: z
      .array(
        z
          .object({
            Trails: z.array(z.object({ IsOpen: z.boolean().optional() }).passthrough()).optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

type TerrainFeed = z.infer<typeof terrainFeedSchema>;

const snowValueSchema = z
  .union([z.object({ Inches: z.union([z.string(), z.number()]).optional() }).passthrough(), z.string(), z.number()])
  .nullable()
  .optional();

const snowReportSchema = z
  .object({
    TwentyFourHourSnowfall: snowValueSchema,
    OvernightSnowfall: snowValueSchema,
    FortyEightHourSnowfall: snowValueSchema,
    BaseDepth: snowValueSchema,
    CurrentSeason: snowValueSchema,
  })
  .passthrough();

type SnowValue = z.infer<typeof snowValueSchema>;

interface StatusCounts {
  open: number;
  scheduled: number;
  total: number;
}

/**
 * Vail Resorts terrain-and-lift-status pages (Heavenly, Northstar, Kirkwood).
 *
 * The pages embed two script globals:
 * - `FR.TerrainStatusFeed`: lifts with a numeric or string `Status`, trails
 *   nested under `GroomingAreas[].Trails[]` with an `IsOpen` flag
 * - `FR.snowReportData`: snowfall values as `{ Inches, Centimeters }` or
 *   "5 inches / 12 cm" strings
 *
 * Both are object literals that may carry trailing commas. When either is
 * missing, the "X / Y Lifts" text and snow labels are used instead.
 */
export class VailResortsAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'vail_resorts',
    name: 'Vail Resorts',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const terrain = this.extractScriptJson(html, 'TerrainStatusFeed', terrainFeedSchema);
    const snowReport = this.extractScriptJson(html, 'snowReportData', snowReportSchema);

    const $ = this.load(html);
    const text = this.pageText($);
    const ops = this.emptyOps();

    if (terrain?.Lifts) {
      const counts = this.countLiftStatuses(terrain.Lifts);
      ops.lifts_open = counts.open;
      ops.lifts_scheduled = counts.scheduled;
      ops.lifts_total = counts.total;
    } else {
      const lifts = firstPair(text, /(\d+)\s*\/\s*(\d+)\s*Lifts?/i);
      if (lifts) [ops.lifts_open, ops.lifts_total] = lifts;
    }

    this.fillTrails(terrain, text, ops);

    const snow = snowReport ? this.parseSnowReport(snowReport) : this.parseSnowText(text);

    ops.open_flag = this.openFromCounts(ops);
    return this.success(ops, snow);
  }

  private extractScriptJson<T>(html: string, globalName: string, schema: z.ZodType<T>): T | null {
    const match = html.match(new RegExp(`FR\\.${globalName}\\s*=\\s*(\\{[^;]+\\});`));
    if (!match?.[1]) return null;

    try {
      const cleaned = match[1].replace(/,\s*([}\]])/g, '$1');
      const parsed = schema.safeParse(JSON.parse(cleaned));
      if (parsed.success) return parsed.data;
      logger.debug({ globalName, issues: parsed.error.issues }, 'Unexpected script data shape');
    } catch (err) {
      logger.debug({ globalName, err }, 'Failed to parse script data');
    }
    return null;
  }

  private fillTrails(terrain: TerrainFeed | null, text: string, ops: Operations): void {
    const trails = (terrain?.GroomingAreas ?? []).flatMap((area) => area.Trails ?? []);
    if (trails.length > 0) {
      const open = trails.filter((trail) => trail.IsOpen === true).length;
      ops.trails_open = open;
      ops.trails_scheduled = 0;
      ops.trails_total = trails.length;
      return;
    }

    const fromText = firstPair(text, /(\d+)\s*\/\s*(\d+)\s*(?:Trails?|Runs?)/i);
    if (fromText) [ops.trails_open, ops.trails_total] = fromText;
  }

  /** Status is 0/"Closed", 1/"Open", 2/"On-Hold" or 3/"Scheduled". */
  private countLiftStatuses(lifts: Array<{ Status?: number | string }>): StatusCounts {
    const counts: StatusCounts = { open: 0, scheduled: 0, total: 0 };

    for (const lift of lifts) {
      counts.total++;
      const status = lift.Status ?? 0;
      if (typeof status === 'number') {
        if (status === 1) counts.open++;
        else if (status === 3) counts.scheduled++;
      } else {
        const lower = status.toLowerCase();
        if (lower === 'open') counts.open++;
        else if (lower === 'scheduled') counts.scheduled++;
      }
    }

    return counts;
  }

  private parseSnowReport(report: z.infer<typeof snowReportSchema>): Snow {
    const snow = emptySnow();
    snow.new_snow_24h_in =
      this.extractInches(report.TwentyFourHourSnowfall) ?? this.extractInches(report.OvernightSnowfall);
    snow.new_snow_48h_in = this.extractInches(report.FortyEightHourSnowfall);
    snow.base_depth_in = this.extractInches(report.BaseDepth);
    snow.season_total_in = this.extractInches(report.CurrentSeason);
    return snow;
  }

  private extractInches(value: SnowValue): number | null {
    if (value === null || value === undefined || value === '') return null;
    if (typeof value === 'number') return value;
    if (typeof value === 'string') {
      const match = value.match(/(\d+(?:\.\d+)?)\s*inch/i);
      return match?.[1] ? parseFloat(match[1]) : null;
    }

    const inches = value.Inches === undefined ? '' : String(value.Inches).trim();
    if (inches === '') return null;
    const parsed = parseFloat(inches);
    return Number.isNaN(parsed) ? null : parsed;
  }

  private parseSnowText(text: string): Snow {
    const snow = emptySnow();
    snow.new_snow_24h_in = firstNumber(text, /24\s*(?:hr|hour)s?[:\s]*(\d+(?:\.\d+)?)/i);
    snow.new_snow_48h_in = firstNumber(text, /48\s*(?:hr|hour)s?[:\s]*(\d+(?:\.\d+)?)/i);
    snow.base_depth_in = firstNumber(text, /base[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i);
    snow.season_total_in = firstNumber(text, /season[:\s]*(\d+(?:\.\d+)?)/i);
    return snow;
  }
}

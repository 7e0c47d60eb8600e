import { z } from 'zod';
import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import type { Operations, Snow } from '../types/conditions.js';
import { firstNumber, firstPair } from '../utils/parse.js';
import { logger } from '../utils/logger.js';

/** A number or numeric string; null, blanks and unparseable text read as absent. */
const looseNumber = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const parsed = typeof value === 'number' ? value : value.trim() === '' ? NaN : Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  });

const looseCount = looseNumber.transform((value) => (value !== null && Number.isInteger(value) ? value : null));

const countSchema = z.object({
  open: looseCount,
  total: looseCount,
});

const initialStateSchema = z.object({
  lifts: countSchema.optional(),
  trails: countSchema.optional(),
  runs: countSchema.optional(),
  snow: z
    .object({
      '24hr': looseNumber,
      base: looseNumber,
      season: looseNumber,
    })
    .optional(),
});

type InitialState = z.infer<typeof initialStateSchema>;

/**
 * Palisades Tahoe, served through the mtnfeed conditions widget.
 *
 * The widget renders cards like `<h3>Lifts</h3> … <strong>26/39</strong> Open`
 * and a `4" - 10" New Snow` line (24h and 48h). When the page embeds
 * `window.__INITIAL_STATE__`, its figures take precedence; null or
 * non-numeric values there leave the widget figures in place.
 */
export class PalisadesAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'palisades',
    name: 'Palisades Tahoe',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const ops = this.emptyOps();
    const snow = this.emptySnow();

    const widgetLifts = firstPair(html, /Lifts<\/h3>[\s\S]*?<strong>(\d+)\/(\d+)<\/strong>[\s\S]*?Open/i);
    if (widgetLifts) [ops.lifts_open, ops.lifts_total] = widgetLifts;

    const widgetTrails = firstPair(html, /Trails<\/h3>[\s\S]*?<strong>(\d+)\/(\d+)<\/strong>[\s\S]*?Open/i);
    if (widgetTrails) [ops.trails_open, ops.trails_total] = widgetTrails;

    const state = this.extractInitialState(html);
    const text = this.pageText(this.load(html));

    if (ops.lifts_open === null) {
      const lifts = firstPair(
        text,
        /(\d+)\s*(?:of|\/)\s*(\d+)\s*lifts?\s*(?:open|running)/i,
        /lifts?\s*(?:open|running)[:\s]*(\d+)\s*(?:of|\/)\s*(\d+)/i,
      );
      if (lifts) [ops.lifts_open, ops.lifts_total] = lifts;
    }

    if (ops.trails_open === null) {
      const trails = firstPair(
        text,
        /(\d+)\s*(?:of|\/)\s*(\d+)\s*(?:trails?|runs?)\s*(?:open|groomed)/i,
        /(?:trails?|runs?)\s*(?:open|groomed)[:\s]*(\d+)\s*(?:of|\/)\s*(\d+)/i,
      );
      if (trails) [ops.trails_open, ops.trails_total] = trails;
    }

    // '4" - 10" New Snow' is 24h then 48h; '0" - --"' means no 48h figure.
    const newSnow = text.match(/(\d+)"\s*-\s*(?:(\d+)|--)".*?New\s*Snow/i);
    if (newSnow?.[1]) {
      snow.new_snow_24h_in = parseFloat(newSnow[1]);
      if (newSnow[2]) snow.new_snow_48h_in = parseFloat(newSnow[2]);
    }
    snow.base_depth_in = firstNumber(text, /Base.*?(\d{2,3})"/i);
    snow.season_total_in = firstNumber(text, /(?:Season\s*Total|YTD|Season).*?(\d{2,3})"/i);

    if (state) this.applyInitialState(state, ops, snow);

    if (ops.lifts_open !== null) {
      ops.open_flag = ops.lifts_open > 0;
    } else if (ops.trails_open !== null) {
      ops.open_flag = ops.trails_open > 0;
    }

    if (ops.lifts_open === null && ops.trails_open === null) {
      return this.failure('Could not extract lift/trail data from page');
    }
    return this.success(ops, snow);
  }

  private extractInitialState(html: string): InitialState | null {
    const match = html.match(/__INITIAL_STATE__\s*=\s*(\{[\s\S]+?\});/);
    if (!match?.[1]) return null;

    try {
      const parsed = initialStateSchema.safeParse(JSON.parse(match[1]));
      if (parsed.success) return parsed.data;
      logger.debug({ issues: parsed.error.issues }, 'Unexpected mtnfeed state shape');
    } catch (err) {
      logger.debug({ err }, 'Failed to parse mtnfeed state');
    }
    return null;
  }

  private applyInitialState(state: InitialState, ops: Operations, snow: Snow): void {
    if (state.lifts) {
      ops.lifts_open = state.lifts.open ?? ops.lifts_open;
      ops.lifts_total = state.lifts.total ?? ops.lifts_total;
    }

    const trails = state.trails ?? state.runs;
    if (trails) {
      ops.trails_open = trails.open ?? ops.trails_open;
      ops.trails_total = trails.total ?? ops.trails_total;
    }

    if (state.snow) {
      snow.new_snow_24h_in = state.snow['24hr'] ?? snow.new_snow_24h_in;
      snow.base_depth_in = state.snow.base ?? snow.base_depth_in;
      snow.season_total_in = state.snow.season ?? snow.season_total_in;
    }
  }
}

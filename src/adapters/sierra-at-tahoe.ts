import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import { firstNumber, firstPair } from '../utils/parse.js';

/**
 * Sierra-at-Tahoe conditions page. Server-rendered text such as
 * "10/14 Lifts Open", "41/50 Runs Open" and `60" (summit), 35" (base)`;
 * the summit depth is reported as the base depth.
 */
export class SierraAtTahoeAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'sierra_at_tahoe',
    name: 'Sierra-at-Tahoe',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const text = this.pageText(this.load(html));
    const ops = this.emptyOps();
    const snow = this.emptySnow();

    const lifts = firstPair(
      text,
      /(\d+)\s*\/\s*(\d+)\s*lifts?\s*open/i,
      /lifts?\s*open[:\s]*(\d+)\s*\/\s*(\d+)/i,
    );
    if (lifts) [ops.lifts_open, ops.lifts_total] = lifts;

    const runs = firstPair(
      text,
      /(\d+)\s*\/\s*(\d+)\s*runs?\s*open/i,
      /runs?\s*open[:\s]*(\d+)\s*\/\s*(\d+)/i,
    );
    if (runs) [ops.trails_open, ops.trails_total] = runs;

    snow.new_snow_24h_in = firstNumber(
      text,
      /24[- ]?hour[:\s]*(\d+(?:\.\d+)?)/i,
      /(\d+(?:\.\d+)?)["']\s*(?:in\s+)?24[- ]?hour/i,
      /last\s*24\s*hours?[:\s]*(\d+(?:\.\d+)?)/i,
    );
    snow.base_depth_in = firstNumber(
      text,
      /base\s*depth[:\s]*(\d+(?:\.\d+)?)/i,
      /(\d+)["']\s*\(summit\)/i,
      /base[:\s]*(\d+)["']/i,
    );
    snow.season_total_in = firstNumber(text, /ytd[:\s]*(\d+)/i, /season\s*total[:\s]*(\d+)/i);

    ops.open_flag = ops.lifts_open === null ? null : ops.lifts_open > 0;

    return this.success(ops, snow);
  }
}

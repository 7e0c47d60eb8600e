import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import type { Operations } from '../types/conditions.js';
import { escapeRegExp, firstNumber, firstPair } from '../utils/parse.js';

const LIFT_NAMES = [
  'Mt. Judah Express',
  'Jerome Hill Express',
  'Mt. Lincoln Express',
  'Christmas Tree Express',
  'Mt. Disney Express',
  'Nob Hill',
  'White Pine',
  'Summit Chair',
  'Gondola',
  'Flume Carpet',
  "Crow's Peak",
];

/**
 * Sugar Bowl conditions page.
 *
 * Per-lift status lines give open and scheduled counts; "X / Y Lifts Open"
 * is the fallback. The 7-day total is reported in place of a 48h figure.
 */
export class SugarBowlAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'sugar_bowl',
    name: 'Sugar Bowl',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const text = this.pageText(this.load(html));
    const ops = this.emptyOps();
    const snow = this.emptySnow();

    if (!this.countLiftStatuses(text, ops)) {
      const lifts = firstPair(text, /(\d+)\s*\/\s*(\d+)\s*Lifts?\s*Open/i);
      if (lifts) [ops.lifts_open, ops.lifts_total] = lifts;
    }

    const trails = firstPair(text, /(\d+)\s*\/\s*(\d+)\s*Trails?\s*Open/i);
    if (trails) [ops.trails_open, ops.trails_total] = trails;

    snow.new_snow_24h_in = firstNumber(
      text,
      /(\d+(?:\.\d+)?)\s*["″]\s*24\s*Hr/i,
      /24\s*Hr\s*(?:Snowfall)?[:\s]*(\d+(?:\.\d+)?)/i,
    );
    snow.season_total_in = firstNumber(
      text,
      /(\d+(?:\.\d+)?)\s*["″]\s*(?:Year\s*to\s*Date|YTD)/i,
      /(?:Year\s*to\s*Date|YTD)[:\s]*(\d+(?:\.\d+)?)/i,
    );
    snow.new_snow_48h_in = firstNumber(text, /(\d+(?:\.\d+)?)\s*["″]\s*7\s*Day/i);
    snow.base_depth_in = firstNumber(
      text,
      /(?:Summit|Base)[:\s]*(\d+(?:\.\d+)?)\s*["″]/i,
      /(\d+(?:\.\d+)?)\s*["″]\s*(?:at\s+)?(?:Summit|Base)/i,
    );

    const liftsActive = (ops.lifts_open ?? 0) + (ops.lifts_scheduled ?? 0);
    if (/mountain\s+status\s+open/i.test(text) || liftsActive > 0) {
      ops.open_flag = true;
    } else if (ops.lifts_open !== null || ops.lifts_scheduled !== null) {
      ops.open_flag = false;
    }

    return this.success(ops, snow);
  }

  /** Fills lift counts from "<lift name> Open|Scheduled|Closed"; false when no lift was listed. */
  private countLiftStatuses(text: string, ops: Operations): boolean {
    let open = 0;
    let scheduled = 0;
    let total = 0;

    for (const name of LIFT_NAMES) {
      const match = text.match(new RegExp(`${escapeRegExp(name)}\\s+(open|scheduled|closed)\\b`, 'i'));
      if (!match?.[1]) continue;

      total++;
      const status = match[1].toLowerCase();
      if (status === 'open') open++;
      else if (status === 'scheduled') scheduled++;
    }

    if (total === 0) return false;
    ops.lifts_open = open;
    ops.lifts_scheduled = scheduled;
    ops.lifts_total = total;
    return true;
  }
}

import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import type { Operations } from '../types/conditions.js';
import { averageRange, cleanText, escapeRegExp, firstPair } from '../utils/parse.js';

const LIFT_NAMES = [
  'Northwest Express',
  'Zephyr Express',
  'Lakeview Express',
  'Wizard',
  'Magic',
  'Galena',
  'Chuter',
  'Blazing Zephyr',
];

/**
 * Mt. Rose Ski Tahoe snow report.
 *
 * The `.lift-status` block lists each lift followed by its status. Snow values
 * are often published as ranges (`47-58"`), which are averaged. Mt. Rose
 * reports terrain as a percentage, so trail counts are only filled when the
 * page happens to print "X / Y trails".
 */
export class MtRoseAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'mt_rose',
    name: 'Mt. Rose',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const $ = this.load(html);
    const text = this.pageText($);
    const section = $('.lift-status').first();
    const liftText = section.length ? cleanText(section.text()) : text;

    const ops = this.emptyOps();
    const snow = this.emptySnow();

    const summary = firstPair(
      liftText,
      /(\d+)\s*\/\s*(\d+)\s*lifts?/i,
      /lifts?\s*open[:\s]*(\d+)\s*\/\s*(\d+)/i,
    );
    if (summary) {
      [ops.lifts_open, ops.lifts_total] = summary;
    } else {
      this.countLifts(liftText, ops);
    }

    const trails = firstPair(text, /(\d+)\s*\/\s*(\d+)\s*(?:trails?|runs?)/i);
    if (trails) [ops.trails_open, ops.trails_total] = trails;

    snow.new_snow_24h_in = this.parseRange(text, 'new\\s*snow');
    snow.base_depth_in = this.parseRange(text, 'base\\s*(?:depth)?');
    snow.season_total_in = this.parseRange(text, 'season\\s*(?:total)?');
    // Storm total stands in for the 48h figure.
    snow.new_snow_48h_in = this.parseRange(text, 'storm\\s*(?:total)?');

    const counted = this.openFromCounts(ops);
    if (counted) {
      ops.open_flag = true;
    } else if (/mountain\s+closed|closed\s+for\s+(?:the\s+)?season/i.test(text)) {
      ops.open_flag = false;
    } else {
      ops.open_flag = counted;
    }

    return this.success(ops, snow);
  }

  private countLifts(text: string, ops: Operations): void {
    let open = 0;
    let scheduled = 0;
    let total = 0;

    for (const name of LIFT_NAMES) {
      const pattern = new RegExp(`${escapeRegExp(name)}\\s*[:\\-–]?\\s*(open|scheduled|closed|on\\s+hold|hold)\\b`, 'i');
      const match = text.match(pattern);
      if (!match?.[1]) continue;

      total++;
      const status = match[1].toLowerCase();
      if (status === 'open') open++;
      else if (status === 'scheduled') scheduled++;
    }

    if (total === 0) return;
    ops.lifts_open = open;
    ops.lifts_scheduled = scheduled;
    ops.lifts_total = total;
  }

  private parseRange(text: string, label: string): number | null {
    const pattern = new RegExp(`${label}[:\\s]*(\\d+(?:\\.\\d+)?)(?:\\s*[-–]\\s*(\\d+(?:\\.\\d+)?))?\\s*["″]`, 'i');
    const match = text.match(pattern);
    if (!match?.[1]) return null;
    return averageRange(match[1], match[2]);
  }
}

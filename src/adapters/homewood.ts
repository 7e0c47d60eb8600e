import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import { firstNumber, firstPair } from '../utils/parse.js';

/**
 * Homewood Mountain Resort snow report: "Open Lifts 4/8", "Open Runs 45/67"
 * and labelled snow depths.
 */
export class HomewoodAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'homewood',
    name: 'Homewood',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const text = this.pageText(this.load(html));
    const ops = this.emptyOps();
    const snow = this.emptySnow();

    const lifts = firstPair(text, /Open\s+Lifts[^0-9]*(\d+)\s*\/\s*(\d+)/i);
    if (lifts) [ops.lifts_open, ops.lifts_total] = lifts;

    const trails = firstPair(text, /Open\s+Runs[^0-9]*(\d+)\s*\/\s*(\d+)/i);
    if (trails) [ops.trails_open, ops.trails_total] = trails;

    snow.base_depth_in = firstNumber(text, /(?:Base|Summit)[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i);
    snow.season_total_in = firstNumber(text, /Season\s*(?:Total)?[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i);
    snow.new_snow_24h_in = firstNumber(
      text,
      /(?:24\s*(?:hr|hour)|overnight)[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i,
    );

    if (ops.lifts_open !== null) {
      ops.open_flag = ops.lifts_open > 0;
    } else if (ops.trails_open !== null) {
      ops.open_flag = ops.trails_open > 0;
    }

    return this.success(ops, snow);
  }
}

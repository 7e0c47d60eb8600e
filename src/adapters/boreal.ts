import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import type { Operations } from '../types/conditions.js';
import { firstNumber, firstPair } from '../utils/parse.js';

/** Boreal Mountain. Reads lift, trail and snow figures from the page text. */
export class BorealAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'boreal',
    name: 'Boreal',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const text = this.pageText(this.load(html));
    const ops = this.emptyOps();
    const snow = this.emptySnow();

    this.fillCounts(text, ops);

    snow.new_snow_24h_in = firstNumber(
      text,
      /(?:24\s*(?:hr|hour)|new\s*snow|overnight|last\s*24)[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i,
      /(\d+(?:\.\d+)?)\s*(?:in|")?\s*(?:new|fresh)/i,
    );
    snow.new_snow_48h_in = firstNumber(text, /(?:48\s*(?:hr|hour)|last\s*48)[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i);
    snow.base_depth_in = firstNumber(
      text,
      /(?:base|mid\s*mtn|summit)[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i,
      /snow\s*(?:depth|base)[:\s]*(\d+(?:\.\d+)?)/i,
    );
    snow.season_total_in = firstNumber(text, /(?:season|ytd|year)[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i);

    if (/closed\s+for\s+(?:the\s+)?season|not\s+operating/i.test(text)) {
      ops.open_flag = false;
    } else if (ops.lifts_open !== null) {
      ops.open_flag = ops.lifts_open > 0;
    } else if (ops.trails_open !== null) {
      ops.open_flag = ops.trails_open > 0;
    }

    if (ops.lifts_open === null && ops.trails_open === null && snow.base_depth_in === null) {
      return this.failure('Could not extract conditions data from page');
    }
    return this.success(ops, snow);
  }

  private fillCounts(text: string, ops: Operations): void {
    const lifts = firstPair(
      text,
      /(\d+)\s*\/\s*(\d+)\s*lifts?/i,
      /lifts?\s*(?:open)?[:\s]*(\d+)\s*(?:of|\/)\s*(\d+)/i,
    );
    if (lifts) {
      [ops.lifts_open, ops.lifts_total] = lifts;
    } else {
      ops.lifts_open = firstNumber(text, /(\d+)\s*lifts?\s*open/i);
    }

    const trails = firstPair(
      text,
      /(\d+)\s*\/\s*(\d+)\s*(?:trails?|runs?|terrain)/i,
      /(?:trails?|runs?|terrain)\s*(?:open)?[:\s]*(\d+)\s*(?:of|\/)\s*(\d+)/i,
    );
    if (trails) {
      [ops.trails_open, ops.trails_total] = trails;
    } else {
      ops.trails_open = firstNumber(text, /(\d+)\s*(?:trails?|runs?)\s*open/i);
    }
  }
}

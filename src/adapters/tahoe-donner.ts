import type { CheerioAPI } from 'cheerio';
import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import type { Operations } from '../types/conditions.js';
import { firstNumber, firstPair, parseBoolStatus } from '../utils/parse.js';

const LIFT_WORDS = ['chair', 'lift', 'carpet'];
const TRAIL_WORDS = ['green', 'blue', 'black', 'diamond', 'run', 'trail'];

/**
 * Tahoe Donner downhill ski area.
 *
 * Lift and trail status live in HTML tables. A row naming a chair, lift or
 * carpet is a lift; a row with a difficulty or "run"/"trail" is a trail.
 * Header rows (only `<th>` cells) are skipped. Text patterns cover pages
 * without tables.
 */
export class TahoeDonnerAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'tahoe_donner',
    name: 'Tahoe Donner',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const $ = this.load(html);
    const ops = this.emptyOps();
    const snow = this.emptySnow();

    this.countTableRows($, ops);
    const text = this.pageText($);

    if (ops.lifts_open === null) {
      const lifts = firstPair(
        text,
        /(\d+)\s*(?:of|\/)\s*(\d+)\s*lifts?\s*(?:open|running)/i,
        /lifts?\s*(?:open)?[:\s]*(\d+)\s*(?:of|\/)\s*(\d+)/i,
        /(\d+)\s*\/\s*(\d+)\s*lifts?/i,
      );
      if (lifts) [ops.lifts_open, ops.lifts_total] = lifts;
    }

    if (ops.trails_open === null) {
      const trails = firstPair(
        text,
        /(\d+)\s*(?:of|\/)\s*(\d+)\s*(?:trails?|runs?)\s*(?:open|groomed)/i,
        /(?:trails?|runs?)\s*(?:open)?[:\s]*(\d+)\s*(?:of|\/)\s*(\d+)/i,
      );
      if (trails) [ops.trails_open, ops.trails_total] = trails;
    }

    snow.new_snow_24h_in = firstNumber(
      text,
      /(?:24\s*(?:hr|hour)|new\s*snow|overnight|fresh)[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i,
    );
    snow.base_depth_in = firstNumber(text, /(?:base|snow\s*depth)[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i);
    snow.season_total_in = firstNumber(text, /(?:season|ytd)[:\s]*(\d+(?:\.\d+)?)\s*(?:in|")/i);

    if (/closed\s+for\s+(?:the\s+)?season/i.test(text)) {
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

  private countTableRows($: CheerioAPI, ops: Operations): void {
    let liftsOpen = 0;
    let liftsTotal = 0;
    let trailsOpen = 0;
    let trailsTotal = 0;

    $('table tr').each((_i, el) => {
      const row = $(el);
      if (row.find('td').length === 0) return;

      const rowText = row
        .find('td, th')
        .map((_j, cell) => $(cell).text().trim().toLowerCase())
        .get()
        .join(' ');

      const status = parseBoolStatus(rowText);
      if (LIFT_WORDS.some((word) => rowText.includes(word))) {
        liftsTotal++;
        if (status === true) liftsOpen++;
      } else if (TRAIL_WORDS.some((word) => rowText.includes(word))) {
        trailsTotal++;
        if (status === true || (status === null && rowText.includes('groomed'))) trailsOpen++;
      }
    });

    if (liftsTotal > 0) {
      ops.lifts_open = liftsOpen;
      ops.lifts_total = liftsTotal;
    }
    if (trailsTotal > 0) {
      ops.trails_open = trailsOpen;
      ops.trails_total = trailsTotal;
    }
  }
}

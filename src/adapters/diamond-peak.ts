import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import { firstNumber, parseBoolStatus } from '../utils/parse.js';

const LIFT_WORDS = ['Lift', 'Chair', 'Powerline', 'Express'];

/**
 * Diamond Peak conditions page.
 *
 * Each lift and trail is a `.conditions__row`:
 * - `conditions__row--header` rows are lifts (label contains Lift/Chair/Express)
 * - `conditions__row--open` / `--groomed` / `--closed` rows are trails
 * - "Village" rows are terrain-park features and are not counted
 *
 * Snow figures are free text ("5 Inches 24 Hour", "Base: 40 Inches").
 */
export class DiamondPeakAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'diamond_peak',
    name: 'Diamond Peak',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const $ = this.load(html);
    const ops = this.emptyOps();
    const snow = this.emptySnow();

    let liftsOpen = 0;
    let liftsTotal = 0;
    $('.conditions__row--header').each((_i, row) => {
      const label = $(row).find('.conditions__label').first();
      const status = $(row).find('.conditions__status').first();
      if (!label.length || !status.length) return;

      const labelText = label.text().trim();
      const statusText = status.text();
      if (!LIFT_WORDS.some((word) => labelText.includes(word))) return;

      liftsTotal++;
      if (parseBoolStatus(statusText) === true || /groomed/i.test(statusText)) liftsOpen++;
    });
    if (liftsTotal > 0) {
      ops.lifts_open = liftsOpen;
      ops.lifts_total = liftsTotal;
    }

    let trailsOpen = 0;
    let trailsTotal = 0;
    $('.conditions__row--open, .conditions__row--groomed, .conditions__row--closed').each((_i, el) => {
      const row = $(el);
      if (row.hasClass('conditions__row--header')) return;
      if (row.find('.conditions__label').text().includes('Village')) return;

      trailsTotal++;
      if (row.hasClass('conditions__row--open') || row.hasClass('conditions__row--groomed')) {
        trailsOpen++;
      }
    });
    if (trailsTotal > 0) {
      ops.trails_open = trailsOpen;
      ops.trails_total = trailsTotal;
    }

    const text = this.pageText($);

    snow.new_snow_24h_in =
      firstNumber(text, /(\d+)\s*(?:Inches?|")\s*24\s*H/i, /24\s*H(?:our)?s?[:\s]*(\d+)/i) ??
      firstNumber(text, /(\d+)\s*(?:Inches?|")\s*overnight/i, /overnight[:\s]*(\d+)/i);
    snow.base_depth_in = firstNumber(
      text,
      /base[:\s]*(\d+)\s*(?:Inches?|")/i,
      /peak[:\s]*(\d+)\s*(?:Inches?|")/i,
    );
    snow.season_total_in = firstNumber(text, /season[:\s]*(\d+)\s*(?:Inches?|")/i);
    // Storm total stands in for the 48h figure.
    snow.new_snow_48h_in = firstNumber(
      text,
      /storm\s*(?:total)?[:\s]*(\d+)\s*(?:Inches?|")/i,
      /(\d+)\s*(?:Inches?|")\s*storm\s*(?:total)?/i,
    );

    const lower = text.toLowerCase();
    if (ops.lifts_open !== null) {
      ops.open_flag = ops.lifts_open > 0;
    } else if (lower.includes('mountain closed') || lower.includes('closed for season')) {
      ops.open_flag = false;
    } else if (lower.includes('open')) {
      ops.open_flag = true;
    }

    return this.success(ops, snow);
  }
}

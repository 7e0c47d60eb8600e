import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';
import type { Operations } from '../types/conditions.js';
import { averageRange, cleanText, firstNumber, firstPair } from '../utils/parse.js';

/**
 * Pattern-matching adapter for simple server-rendered condition pages.
 *
 * Looks for the phrasing most resorts share ("5/10 lifts", `6" in last 24
 * hours`, "Base: 48"") anywhere in the visible text. Misses data on pages that
 * render their report client-side.
 */
export class GenericHtmlAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'generic',
    name: 'Generic HTML',
    fetchMethod: 'http',
  };

  parse(html: string): ParseResult {
    const $ = this.load(html);
    const text = this.pageText($);
    const ops = this.emptyOps();
    const snow = this.emptySnow();

    const lifts = firstPair(
      text,
      /(\d+)\s*\/\s*(\d+)\s*lifts?/i,
      /lifts?\s*[:\s]*(\d+)\s*\/\s*(\d+)/i,
      /(\d+)\s+of\s+(\d+)\s+lifts?/i,
      /lifts?\s+open[:\s]*(\d+)\s*\/\s*(\d+)/i,
    );
    if (lifts) [ops.lifts_open, ops.lifts_total] = lifts;

    const trails = firstPair(
      text,
      /(\d+)\s*\/\s*(\d+)\s*(?:trails?|runs?)/i,
      /(?:trails?|runs?)\s*[:\s]*(\d+)\s*\/\s*(\d+)/i,
      /(\d+)\s+of\s+(\d+)\s+(?:trails?|runs?)/i,
    );
    if (trails) [ops.trails_open, ops.trails_total] = trails;

    ops.open_flag = this.findOpenStatus(text.toLowerCase(), ops);

    snow.new_snow_24h_in = this.findNewSnow(text, '24');
    snow.new_snow_48h_in = this.findNewSnow(text, '48');
    snow.base_depth_in = this.findBaseDepth(text);
    snow.season_total_in = firstNumber(
      text,
      /season\s*total[:\s]*(\d+(?:\.\d+)?)["″]?\s*(?:in|inches?)?/i,
      /ytd[:\s]*(\d+(?:\.\d+)?)["″]?/i,
      /(\d+(?:\.\d+)?)["″]?\s*(?:in|inches?)?\s*season/i,
    );
    snow.surface = this.findSurface(text);

    if (ops.lifts_open === null && snow.new_snow_24h_in === null) {
      return this.failure('Could not extract meaningful data');
    }
    return this.success(ops, snow);
  }

  private findOpenStatus(textLower: string, ops: Operations): boolean | null {
    if (textLower.includes('resort closed') || textLower.includes('mountain closed')) return false;
    if (textLower.includes('resort open') || textLower.includes('mountain open')) return true;
    if (ops.lifts_open !== null) return ops.lifts_open > 0;
    return null;
  }

  private findNewSnow(text: string, hours: '24' | '48'): number | null {
    return firstNumber(
      text,
      new RegExp(`(\\d+(?:\\.\\d+)?)["″]\\s*(?:in\\s+)?(?:last\\s+)?${hours}\\s*(?:hr|hour)`, 'i'),
      new RegExp(`${hours}\\s*(?:hr|hour)s?\\s*[:\\s]*(\\d+(?:\\.\\d+)?)["″]?`, 'i'),
      new RegExp(`new\\s+snow\\s*\\(?${hours}h?\\)?\\s*[:\\s]*(\\d+(?:\\.\\d+)?)`, 'i'),
      new RegExp(`(\\d+(?:\\.\\d+)?)\\s*(?:in|inches?|")\\s*(?:in\\s+)?${hours}\\s*(?:hr|hour)`, 'i'),
    );
  }

  private findBaseDepth(text: string): number | null {
    const range = text.match(/base\s*(?:depth)?[:\s]*(\d+(?:\.\d+)?)\s*[-–]\s*(\d+(?:\.\d+)?)/i);
    if (range?.[1] && range[2]) return averageRange(range[1], range[2]);

    return firstNumber(
      text,
      /base\s*(?:depth)?[:\s]*(\d+(?:\.\d+)?)["″]?\s*(?:in|inches?)?/i,
      /(\d+(?:\.\d+)?)["″]?\s*base/i,
    );
  }

  private findSurface(text: string): string | null {
    const patterns = [
      /surface[:\s]+([A-Za-z\s,]+?)(?:\.|$)/i,
      /conditions?[:\s]+([A-Za-z\s,]+?)(?:\.|$)/i,
    ];
    for (const pattern of patterns) {
      const match = text.match(pattern);
      if (!match?.[1]) continue;
      const surface = cleanText(match[1]);
      if (surface && surface.length < 50) return surface;
    }
    return null;
  }
}

import * as cheerio from 'cheerio';
import type { ParseResult, ResortAdapter, ResortAdapterConfig } from '../types/adapter.js';
import type { Operations, Snow } from '../types/conditions.js';
import { emptyOperations, emptySnow } from '../types/conditions.js';
import { cleanText } from '../utils/parse.js';

export abstract class BaseAdapter implements ResortAdapter {
  abstract readonly config: ResortAdapterConfig;
  abstract parse(html: string): ParseResult;

  protected load(html: string) {
    return cheerio.load(html);
  }

  /**
   * Visible page text with every element boundary turned into a space, so
   * `<div>5/10</div><div>Lifts</div>` reads "5/10 Lifts". Mutates the document.
   */
  protected pageText($: cheerio.CheerioAPI): string {
    $('script, style, noscript').remove();
    $('body *').each((_i, el) => {
      $(el).prepend(' ').append(' ');
    });
    return cleanText($('body').text());
  }

  protected emptyOps(): Operations {
    return emptyOperations();
  }

  protected emptySnow(): Snow {
    return emptySnow();
  }

  protected success(ops: Operations, snow: Snow): ParseResult {
    return { ok: true, ops, snow };
  }

  protected failure(error: string, needsHeadless = false): ParseResult {
    return { ok: false, error, needsHeadless };
  }

  /** Open when anything is running or scheduled; unknown when no counts were found. */
  protected openFromCounts(ops: Operations): boolean | null {
    const liftsActive = (ops.lifts_open ?? 0) + (ops.lifts_scheduled ?? 0);
    const trailsActive = (ops.trails_open ?? 0) + (ops.trails_scheduled ?? 0);
    if (liftsActive > 0 || trailsActive > 0) return true;
    if (ops.lifts_open !== null || ops.trails_open !== null) return false;
    return null;
  }
}

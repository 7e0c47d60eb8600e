import { BaseAdapter } from './base-adapter.js';
import type { ResortAdapterConfig, ParseResult } from '../types/adapter.js';

/**
 * Stands in for resorts whose conditions only exist after client-side
 * rendering. Never fetched; always reports that a headless browser is needed.
 */
export class PlaceholderHeadlessAdapter extends BaseAdapter {
  readonly config: ResortAdapterConfig = {
    kind: 'placeholder_headless',
    name: 'Headless placeholder',
    fetchMethod: 'headless',
  };

  parse(_html: string): ParseResult {
    return this.failure('This resort requires JavaScript rendering (headless browser)', true);
  }
}

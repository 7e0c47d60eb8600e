import type { Operations, Snow } from './conditions.js';
import type { AdapterKind } from './resort.js';

export type FetchMethod = 'http' | 'headless';

export interface ResortAdapterConfig {
  kind: AdapterKind;
  name: string;
  /** Adapters marked 'headless' need a rendered page and are never fetched. */
  fetchMethod: FetchMethod;
}

export type ParseResult =
  | { ok: true; ops: Operations; snow: Snow }
  | { ok: false; error: string; needsHeadless: boolean };

export interface ResortAdapter {
  readonly config: ResortAdapterConfig;

  /** Parse a fetched conditions page into operations and snow data. */
  parse(html: string): ParseResult;
}

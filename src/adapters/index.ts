import type { ResortAdapter } from '../types/adapter.js';
import type { AdapterKind } from '../types/resort.js';
import { isAdapterKind } from '../types/resort.js';
import { GenericHtmlAdapter } from './generic-html.js';
import { BorealAdapter } from './boreal.js';
import { DiamondPeakAdapter } from './diamond-peak.js';
import { HomewoodAdapter } from './homewood.js';
import { MtRoseAdapter } from './mt-rose.js';
import { PalisadesAdapter } from './palisades.js';
import { SierraAtTahoeAdapter } from './sierra-at-tahoe.js';
import { SugarBowlAdapter } from './sugar-bowl.js';
import { TahoeDonnerAdapter } from './tahoe-donner.js';
import { VailResortsAdapter } from './vail-resorts.js';
import { PlaceholderHeadlessAdapter } from './placeholder-headless.js';

const adapters: Map<AdapterKind, ResortAdapter> = new Map();

function register(adapter: ResortAdapter): void {
  adapters.set(adapter.config.kind, adapter);
}

register(new GenericHtmlAdapter());
register(new BorealAdapter());
register(new DiamondPeakAdapter());
register(new HomewoodAdapter());
register(new MtRoseAdapter());
register(new PalisadesAdapter());
register(new SierraAtTahoeAdapter());
register(new SugarBowlAdapter());
register(new TahoeDonnerAdapter());
register(new VailResortsAdapter());
register(new PlaceholderHeadlessAdapter());

/** Adapter for a registry `kind`, or null when the kind is not known. */
export function findAdapter(kind: string): ResortAdapter | null {
  if (!isAdapterKind(kind)) return null;
  return adapters.get(kind) ?? null;
}

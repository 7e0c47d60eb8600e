export interface SummaryCounts {
  open_resorts: number;
  closed_resorts: number;
  stale_resorts: number;
}

/** Homepage summary written to public/data/summary.json. */
export interface Summary {
  last_updated_utc: string;
  counts: SummaryCounts;
  highlights: string[];
  /** One sentence per resort, keyed by slug. */
  blurbs: Record<string, string>;
}

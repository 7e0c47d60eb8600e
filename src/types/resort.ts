import { z } from 'zod';

export const ADAPTER_KINDS = [
  'generic',
  'boreal',
  'diamond_peak',
  'homewood',
  'mt_rose',
  'palisades',
  'sierra_at_tahoe',
  'sugar_bowl',
  'tahoe_donner',
  'vail_resorts',
  'placeholder_headless',
] as const;

export type AdapterKind = (typeof ADAPTER_KINDS)[number];

export function isAdapterKind(kind: string): kind is AdapterKind {
  return ADAPTER_KINDS.some((known) => known === kind);
}

/** One entry of resorts.yaml. */
export const resortConfigSchema = z.object({
  slug: z
    .string()
    .min(1)
    .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'slug must be lowercase kebab-case'),
  name: z.string().min(1),
  /** Unknown kinds are accepted here and reported as unavailable at dispatch. */
  kind: z.string().min(1),
  source_url: z.string().url(),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  enabled: z.boolean().default(true),
  note: z.string().optional(),
});

export type ResortConfig = z.infer<typeof resortConfigSchema>;

/** File-level shape; entries are validated one by one. */
export const registrySchema = z.object({
  resorts: z.array(z.unknown()),
});

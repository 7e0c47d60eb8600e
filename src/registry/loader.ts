import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { registrySchema, resortConfigSchema, type ResortConfig } from '../types/resort.js';
import { logger } from '../utils/logger.js';

export class RegistryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegistryError';
  }
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Reads and validates the resort registry. A missing file, invalid YAML, a
 * document without a `resorts` list or a repeated slug throws
 * {@link RegistryError}. Entries that fail validation are logged and skipped.
 */
export async function loadResorts(filePath: string): Promise<ResortConfig[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new RegistryError(`Cannot read resort registry ${filePath}`, { cause: err });
  }

  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    throw new RegistryError(`Invalid YAML in ${filePath}`, { cause: err });
  }

  const parsed = registrySchema.safeParse(doc);
  if (!parsed.success) {
    throw new RegistryError(`Invalid resort registry ${filePath}: ${formatIssues(parsed.error.issues)}`, {
      cause: parsed.error,
    });
  }

  const resorts: ResortConfig[] = [];
  const seen = new Set<string>();
  for (const [index, entry] of parsed.data.resorts.entries()) {
    const result = resortConfigSchema.safeParse(entry);
    if (!result.success) {
      logger.warn({ filePath, index, issues: formatIssues(result.error.issues) }, 'Skipping invalid resort entry');
      continue;
    }

    const resort = result.data;
    if (seen.has(resort.slug)) {
      throw new RegistryError(`Duplicate resort slug "${resort.slug}" in ${filePath}`);
    }
    seen.add(resort.slug);
    resorts.push(resort);
  }

  return resorts;
}

export async function getEnabledResorts(filePath: string): Promise<ResortConfig[]> {
  const resorts = await loadResorts(filePath);
  return resorts.filter((resort) => resort.enabled);
}

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { resortConditionsSchema, type ResortConditions } from '../types/conditions.js';
import type { Summary } from '../types/summary.js';
import { logger } from '../utils/logger.js';

export function resortFilePath(outputDir: string, slug: string): string {
  return path.join(outputDir, 'resorts', `${slug}.json`);
}

/**
 * Writes two-space indented JSON with a trailing newline. The data goes to a
 * temp file beside the target first, so readers never see a partial file.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  await writeFile(tmpPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  try {
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

/** The resort's last written record, or null when it is missing or invalid. */
export async function loadPreviousRecord(
  outputDir: string,
  slug: string,
): Promise<ResortConditions | null> {
  const filePath = resortFilePath(outputDir, slug);

  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    logger.warn({ err, slug, filePath }, 'Cannot read previous record');
    return null;
  }

  try {
    const parsed = resortConditionsSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn({ slug, filePath, issues: parsed.error.issues }, 'Ignoring invalid previous record');
  } catch (err) {
    logger.warn({ err, slug, filePath }, 'Ignoring unparseable previous record');
  }
  return null;
}

export async function loadPreviousRecords(
  outputDir: string,
  slugs: string[],
): Promise<Map<string, ResortConditions>> {
  const records = new Map<string, ResortConditions>();
  for (const slug of slugs) {
    const record = await loadPreviousRecord(outputDir, slug);
    if (record) records.set(slug, record);
  }
  return records;
}

/** Per-resort files, then `latest.json` and `summary.json`. */
export async function writeAllOutputs(
  outputDir: string,
  records: ResortConditions[],
  summary: Summary,
): Promise<void> {
  for (const record of records) {
    await writeJsonAtomic(resortFilePath(outputDir, record.slug), record);
  }
  await writeJsonAtomic(path.join(outputDir, 'latest.json'), records);
  await writeJsonAtomic(path.join(outputDir, 'summary.json'), summary);

  logger.info({ outputDir, resorts: records.length }, 'Outputs written');
}

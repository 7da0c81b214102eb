import { readFile } from 'fs/promises';
import { isAbsolute, join, resolve } from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { TaxonomyLoadError } from './errors.js';
import type { TaxonomyRow } from './types.js';
import { DATA_DIR } from './vocabulary.js';

export const DEFAULT_TAXONOMY_PATH = join(DATA_DIR, 'taxonomy.csv');

const csvRowSchema = z.object({
  'Product Type': z.string(),
  'Level 1': z.string(),
  'Level 2': z.string().default(''),
  'Level 3': z.string().default(''),
});

/**
 * Parses taxonomy CSV content (`Product Type,Level 1,Level 2,Level 3`).
 * Rows without a product type or a first level are skipped.
 */
export function parseTaxonomyCsv(content: string): TaxonomyRow[] {
  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new TaxonomyLoadError(null, error instanceof Error ? error.message : String(error));
  }

  const parsed = z.array(csvRowSchema).safeParse(records);
  if (!parsed.success) {
    throw new TaxonomyLoadError(null, `unexpected CSV layout (${parsed.error.issues[0]?.message ?? 'invalid rows'})`);
  }

  const rows: TaxonomyRow[] = [];
  for (const record of parsed.data) {
    const productType = record['Product Type'];
    const level1 = record['Level 1'];
    if (!productType || !level1) continue;

    const row: TaxonomyRow = { productType, level1 };
    if (record['Level 2']) row.level2 = record['Level 2'];
    if (record['Level 2'] && record['Level 3']) row.level3 = record['Level 3'];
    rows.push(row);
  }

  return rows;
}

/**
 * Reads a taxonomy CSV file. Relative paths resolve against the working
 * directory.
 */
export async function loadTaxonomyCsv(path: string = DEFAULT_TAXONOMY_PATH): Promise<TaxonomyRow[]> {
  const fullPath = isAbsolute(path) ? path : resolve(process.cwd(), path);

  let content: string;
  try {
    content = await readFile(fullPath, 'utf-8');
  } catch (error) {
    throw new TaxonomyLoadError(null, `cannot read ${fullPath} (${error instanceof Error ? error.message : String(error)})`);
  }

  const rows = parseTaxonomyCsv(content);
  if (rows.length === 0) {
    throw new TaxonomyLoadError(null, `${fullPath} contains no category rows`);
  }
  return rows;
}

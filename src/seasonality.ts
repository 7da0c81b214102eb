import { createProductKey } from './text-normalizer.js';
import type { SeasonalitySeries } from './types.js';

const TOP_MONTHS = 4;
const MIN_POPULARITY_MONTHS = 3;

export interface SearchVolumeRow {
  productKey?: string;
  productTitle?: string;
  averageVolume?: number | null;
  monthly?: SeasonalitySeries;
}

export interface SearchVolumeFields {
  productKey: string;
  averageSearchVolume: number | null;
  peakSeasonality: string;
}

/** "Jan 2024" → "Jan" */
export function monthName(label: string): string {
  return label
    .replace(/[-_/]+/g, ' ')
    .replace(/\b(?:19|20)\d{2}\b/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function numericEntries(series: SeasonalitySeries): Array<[string, number]> {
  const entries: Array<[string, number]> = [];
  for (const [label, value] of Object.entries(series)) {
    if (typeof value === 'number' && Number.isFinite(value)) entries.push([label, value]);
  }
  return entries;
}

function meanAndStdDev(values: readonly number[]): { mean: number; stdDev: number } {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return { mean, stdDev: Math.sqrt(variance) };
}

function joinMonths(labels: readonly string[]): string {
  return [...new Set(labels.map(monthName))].join(', ');
}

/**
 * Peak months by search volume: of the four highest months, those at or
 * above (mean − population std-dev) of the four, highest first.
 */
export function calculatePeakSeasonality(series: SeasonalitySeries): string {
  const sorted = numericEntries(series).sort((a, b) => b[1] - a[1]);
  const top = sorted.slice(0, TOP_MONTHS);
  if (top.length === 0) return '';
  if (top.length === 1) return joinMonths([top[0]?.[0] ?? '']);

  const { mean, stdDev } = meanAndStdDev(top.map(([, value]) => value));
  const threshold = mean - stdDev;
  return joinMonths(top.filter(([, value]) => value >= threshold).map(([label]) => label));
}

/**
 * Months of stable popularity among the four best ranks (lower rank is
 * better): those within one std-dev of the mean rank, best first. Needs at
 * least three ranked months.
 */
export function calculatePeakPopularity(ranks: SeasonalitySeries): string {
  const sorted = numericEntries(ranks).sort((a, b) => a[1] - b[1]);
  if (sorted.length < MIN_POPULARITY_MONTHS) return '';

  const top = sorted.slice(0, TOP_MONTHS);
  const { mean, stdDev } = meanAndStdDev(top.map(([, rank]) => rank));
  const stable = top.filter(([, rank]) => Math.abs(rank - mean) <= stdDev);

  const best = sorted[0]?.[0] ?? '';
  return stable.length === 0 ? monthName(best) : joinMonths(stable.map(([label]) => label));
}

function averageOf(series: SeasonalitySeries | undefined): number | null {
  const values = numericEntries(series ?? {}).map(([, value]) => value);
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Left-joins search volume rows onto products by product key. The first row
 * for a key wins; products without a row get null volume and no peak months.
 */
export function mergeSearchVolume<T extends { title: string }>(
  products: readonly T[],
  rows: readonly SearchVolumeRow[],
): Array<T & SearchVolumeFields> {
  const byKey = new Map<string, SearchVolumeRow>();
  for (const row of rows) {
    const key = row.productKey ? createProductKey(row.productKey) : createProductKey(row.productTitle ?? '');
    if (key && !byKey.has(key)) byKey.set(key, row);
  }

  return products.map(product => {
    const productKey = createProductKey(product.title);
    const row = byKey.get(productKey);
    return {
      ...product,
      productKey,
      averageSearchVolume: row ? row.averageVolume ?? averageOf(row.monthly) : null,
      peakSeasonality: row?.monthly ? calculatePeakSeasonality(row.monthly) : '',
    };
  });
}

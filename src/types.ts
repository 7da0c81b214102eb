export type CategoryLevel = 1 | 2 | 3;

export const OTHER = 'Other';

export interface ProductRecord {
  id?: string;
  title: string;
  brand?: string;
  productType: string;
}

/**
 * One row of a taxonomy source: a product type and a category path of one to
 * three levels. Empty levels are omitted.
 */
export interface TaxonomyRow {
  productType: string;
  level1: string;
  level2?: string;
  level3?: string;
}

export interface CategoryNode {
  readonly id: string;
  readonly name: string;
  readonly level: CategoryLevel;
  readonly parent?: CategoryNode;
  readonly children: readonly CategoryNode[];
  readonly keywords: ReadonlySet<string>;
  /** Names from the L1 root down to this node */
  readonly path: readonly string[];
}

export interface CategoryPath {
  level1: string;
  level2: string;
  level3: string;
}

export interface KeywordMatch {
  node: CategoryNode;
  matchedKeyword: string;
  keywordLength: number;
  specificity: CategoryLevel;
}

export interface ClassificationResult {
  path: CategoryPath;
  match: KeywordMatch | null;
}

export interface ExtractedKeyword {
  words: string[];
  sourceTitle: string;
}

export type AgeStatementPolicy = 'auto' | 'keep' | 'drop';

export type KeywordSource = 'local' | 'llm' | 'manual';

export type KeywordOutcome =
  | { ok: true; id: string; keyword: ExtractedKeyword }
  | { ok: false; id: string; error: Error };

export interface ProcessedProduct {
  record: ProductRecord;
  category: CategoryPath;
  keyword: string;
  source: KeywordSource;
  cached: boolean;
  errors: string[];
}

/** Month label ("Jan 2024") to a numeric value (search volume or rank) */
export type SeasonalitySeries = Record<string, number | null | undefined>;

export interface CachedResult {
  cache_key: string;
  product_type: string;
  level1: string;
  level2: string;
  level3: string;
  keyword: string;
  source: KeywordSource;
  created_at: string;
}

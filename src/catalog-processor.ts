import type { CategoryClassifier } from './category-classifier.js';
import { createCacheKey } from './database.js';
import type { ResultCache } from './database.js';
import { formatKeyword } from './keyword-extractor.js';
import type { KeywordStrategy } from './keyword-extractor.js';
import type { LlmCategoryFallback } from './llm-category-fallback.js';
import { isOther } from './taxonomy-index.js';
import { OTHER } from './types.js';
import type { CategoryPath, ProcessedProduct, ProductRecord } from './types.js';

const UNCLASSIFIED = 'Unclassified';

export interface CatalogProcessorOptions {
  cache?: ResultCache;
  categoryFallback?: LlmCategoryFallback;
}

export interface ProcessOptions {
  signal?: AbortSignal;
  /** Ignore cached results and recompute */
  refresh?: boolean;
}

interface WorkItem {
  index: number;
  id: string;
  record: ProductRecord;
  cacheKey: string;
  category: CategoryPath;
  classified: boolean;
  keyword: string;
  errors: string[];
}

function unclassifiedPath(record: ProductRecord): CategoryPath {
  const label = record.productType.trim();
  return { level1: label && !isOther(label) ? label : UNCLASSIFIED, level2: OTHER, level3: OTHER };
}

/**
 * Runs records through cache lookup, classification, the optional LLM
 * category fallback and the keyword strategy. A failure on one record is
 * reported on that record and never stops the others.
 */
export class CatalogProcessor {
  private classifier: CategoryClassifier;
  private keywords: KeywordStrategy;
  private cache?: ResultCache;
  private categoryFallback?: LlmCategoryFallback;

  constructor(classifier: CategoryClassifier, keywords: KeywordStrategy, options: CatalogProcessorOptions = {}) {
    this.classifier = classifier;
    this.keywords = keywords;
    this.cache = options.cache;
    this.categoryFallback = options.categoryFallback;
  }

  async process(records: readonly ProductRecord[], options: ProcessOptions = {}): Promise<ProcessedProduct[]> {
    const startTime = Date.now();
    const results: ProcessedProduct[] = new Array<ProcessedProduct>(records.length);
    const pending: WorkItem[] = [];
    const scope = [`taxonomy:${this.classifier.getTaxonomy().getVersion()}`, this.keywords.variant];

    for (const [index, record] of records.entries()) {
      const cacheKey = createCacheKey(record, scope);
      const cached = this.cache?.isConnected() && !options.refresh ? await this.cache.get(cacheKey) : null;

      if (cached) {
        results[index] = {
          record,
          category: { level1: cached.level1, level2: cached.level2, level3: cached.level3 },
          keyword: cached.keyword,
          source: cached.source,
          cached: true,
          errors: [],
        };
        continue;
      }

      pending.push({
        index,
        id: String(index),
        record,
        cacheKey,
        category: unclassifiedPath(record),
        classified: false,
        keyword: '',
        errors: [],
      });
    }

    const cacheHits = records.length - pending.length;
    const classifyStart = Date.now();

    for (const item of pending) {
      try {
        item.category = this.classifier.classify(item.record.title, item.record.productType);
        item.classified = true;
      } catch (error) {
        item.errors.push(error instanceof Error ? error.message : String(error));
      }
    }
    const classifyTime = Date.now() - classifyStart;

    const fallbackStart = Date.now();
    const needsFallback = pending.filter(item => item.classified && isOther(item.category.level2));
    if (this.categoryFallback && needsFallback.length > 0) {
      const outcomes = await this.categoryFallback.classifyBatch(
        needsFallback.map(item => ({
          id: item.id,
          title: item.record.title,
          brand: item.record.brand,
          productType: item.record.productType,
        })),
        { signal: options.signal },
      );
      needsFallback.forEach((item, i) => {
        const outcome = outcomes[i];
        if (!outcome) return;
        if (outcome.ok) {
          item.category = outcome.path;
        } else {
          item.errors.push(outcome.error.message);
        }
      });
    }
    const fallbackTime = Date.now() - fallbackStart;

    const keywordStart = Date.now();
    const keywordOutcomes = await this.keywords.extractBatch(
      pending.map(item => ({ ...item.record, id: item.id })),
      { signal: options.signal },
    );
    pending.forEach((item, i) => {
      const outcome = keywordOutcomes[i];
      if (!outcome) return;
      if (outcome.ok) {
        item.keyword = formatKeyword(outcome.keyword);
      } else {
        item.errors.push(outcome.error.message);
      }
    });
    const keywordTime = Date.now() - keywordStart;

    for (const item of pending) {
      results[item.index] = {
        record: item.record,
        category: item.category,
        keyword: item.keyword,
        source: this.keywords.source,
        cached: false,
        errors: item.errors,
      };

      if (this.cache?.isConnected() && item.errors.length === 0) {
        await this.cache.save({
          cacheKey: item.cacheKey,
          productType: item.record.productType,
          category: item.category,
          keyword: item.keyword,
          source: this.keywords.source,
        });
      }
    }

    const failed = pending.filter(item => item.errors.length > 0).length;
    console.log(`[PROCESS] ${records.length} products (${this.keywords.source} keywords)`);
    console.log(`  ├─ Cache hits: ${cacheHits}`);
    console.log(`  ├─ Classified: ${pending.length} in ${classifyTime}ms`);
    console.log(`  ├─ LLM category fallback: ${this.categoryFallback ? needsFallback.length : 0} in ${fallbackTime}ms`);
    console.log(`  ├─ Keywords: ${pending.length} in ${keywordTime}ms`);
    console.log(`  ├─ With errors: ${failed}`);
    console.log(`  └─ Time: ${Date.now() - startTime}ms`);

    return results;
  }
}

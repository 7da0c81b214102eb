import {
  cleanTitle,
  deduplicateTokens,
  filterStopwords,
  foldAccents,
  isAgeToken,
  stripPossessivesAndSymbols,
  titleCase,
  tokenize,
} from './text-normalizer.js';
import type { AgeStatementPolicy, ExtractedKeyword, KeywordOutcome, KeywordSource, ProductRecord } from './types.js';
import { loadVocabulary } from './vocabulary.js';
import type { Vocabulary } from './vocabulary.js';

export const MAX_KEYWORD_WORDS = 4;

export interface ExtractBatchOptions {
  signal?: AbortSignal;
}

/**
 * A way of turning product records into short search keywords. Results are
 * aligned with the input; a failed item carries its own error.
 */
export interface KeywordStrategy {
  readonly source: KeywordSource;
  /** Source plus the settings that change its output; part of the cache key */
  readonly variant: string;
  extractBatch(records: readonly ProductRecord[], options?: ExtractBatchOptions): Promise<KeywordOutcome[]>;
}

export interface LocalKeywordExtractorOptions {
  vocabulary?: Vocabulary;
  agePolicy?: AgeStatementPolicy;
}

export function recordId(record: ProductRecord, index: number): string {
  return record.id ?? String(index);
}

export function formatKeyword(keyword: ExtractedKeyword): string {
  return keyword.words.join(' ');
}

function key(token: string): string {
  return foldAccents(token).toLowerCase();
}

/**
 * Deterministic keyword extraction: clean the title, drop stopwords,
 * descriptors and geography, de-duplicate, put the brand first exactly once,
 * apply the age statement policy, cap at four words and title-case.
 */
export class LocalKeywordExtractor implements KeywordStrategy {
  readonly source = 'local' as const;
  readonly variant: string;
  private vocabulary: Vocabulary;
  private agePolicy: AgeStatementPolicy;
  private stoplist: Set<string>;

  constructor(options: LocalKeywordExtractorOptions = {}) {
    this.vocabulary = options.vocabulary ?? loadVocabulary();
    this.agePolicy = options.agePolicy ?? 'auto';
    this.variant = `local:${this.agePolicy}`;
    this.stoplist = new Set([
      ...this.vocabulary.extractionStopwords,
      ...this.vocabulary.descriptorWords,
      ...this.vocabulary.geographicWords,
    ]);
  }

  extract(title: string, brand = ''): ExtractedKeyword {
    const brandTokens = tokenize(stripPossessivesAndSymbols(foldAccents(brand)));
    const cleaned = cleanTitle(title, {
      noise: this.vocabulary,
      ageStatements: this.agePolicy === 'drop' ? 'drop' : 'suffix',
      brand: brandTokens.join(' '),
    });

    const filtered = filterStopwords(tokenize(cleaned), this.stoplist).filter(
      token => token.length > 1 || /\d/.test(token),
    );
    const unique = deduplicateTokens(filtered, { singularize: true });

    const brandKeys = new Set(brandTokens.map(key));
    let words = [...brandTokens, ...unique.filter(token => !brandKeys.has(key(token)))];

    if (this.agePolicy === 'auto') {
      const hasDifferentiator = words.some(
        token => !brandKeys.has(key(token)) && !isAgeToken(token) && !this.vocabulary.productTypeWords.has(key(token)),
      );
      if (hasDifferentiator) {
        words = words.filter(token => !isAgeToken(token));
      }
    }

    return {
      words: titleCase(words.slice(0, MAX_KEYWORD_WORDS)),
      sourceTitle: title,
    };
  }

  extractRecord(record: ProductRecord): ExtractedKeyword {
    return this.extract(record.title, record.brand);
  }

  async extractBatch(records: readonly ProductRecord[]): Promise<KeywordOutcome[]> {
    return records.map((record, index): KeywordOutcome => ({
      ok: true,
      id: recordId(record, index),
      keyword: this.extractRecord(record),
    }));
  }
}

import { z } from 'zod';
import { runInBatches } from './batch-runner.js';
import type { BatchSettings } from './batch-runner.js';
import { KeywordGenerationError } from './errors.js';
import { MAX_KEYWORD_WORDS, recordId } from './keyword-extractor.js';
import type { ExtractBatchOptions, KeywordStrategy } from './keyword-extractor.js';
import type { LlmClient } from './llm-client.js';
import { itemKey, parseStructuredOutput } from './llm-client.js';
import {
  cleanTitle,
  deduplicateTokens,
  foldAccents,
  stripPossessivesAndSymbols,
  titleCase,
  tokenize,
} from './text-normalizer.js';
import type { ExtractedKeyword, KeywordOutcome, ProductRecord } from './types.js';
import { loadVocabulary } from './vocabulary.js';
import type { Vocabulary } from './vocabulary.js';

export const KEYWORD_SYSTEM_PROMPT = `You turn retail product titles into short search keywords that shoppers actually type.

Every keyword must follow these rules:
1. LENGTH: at most ${MAX_KEYWORD_WORDS} words. Brand, product type and at most one differentiator.
2. SIZES: remove volumes, weights and pack formats (ml, cl, l, oz, kg, g, 70cl, 12x440ml, 5cl miniature).
3. AGE: shorten "18 Year Old" to "18yr", or drop it when another differentiator remains.
4. GIFTS: remove gift and personalisation words (gift, gift set, gift box, hamper, personalised, present).
5. YEARS: remove four-digit years (2019, 2023) unless they are part of the brand.
6. MULTIPACKS: remove case and multipack words (mixed case, tasting set, selection, variety, case of 12).
7. DUPLICATES: never repeat a word; the brand appears exactly once.
8. ACCENTS: write accented letters as their plain letter (rosé → rose, crème → creme). Never drop a letter.
9. PROMOTIONS: remove promotional words (offer, deal, discount, buy, shop, limited edition, special offer).
10. STRENGTH: remove ABV and proof (37.5% ABV, 12% vol, 90 proof).
11. RETAILERS: remove shop and retailer names.

Examples:
- "Kestrel Ridge 18 Year Old Sherry Cask Single Malt Whisky 70cl" → "Kestrel Ridge Sherry Whisky"
- "Personalised Harbour Lights Gin Gift Set 50cl" → "Harbour Lights Gin"
- "Copper Fox Sour Mixed Case 12x440ml" → "Copper Fox Sour"
- "Domaine Élise Rosé 2023 75cl" → "Domaine Elise Rose"
- "Buy Old Mill Pale Ale 500ml Special Offer" → "Old Mill Pale Ale"

Reply with one JSON object whose keys are the item keys (item-1, item-2, ...) and whose values are the keywords.`;

const replySchema = z.record(z.string(), z.unknown());

export interface KeywordItem {
  id: string;
  record: ProductRecord;
}

export interface LlmKeywordExtractorOptions extends Partial<BatchSettings> {
  vocabulary?: Vocabulary;
}

/** One line per item, keyed by its position in the batch */
export function buildKeywordPrompt(items: readonly KeywordItem[]): string {
  const lines = items.map(({ record }, position) => {
    const brand = record.brand ? ` | brand: ${record.brand}` : '';
    return `${itemKey(position)}: ${record.title}${brand} | type: ${record.productType}`;
  });
  return `Generate a search keyword for each of these ${items.length} products:\n\n${lines.join('\n')}`;
}

/**
 * Keyword strategy backed by a language model. The model gets the same rules
 * as the local extractor; every reply is cleaned and checked against them
 * before it is accepted.
 */
export class LlmKeywordExtractor implements KeywordStrategy {
  readonly source = 'llm' as const;
  readonly variant: string;
  private client: LlmClient;
  private vocabulary: Vocabulary;
  private settings: BatchSettings;

  constructor(client: LlmClient, options: LlmKeywordExtractorOptions = {}) {
    this.client = client;
    this.variant = `llm:${client.getModelId()}`;
    this.vocabulary = options.vocabulary ?? loadVocabulary();
    this.settings = {
      batchSize: options.batchSize ?? 20,
      concurrency: options.concurrency ?? 2,
      delayMs: options.delayMs ?? 2000,
      timeoutMs: options.timeoutMs ?? 30000,
      retries: options.retries ?? 2,
      backoffMs: options.backoffMs ?? 1000,
    };
  }

  async extractBatch(records: readonly ProductRecord[], options: ExtractBatchOptions = {}): Promise<KeywordOutcome[]> {
    const items = records.map((record, index) => ({ id: recordId(record, index), record }));

    console.log(`[LLM] Generating ${items.length} keywords with ${this.client.getModelId()}`);

    return runInBatches(items, (batch, _index, signal) => this.requestBatch(batch, signal), {
      ...this.settings,
      signal: options.signal,
      label: 'KEYWORDS',
      onFailure: (item, error): KeywordOutcome => ({
        ok: false,
        id: item.id,
        error: error instanceof KeywordGenerationError ? error : new KeywordGenerationError(item.id, error.message),
      }),
    });
  }

  private async requestBatch(batch: KeywordItem[], signal: AbortSignal): Promise<KeywordOutcome[]> {
    const keys = batch.map((_item, position) => itemKey(position));
    const schema = {
      type: 'object',
      properties: Object.fromEntries(keys.map(key => [key, { type: 'string' }])),
      required: keys,
    };

    const response = await this.client.converse(buildKeywordPrompt(batch), {
      system: KEYWORD_SYSTEM_PROMPT,
      jsonSchema: schema,
      signal,
    });

    const reply = replySchema.safeParse(response.structuredOutput ?? parseStructuredOutput(response.text ?? ''));
    if (!reply.success) {
      throw new Error('reply is not a JSON object of item key → keyword');
    }

    return batch.map((item, position): KeywordOutcome => {
      const value = reply.data[itemKey(position)];
      if (typeof value !== 'string') {
        return { ok: false, id: item.id, error: new KeywordGenerationError(item.id, 'missing from reply') };
      }
      try {
        return { ok: true, id: item.id, keyword: this.acceptKeyword(item.id, value, item.record) };
      } catch (error) {
        return {
          ok: false,
          id: item.id,
          error: error instanceof Error ? error : new KeywordGenerationError(item.id, String(error)),
        };
      }
    });
  }

  /**
   * Applies the deterministic cleanup to a model keyword and rejects it when
   * it is empty or longer than the word cap.
   */
  acceptKeyword(id: string, value: string, record: ProductRecord): ExtractedKeyword {
    const brand = stripPossessivesAndSymbols(foldAccents(record.brand ?? ''));
    const cleaned = cleanTitle(value, { noise: this.vocabulary, ageStatements: 'suffix', brand });
    const words = deduplicateTokens(tokenize(cleaned));

    if (words.length === 0) {
      throw new KeywordGenerationError(id, `keyword "${value}" is empty after cleanup`);
    }
    if (words.length > MAX_KEYWORD_WORDS) {
      throw new KeywordGenerationError(id, `keyword "${value}" has ${words.length} words`);
    }
    return { words: titleCase(words), sourceTitle: record.title };
  }
}

import { z } from 'zod';
import { runInBatches } from './batch-runner.js';
import type { BatchSettings } from './batch-runner.js';
import { toCategoryPath } from './category-classifier.js';
import { CategoryFallbackError } from './errors.js';
import type { LlmClient } from './llm-client.js';
import { itemKey, parseStructuredOutput } from './llm-client.js';
import { isOther } from './taxonomy-index.js';
import type { TaxonomyIndex } from './taxonomy-index.js';
import type { CategoryPath } from './types.js';

export interface CategoryFallbackRequest {
  id: string;
  title: string;
  brand?: string;
  productType: string;
}

export type CategoryFallbackOutcome =
  | { ok: true; id: string; category: string; path: CategoryPath }
  | { ok: false; id: string; error: Error };

export interface FallbackBatchOptions {
  signal?: AbortSignal;
}

const replySchema = z.record(z.string(), z.unknown());

/** Groups items by canonical product type, remembering each one's input position */
export function groupByProductType<T extends { productType: string }>(
  taxonomy: TaxonomyIndex,
  items: readonly T[],
): Map<string, Array<{ index: number; request: T }>> {
  const groups = new Map<string, Array<{ index: number; request: T }>>();
  items.forEach((request, index) => {
    const type = taxonomy.resolveProductType(request.productType);
    const group = groups.get(type) || [];
    group.push({ index, request });
    groups.set(type, group);
  });
  return groups;
}

/**
 * Asks a language model to pick a category for products the keyword
 * classifier left at "Other". The model chooses from the product type's leaf
 * names with "Other" removed; anything off the list is rejected per item.
 */
export class LlmCategoryFallback {
  private client: LlmClient;
  private taxonomy: TaxonomyIndex;
  private settings: BatchSettings;

  constructor(client: LlmClient, taxonomy: TaxonomyIndex, settings: Partial<BatchSettings> = {}) {
    this.client = client;
    this.taxonomy = taxonomy;
    this.settings = {
      batchSize: settings.batchSize ?? 20,
      concurrency: settings.concurrency ?? 2,
      delayMs: settings.delayMs ?? 2000,
      timeoutMs: settings.timeoutMs ?? 30000,
      retries: settings.retries ?? 2,
      backoffMs: settings.backoffMs ?? 1000,
    };
  }

  /** Allowed choices for a product type: leaf names without "Other" */
  allowedCategories(productType: string): string[] {
    return this.taxonomy.leafNames(productType).filter(name => !isOther(name));
  }

  async classifyBatch(
    requests: readonly CategoryFallbackRequest[],
    options: FallbackBatchOptions = {},
  ): Promise<CategoryFallbackOutcome[]> {
    const results: CategoryFallbackOutcome[] = new Array<CategoryFallbackOutcome>(requests.length);

    for (const [productType, group] of groupByProductType(this.taxonomy, requests)) {
      let allowed: string[];
      try {
        allowed = this.allowedCategories(productType);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        for (const { index, request } of group) {
          results[index] = { ok: false, id: request.id, error: new CategoryFallbackError(request.id, reason) };
        }
        continue;
      }

      console.log(`[LLM] Category fallback for ${group.length} ${productType} products (${allowed.length} options)`);

      const outcomes = await runInBatches(
        group.map(entry => entry.request),
        (batch, _index, signal) => this.askForSelection(batch, productType, allowed, signal),
        {
          ...this.settings,
          signal: options.signal,
          label: 'CATEGORIES',
          onFailure: (request, error): CategoryFallbackOutcome => ({
            ok: false,
            id: request.id,
            error: error instanceof CategoryFallbackError ? error : new CategoryFallbackError(request.id, error.message),
          }),
        },
      );

      group.forEach(({ index }, i) => {
        const outcome = outcomes[i];
        if (outcome) results[index] = outcome;
      });
    }

    return results;
  }

  /**
   * One model call for a batch, with a JSON schema whose properties are the
   * positional item keys and whose values are restricted to the allowed names.
   */
  private async askForSelection(
    batch: CategoryFallbackRequest[],
    productType: string,
    allowed: string[],
    signal: AbortSignal,
  ): Promise<CategoryFallbackOutcome[]> {
    if (allowed.length === 0) {
      return batch.map((request): CategoryFallbackOutcome => ({
        ok: false,
        id: request.id,
        error: new CategoryFallbackError(request.id, `no categories to choose from for ${productType}`),
      }));
    }

    const keys = batch.map((_request, position) => itemKey(position));
    const schema = {
      type: 'object',
      properties: Object.fromEntries(
        keys.map(key => [
          key,
          {
            type: 'string',
            enum: allowed,
            description: `The best matching ${productType} category for this product`,
          },
        ]),
      ),
      required: keys,
    };

    const optionsList = allowed.map((name, i) => `${i + 1}. ${name}`).join('\n');
    const products = batch
      .map((request, position) => {
        const brand = request.brand ? ` (brand: ${request.brand})` : '';
        return `${itemKey(position)}: ${request.title}${brand}`;
      })
      .join('\n');

    const prompt = `You are assigning ${productType} products to categories.

Available categories (${allowed.length} total):
${optionsList}

Products:
${products}

For every product key, select the BEST matching category from the available options, using the exact name.
Focus on what the product is, not on the brand.`;

    const response = await this.client.converse(prompt, { jsonSchema: schema, signal });

    const reply = replySchema.safeParse(response.structuredOutput ?? parseStructuredOutput(response.text ?? ''));
    if (!reply.success) {
      throw new Error('reply is not a JSON object of item key → category');
    }

    return batch.map((request, position): CategoryFallbackOutcome => {
      const value = reply.data[itemKey(position)];
      if (typeof value !== 'string') {
        return { ok: false, id: request.id, error: new CategoryFallbackError(request.id, 'missing from reply') };
      }

      const wanted = value.trim().toLowerCase();
      const category = allowed.find(name => name.toLowerCase() === wanted);
      const node = category ? this.taxonomy.findByName(productType, category) : undefined;
      if (!category || !node) {
        return {
          ok: false,
          id: request.id,
          error: new CategoryFallbackError(request.id, `"${value}" is not one of the allowed categories`),
        };
      }

      console.log(`    └─ ${request.id}: "${category}"`);
      return {
        ok: true,
        id: request.id,
        category,
        path: toCategoryPath(node, this.taxonomy.defaultLabel(productType)),
      };
    });
  }
}

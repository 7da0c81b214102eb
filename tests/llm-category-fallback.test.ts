import { beforeAll, describe, expect, it, vi } from 'vitest';
import { CategoryFallbackError } from '../src/errors.js';
import { LlmCategoryFallback } from '../src/llm-category-fallback.js';
import type { CategoryFallbackOutcome } from '../src/llm-category-fallback.js';
import type { LlmClient, LlmResponse } from '../src/llm-client.js';
import { TaxonomyIndex } from '../src/taxonomy-index.js';

function reply(structuredOutput: unknown): LlmResponse {
  return {
    structuredOutput,
    stopReason: 'end_turn',
    usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
  };
}

const fastSettings = { batchSize: 20, concurrency: 1, delayMs: 0, timeoutMs: 0, retries: 0, backoffMs: 0 };

function summary(outcomes: CategoryFallbackOutcome[]): unknown[] {
  return outcomes.map(outcome =>
    outcome.ok ? { id: outcome.id, path: outcome.path } : { id: outcome.id, error: outcome.error.message },
  );
}

describe('LlmCategoryFallback', () => {
  let taxonomy: TaxonomyIndex;

  beforeAll(async () => {
    taxonomy = await TaxonomyIndex.fromCsv();
  });

  function setup(...responses: LlmResponse[]) {
    const converse = vi.fn<LlmClient['converse']>();
    for (const response of responses) {
      converse.mockResolvedValueOnce(response);
    }
    const fallback = new LlmCategoryFallback({ converse, getModelId: () => 'test-model' }, taxonomy, fastSettings);
    return { fallback, converse };
  }

  it('offers the leaf categories of the product type', () => {
    const { fallback } = setup();
    expect(fallback.allowedCategories('Luggage & Bags')).toEqual(['Backpacks', 'Cabin Suitcases', 'Handbags']);
  });

  it('restricts the reply to the allowed names', async () => {
    const { fallback, converse } = setup(reply({ 'item-1': 'cabin suitcases' }));
    await fallback.classifyBatch([{ id: '0', title: 'Weekend Carry All', productType: 'Luggage & Bags' }]);

    const [prompt, options] = converse.mock.calls[0] ?? [];
    expect(prompt).toContain('1. Backpacks\n2. Cabin Suitcases\n3. Handbags');
    expect(prompt).toContain('item-1: Weekend Carry All');
    expect(options?.jsonSchema).toEqual({
      type: 'object',
      properties: {
        'item-1': {
          type: 'string',
          enum: ['Backpacks', 'Cabin Suitcases', 'Handbags'],
          description: 'The best matching Luggage & Bags category for this product',
        },
      },
      required: ['item-1'],
    });
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });

  it('maps accepted names to a full path and rejects anything else', async () => {
    const { fallback } = setup(reply({ 'item-1': 'cabin suitcases', 'item-2': 'Garden Hose' }));
    const outcomes = await fallback.classifyBatch([
      { id: '0', title: 'Weekend Carry All', productType: 'Luggage & Bags' },
      { id: '1', title: 'Odd Thing', productType: 'Luggage & Bags' },
    ]);

    expect(summary(outcomes)).toEqual([
      { id: '0', path: { level1: 'Luggage', level2: 'Suitcases', level3: 'Cabin Suitcases' } },
      { id: '1', error: 'Category fallback failed for item 1: "Garden Hose" is not one of the allowed categories' },
    ]);
    expect(outcomes[1]?.ok === false && outcomes[1].error instanceof CategoryFallbackError).toBe(true);
  });

  it('asks once per product type and keeps results in input order', async () => {
    const { fallback, converse } = setup(
      reply({ 'item-1': 'Backpacks', 'item-2': 'Handbags' }),
      reply({ 'item-1': 'Cat Toys' }),
    );
    const outcomes = await fallback.classifyBatch([
      { id: '0', title: 'Trail Pack', productType: 'Luggage & Bags' },
      { id: '1', title: 'Feather Wand', productType: 'Pets' },
      { id: '2', title: 'Evening Clutch', brand: 'Test Brand', productType: 'luggage & bags' },
    ]);

    expect(converse).toHaveBeenCalledTimes(2);
    expect(summary(outcomes)).toEqual([
      { id: '0', path: { level1: 'Bags', level2: 'Backpacks', level3: 'Other' } },
      { id: '1', path: { level1: 'Cat Supplies', level2: 'Cat Toys', level3: 'Other' } },
      { id: '2', path: { level1: 'Bags', level2: 'Handbags', level3: 'Other' } },
    ]);
  });

  it('answers each request even when ids repeat', async () => {
    const { fallback } = setup(reply({ 'item-1': 'Backpacks', 'item-2': 'Handbags' }));
    const outcomes = await fallback.classifyBatch([
      { id: '1', title: 'Trail Pack', productType: 'Luggage & Bags' },
      { id: '1', title: 'Evening Clutch', productType: 'Luggage & Bags' },
    ]);

    expect(summary(outcomes)).toEqual([
      { id: '1', path: { level1: 'Bags', level2: 'Backpacks', level3: 'Other' } },
      { id: '1', path: { level1: 'Bags', level2: 'Handbags', level3: 'Other' } },
    ]);
  });

  it('fails items whose product type has no categories without calling the model', async () => {
    const { fallback, converse } = setup();
    const outcomes = await fallback.classifyBatch([{ id: '7', title: 'Sourdough Loaf', productType: 'F&F (Later)' }]);

    expect(converse).not.toHaveBeenCalled();
    expect(summary(outcomes)).toEqual([
      {
        id: '7',
        error:
          'Category fallback failed for item 7: Taxonomy not available for product type "F&F (Later)": no categories for this product type',
      },
    ]);
  });
});

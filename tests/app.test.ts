import { beforeAll, describe, expect, it, vi } from 'vitest';
import { createRequestHandler } from '../src/app.js';
import type { AppDependencies, RequestHandler } from '../src/app.js';
import { CatalogProcessor } from '../src/catalog-processor.js';
import { CategoryClassifier } from '../src/category-classifier.js';
import { CategoryValidator } from '../src/category-validator.js';
import { LocalKeywordExtractor } from '../src/keyword-extractor.js';
import type { LlmClient } from '../src/llm-client.js';
import { TaxonomyIndex } from '../src/taxonomy-index.js';

const TOKEN = 'test-secret';

function request(path: string, init: { method?: string; body?: unknown; token?: string | null } = {}): Request {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (init.token !== null) headers.Authorization = `Bearer ${init.token ?? TOKEN}`;

  return new Request(`http://localhost${path}`, {
    method: init.method ?? 'GET',
    headers,
    body: init.body === undefined ? undefined : typeof init.body === 'string' ? init.body : JSON.stringify(init.body),
  });
}

describe('request handler', () => {
  let deps: AppDependencies;
  let handle: RequestHandler;

  beforeAll(async () => {
    const taxonomy = await TaxonomyIndex.fromCsv();
    const classifier = new CategoryClassifier(taxonomy);
    const local = new LocalKeywordExtractor();
    deps = {
      taxonomy,
      classifier,
      processor: new CatalogProcessor(classifier, local),
      keywordStrategies: { local },
      defaultStrategy: 'local',
      accessToken: TOKEN,
    };
    handle = createRequestHandler(deps);
  });

  it('answers preflight requests', async () => {
    const response = await handle(request('/api/classify', { method: 'OPTIONS', token: null }));
    expect(response.status).toBe(204);
    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('*');
  });

  it('reports health without a token', async () => {
    const response = await handle(request('/health', { token: null }));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', keyword_strategy: 'local', cache_stats: null });
  });

  it('requires the access token on api routes', async () => {
    const missing = await handle(request('/api/classify', { method: 'POST', token: null, body: {} }));
    const wrong = await handle(request('/api/classify', { method: 'POST', token: 'nope', body: {} }));

    expect(missing.status).toBe(401);
    expect(wrong.status).toBe(401);
  });

  it('classifies a title', async () => {
    const response = await handle(
      request('/api/classify', {
        method: 'POST',
        body: { title: 'Jim Beam Bourbon', product_type: 'Alcoholic Beverages' },
      }),
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      level1: 'Spirits',
      level2: 'Whisky',
      level3: 'Bourbon',
      matched_keyword: 'jim beam',
    });
  });

  it('rejects invalid bodies', async () => {
    const invalid = await handle(request('/api/classify', { method: 'POST', body: { title: 'Jim Beam Bourbon' } }));
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({ error: 'Invalid request body', message: 'product_type: Required' });

    const malformed = await handle(request('/api/classify', { method: 'POST', body: '{"title":' }));
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ error: 'Invalid JSON' });
  });

  it('returns 422 for an unknown product type', async () => {
    const response = await handle(
      request('/api/classify', { method: 'POST', body: { title: 'Jim Beam Bourbon', product_type: 'Garden Gnomes' } }),
    );

    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({ error: 'UnknownProductTypeError' });
  });

  it('generates keywords with the default strategy', async () => {
    const response = await handle(
      request('/api/keywords', {
        method: 'POST',
        body: {
          products: [
            { id: 42, title: 'Blantons Single Barrel Bourbon 750ml', brand: 'Blantons', product_type: 'BWS' },
            { title: 'Domaine Élise Rosé 2023 75cl', brand: null, product_type: 'BWS' },
          ],
        },
      }),
    );

    expect(await response.json()).toEqual({
      strategy: 'local',
      results: [
        { id: '42', keyword: 'Blantons Bourbon', words: ['Blantons', 'Bourbon'] },
        { id: '1', keyword: 'Domaine Elise Rose', words: ['Domaine', 'Elise', 'Rose'] },
      ],
    });
  });

  it('rejects duplicate product ids', async () => {
    const response = await handle(
      request('/api/keywords', {
        method: 'POST',
        body: {
          products: [
            { id: 1, title: 'Alpha Gin', product_type: 'BWS' },
            { id: '1', title: 'Beta Vodka', product_type: 'BWS' },
          ],
        },
      }),
    );

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Invalid request body',
      message: 'products.1.id: Duplicate id "1"',
    });
  });

  it('refuses a strategy that is not configured', async () => {
    const response = await handle(
      request('/api/keywords', {
        method: 'POST',
        body: { strategy: 'llm', products: [{ title: 'Test Gin', product_type: 'BWS' }] },
      }),
    );

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Keyword strategy "llm" is not configured' });
  });

  it('processes products end to end', async () => {
    const response = await handle(
      request('/api/process', {
        method: 'POST',
        body: { products: [{ id: 'sku-1', title: 'Jim Beam Bourbon', brand: 'Jim Beam', product_type: 'BWS' }] },
      }),
    );

    expect(await response.json()).toEqual({
      results: [
        {
          id: 'sku-1',
          title: 'Jim Beam Bourbon',
          product_type: 'BWS',
          level1: 'Spirits',
          level2: 'Whisky',
          level3: 'Bourbon',
          keyword: 'Jim Beam Bourbon',
          source: 'local',
          cached: false,
          errors: [],
        },
      ],
      count: 1,
    });
  });

  it('lists the categories of a product type', async () => {
    const response = await handle(request('/api/categories?product_type=luggage%20%26%20bags'));
    const body = await response.json();

    expect(body).toMatchObject({
      product_type: 'Luggage & Bags',
      default_label: 'Luggage & Bags',
      leaf_names: ['Backpacks', 'Cabin Suitcases', 'Handbags'],
      count: 6,
    });

    expect((await handle(request('/api/categories'))).status).toBe(400);
    expect((await handle(request('/api/categories?product_type=Garden%20Gnomes'))).status).toBe(404);
  });

  it('reloads the taxonomy when a source is configured', async () => {
    expect((await handle(request('/api/taxonomy/reload', { method: 'POST' }))).status).toBe(404);

    const taxonomy = new TaxonomyIndex([{ productType: 'Toys', level1: 'Games', level2: 'Board Games' }]);
    const reloading = createRequestHandler({
      ...deps,
      taxonomy,
      loadTaxonomy: async () => [{ productType: 'Toys', level1: 'Games', level2: 'Card Games' }],
    });

    const response = await reloading(request('/api/taxonomy/reload', { method: 'POST' }));
    expect(await response.json()).toMatchObject({ status: 'reloaded', productTypes: 1, categories: 2 });
    expect(taxonomy.leafNames('Toys')).toEqual(['Card Games']);
  });

  describe('category validation', () => {
    function validating(structuredOutput: unknown): RequestHandler {
      const converse = vi.fn<LlmClient['converse']>().mockResolvedValue({
        structuredOutput,
        stopReason: 'end_turn',
        usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      });
      const validator = new CategoryValidator({ converse, getModelId: () => 'test-model' }, deps.classifier, {
        delayMs: 0,
        timeoutMs: 0,
        retries: 0,
      });
      return createRequestHandler({ ...deps, validator });
    }

    it('is unavailable without an LLM', async () => {
      const response = await handle(
        request('/api/validate', {
          method: 'POST',
          body: { products: [{ title: 'Trail Rucksack', product_type: 'Luggage & Bags' }] },
        }),
      );
      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Category validation is not available' });
    });

    it('checks the keyword category when none is given', async () => {
      const validate = validating({ 'item-1': { verdict: 'CORRECT', category: 'Backpacks', confidence: 'HIGH' } });
      const response = await validate(
        request('/api/validate', {
          method: 'POST',
          body: { products: [{ title: 'Trail Rucksack', product_type: 'Luggage & Bags' }] },
        }),
      );

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        mode: 'validate',
        results: [
          { id: '0', assigned_category: 'Backpacks', suggested_category: 'Backpacks', correct: true, confidence: 'high' },
        ],
        report: {
          total: 1,
          validated: 1,
          correct: 1,
          incorrect: 0,
          failed: 0,
          accuracy: 1,
          confidence: { high: 1, medium: 0, low: 0 },
          misclassified: [],
        },
      });
    });

    it('compares keyword and model categories', async () => {
      const validate = validating({ 'item-1': 'Cabin Suitcases' });
      const response = await validate(
        request('/api/validate', {
          method: 'POST',
          body: { mode: 'compare', products: [{ id: 'x', title: 'Weekend Carry All', product_type: 'Luggage & Bags' }] },
        }),
      );

      expect(await response.json()).toEqual({
        mode: 'compare',
        results: [
          {
            id: 'x',
            title: 'Weekend Carry All',
            keyword_category: 'Luggage & Bags',
            llm_category: 'Cabin Suitcases',
            agree: false,
            final_category: 'Cabin Suitcases',
            errors: [],
          },
        ],
        agreed: 0,
      });
    });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await handle(request('/api/nothing-here'));
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });
});

import { z, ZodError } from 'zod';
import type { CatalogProcessor } from './catalog-processor.js';
import type { CategoryClassifier } from './category-classifier.js';
import { buildValidationReport } from './category-validator.js';
import type { CategoryValidator } from './category-validator.js';
import type { ResultCache } from './database.js';
import { TaxonomyLoadError, UnknownProductTypeError } from './errors.js';
import { formatKeyword } from './keyword-extractor.js';
import type { KeywordStrategy } from './keyword-extractor.js';
import type { TaxonomyIndex } from './taxonomy-index.js';
import type { ProductRecord, TaxonomyRow } from './types.js';

const MAX_PRODUCTS_PER_REQUEST = 1000;

const productSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).optional(),
  title: z.string(),
  brand: z.string().nullish(),
  product_type: z.string().min(1),
});

function uniqueIds(products: Array<{ id?: string }>, ctx: z.RefinementCtx): void {
  const seen = new Set<string>();
  products.forEach((product, index) => {
    if (product.id === undefined) return;
    if (seen.has(product.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `Duplicate id "${product.id}"` });
    }
    seen.add(product.id);
  });
}

const productsSchema = z.array(productSchema).min(1).max(MAX_PRODUCTS_PER_REQUEST).superRefine(uniqueIds);

const classifyBodySchema = z.object({
  title: z.string(),
  product_type: z.string().min(1),
});

const keywordsBodySchema = z.object({
  products: productsSchema,
  strategy: z.enum(['local', 'llm']).optional(),
});

const processBodySchema = z.object({
  products: productsSchema,
  refresh: z.boolean().optional(),
});

const validateBodySchema = z.object({
  products: z
    .array(productSchema.extend({ assigned_category: z.string().min(1).optional() }))
    .min(1)
    .max(MAX_PRODUCTS_PER_REQUEST)
    .superRefine(uniqueIds),
  mode: z.enum(['validate', 'compare']).optional(),
});

type ProductInput = z.infer<typeof productSchema>;

export interface AppDependencies {
  taxonomy: TaxonomyIndex;
  classifier: CategoryClassifier;
  processor: CatalogProcessor;
  keywordStrategies: { local: KeywordStrategy; llm?: KeywordStrategy };
  defaultStrategy: 'local' | 'llm';
  cache?: ResultCache;
  /** Bearer token for /api/* routes; no check when unset */
  accessToken?: string;
  /** Source used by POST /api/taxonomy/reload */
  loadTaxonomy?: () => Promise<TaxonomyRow[]>;
  /** Backs POST /api/validate; only set with an LLM configured */
  validator?: CategoryValidator;
}

export type RequestHandler = (req: Request) => Promise<Response>;

const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

function toRecord(input: ProductInput): ProductRecord {
  return {
    id: input.id,
    title: input.title,
    brand: input.brand ?? undefined,
    productType: input.product_type,
  };
}

function json(body: unknown, status = 200): Response {
  return Response.json(body, { status, headers: corsHeaders });
}

function errorResponse(error: unknown): Response {
  if (error instanceof ZodError) {
    return json(
      {
        error: 'Invalid request body',
        message: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
      },
      400,
    );
  }
  if (error instanceof SyntaxError) {
    return json({ error: 'Invalid JSON', message: error.message }, 400);
  }
  if (error instanceof UnknownProductTypeError || error instanceof TaxonomyLoadError) {
    return json({ error: error.name, message: error.message }, 422);
  }

  console.error('Error handling request:', error);
  return json(
    {
      error: 'Internal server error',
      message: error instanceof Error ? error.message : 'Unknown error',
    },
    500,
  );
}

export function createRequestHandler(deps: AppDependencies): RequestHandler {
  // Helper function to validate access token
  const validateToken = (req: Request): boolean => {
    if (!deps.accessToken) return true;
    const authHeader = req.headers.get('Authorization');
    if (!authHeader) return false;

    const token = authHeader.replace(/^Bearer\s+/i, '');
    return token === deps.accessToken;
  };

  const classify = async (req: Request): Promise<Response> => {
    const body = classifyBodySchema.parse(await req.json());
    const result = deps.classifier.classifyWithDetail(body.title, body.product_type);

    return json({
      level1: result.path.level1,
      level2: result.path.level2,
      level3: result.path.level3,
      matched_keyword: result.match?.matchedKeyword ?? null,
    });
  };

  const keywords = async (req: Request): Promise<Response> => {
    const body = keywordsBodySchema.parse(await req.json());
    const source = body.strategy ?? deps.defaultStrategy;
    const strategy = deps.keywordStrategies[source];

    if (!strategy) {
      return json({ error: `Keyword strategy "${source}" is not configured` }, 400);
    }

    const outcomes = await strategy.extractBatch(body.products.map(toRecord), { signal: req.signal });

    return json({
      strategy: source,
      results: outcomes.map(outcome =>
        outcome.ok
          ? { id: outcome.id, keyword: formatKeyword(outcome.keyword), words: outcome.keyword.words }
          : { id: outcome.id, keyword: null, error: outcome.error.message },
      ),
    });
  };

  const processProducts = async (req: Request): Promise<Response> => {
    const body = processBodySchema.parse(await req.json());
    const processed = await deps.processor.process(body.products.map(toRecord), {
      refresh: body.refresh,
      signal: req.signal,
    });

    return json({
      results: processed.map(item => ({
        id: item.record.id ?? null,
        title: item.record.title,
        product_type: item.record.productType,
        level1: item.category.level1,
        level2: item.category.level2,
        level3: item.category.level3,
        keyword: item.keyword,
        source: item.source,
        cached: item.cached,
        errors: item.errors,
      })),
      count: processed.length,
    });
  };

  const validate = async (req: Request): Promise<Response> => {
    if (!deps.validator) {
      return json({ error: 'Category validation is not available' }, 404);
    }
    const body = validateBodySchema.parse(await req.json());
    const products = body.products.map((product, index) => ({
      id: product.id ?? String(index),
      title: product.title,
      brand: product.brand ?? undefined,
      productType: product.product_type,
      assigned: product.assigned_category,
    }));

    if (body.mode === 'compare') {
      const results = await deps.validator.dualClassify(products, { signal: req.signal });
      return json({
        mode: 'compare',
        results: results.map(result => ({
          id: result.id,
          title: result.title,
          keyword_category: result.keywordCategory,
          llm_category: result.llmCategory,
          agree: result.agree,
          final_category: result.finalCategory,
          errors: result.errors,
        })),
        agreed: results.filter(result => result.agree).length,
      });
    }

    const outcomes = await deps.validator.validateBatch(
      products.map(product => ({
        ...product,
        assignedCategory: product.assigned ?? deps.classifier.classifyLeaf(product.title, product.productType),
      })),
      { signal: req.signal },
    );
    const report = buildValidationReport(outcomes);

    return json({
      mode: 'validate',
      results: outcomes.map(outcome =>
        outcome.ok
          ? {
              id: outcome.id,
              assigned_category: outcome.assignedCategory,
              suggested_category: outcome.suggestedCategory,
              correct: outcome.correct,
              confidence: outcome.confidence,
            }
          : { id: outcome.id, assigned_category: outcome.assignedCategory, error: outcome.error.message },
      ),
      report: {
        total: report.total,
        validated: report.validated,
        correct: report.correct,
        incorrect: report.incorrect,
        failed: report.failed,
        accuracy: report.accuracy,
        confidence: report.confidence,
        misclassified: report.misclassifications.map(item => item.id),
      },
    });
  };

  const categories = (url: URL): Response => {
    const productType = url.searchParams.get('product_type');
    if (!productType) {
      return json({ error: 'Missing "product_type" query parameter' }, 400);
    }
    if (!deps.taxonomy.isKnownProductType(productType)) {
      return json({ error: `Unknown product type "${productType}"` }, 404);
    }

    const nodes = deps.taxonomy.nodes(productType);
    return json({
      product_type: deps.taxonomy.resolveProductType(productType),
      default_label: deps.taxonomy.defaultLabel(productType),
      leaf_names: deps.taxonomy.leafNames(productType),
      categories: nodes.map(node => ({
        name: node.name,
        level: node.level,
        path: node.path.join(' > '),
        keywords: [...node.keywords].sort(),
      })),
      count: nodes.length,
    });
  };

  const reloadTaxonomy = async (): Promise<Response> => {
    if (!deps.loadTaxonomy) {
      return json({ error: 'Taxonomy reload is not available' }, 404);
    }
    deps.taxonomy.reload(await deps.loadTaxonomy());
    return json({ status: 'reloaded', ...deps.taxonomy.getStats() });
  };

  return async (req: Request): Promise<Response> => {
    const url = new URL(req.url);

    // Handle preflight requests
    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders });
    }

    // Health check endpoint
    if (url.pathname === '/health' && req.method === 'GET') {
      return json({
        status: 'ok',
        taxonomy: deps.taxonomy.getStats(),
        keyword_strategy: deps.defaultStrategy,
        cache_stats: deps.cache?.isConnected() ? deps.cache.getStats() : null,
      });
    }

    if (url.pathname.startsWith('/api/') && !validateToken(req)) {
      return json({ error: 'Unauthorized - valid access token required' }, 401);
    }

    try {
      if (url.pathname === '/api/classify' && req.method === 'POST') return await classify(req);
      if (url.pathname === '/api/keywords' && req.method === 'POST') return await keywords(req);
      if (url.pathname === '/api/process' && req.method === 'POST') return await processProducts(req);
      if (url.pathname === '/api/categories' && req.method === 'GET') return categories(url);
      if (url.pathname === '/api/taxonomy/reload' && req.method === 'POST') return await reloadTaxonomy();
      if (url.pathname === '/api/validate' && req.method === 'POST') return await validate(req);
    } catch (error) {
      return errorResponse(error);
    }

    // 404 for unknown routes
    return json({ error: 'Not found' }, 404);
  };
}

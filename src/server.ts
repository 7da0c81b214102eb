#!/usr/bin/env node

import 'dotenv/config';
import { createServer } from 'node:http';
import { createRequestHandler } from './app.js';
import type { RequestHandler } from './app.js';
import { CatalogProcessor } from './catalog-processor.js';
import { CategoryClassifier } from './category-classifier.js';
import { CategoryValidator } from './category-validator.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { ResultCache } from './database.js';
import { ConfigError } from './errors.js';
import { handleNodeRequest } from './http-adapter.js';
import { LocalKeywordExtractor } from './keyword-extractor.js';
import { LlmCategoryFallback } from './llm-category-fallback.js';
import { BedrockLlmClient } from './llm-client.js';
import { LlmKeywordExtractor } from './llm-keyword-extractor.js';
import { TaxonomyIndex } from './taxonomy-index.js';
import { loadTaxonomyCsv } from './taxonomy-loader.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`ERROR: ${error.message}`);
    process.exit(1);
  }
  throw error;
}

// Get API access token from environment
if (!config.apiAccessToken) {
  console.error('ERROR: API_ACCESS_TOKEN environment variable is required');
  process.exit(1);
}
console.log('✓ API access token configured');

// Load taxonomy data at startup
console.log(`Loading taxonomy from ${config.taxonomyPath}...`);
const taxonomyPath = config.taxonomyPath;
const taxonomy = await TaxonomyIndex.fromCsv(taxonomyPath);
const stats = taxonomy.getStats();
console.log(`✓ Product types: ${stats.productTypes}`);
console.log(`✓ Total categories: ${stats.categories}`);

// Connect to SQLite database
const cache = new ResultCache();
try {
  cache.connect(config.cacheDbPath);
  console.log('✓ Connected to result cache database (SQLite)');
} catch (error) {
  console.error('Warning: Could not connect to database:', error);
}

const classifier = new CategoryClassifier(taxonomy);
const local = new LocalKeywordExtractor({ agePolicy: config.agePolicy });
let llm: LlmKeywordExtractor | undefined;
let categoryFallback: LlmCategoryFallback | undefined;
let validator: CategoryValidator | undefined;

if (config.keywordStrategy === 'llm') {
  const client = new BedrockLlmClient({
    region: config.aws.region,
    accessKeyId: config.aws.accessKeyId,
    secretAccessKey: config.aws.secretAccessKey,
    modelId: config.llm.modelId,
  });
  const settings = {
    batchSize: config.llm.batchSize,
    concurrency: config.llm.concurrency,
    delayMs: config.llm.delayMs,
    timeoutMs: config.llm.timeoutMs,
    retries: config.llm.retries,
  };
  llm = new LlmKeywordExtractor(client, settings);
  categoryFallback = new LlmCategoryFallback(client, taxonomy, settings);
  validator = new CategoryValidator(client, classifier, settings);
  console.log(`✓ Using LLM model: ${client.getModelId()}`);
}

const processor = new CatalogProcessor(classifier, llm ?? local, {
  cache,
  categoryFallback,
});
console.log(`✓ Keyword strategy: ${config.keywordStrategy}`);

const handler = createRequestHandler({
  taxonomy,
  classifier,
  processor,
  keywordStrategies: { local, llm },
  defaultStrategy: config.keywordStrategy,
  cache,
  accessToken: config.apiAccessToken,
  loadTaxonomy: () => loadTaxonomyCsv(taxonomyPath),
  validator,
});

function listen(requestHandler: RequestHandler, port: number): void {
  const server = createServer((req, res) => {
    handleNodeRequest(req, res, requestHandler, { port, maxBodyBytes: config.maxBodyBytes }).catch(
      (error: unknown) => console.error('Error writing response:', error),
    );
  });

  server.listen(port, () => {
    console.log(`\n✓ HTTP server running on http://localhost:${port}`);
    console.log('\nAvailable endpoints:');
    console.log('  GET  /health                          - Health check and stats');
    console.log('  POST /api/classify                    - Classify one product title');
    console.log('  POST /api/keywords                    - Generate search keywords');
    console.log('  POST /api/process                     - Classify and generate keywords');
    console.log('  GET  /api/categories?product_type=... - List categories for a product type');
    console.log('  POST /api/taxonomy/reload             - Reload the taxonomy file');
    if (validator) {
      console.log('  POST /api/validate                    - Check categories with the LLM');
    }
    console.log('\nPress Ctrl+C to stop\n');
  });

  const shutdown = () => {
    server.close(() => {
      cache
        .close()
        .catch((error: unknown) => console.error('Error closing database:', error))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

listen(handler, config.port);

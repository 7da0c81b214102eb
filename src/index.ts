export { AccessoryDisambiguator, evaluateRule } from './accessory-disambiguator.js';
export type { AccessoryVerdict, CompiledAccessoryRule, RuleVerdict } from './accessory-disambiguator.js';
export { createRequestHandler } from './app.js';
export type { AppDependencies, RequestHandler } from './app.js';
export { chunk, runInBatches } from './batch-runner.js';
export type { BatchOptions, BatchSettings, BatchWorker } from './batch-runner.js';
export { CatalogProcessor } from './catalog-processor.js';
export type { CatalogProcessorOptions, ProcessOptions } from './catalog-processor.js';
export { CategoryClassifier, compareMatches, toCategoryPath } from './category-classifier.js';
export type { CategoryClassifierOptions } from './category-classifier.js';
export { buildValidationReport, CategoryValidator, CONFIDENCE_LEVELS } from './category-validator.js';
export type {
  Confidence,
  DualClassification,
  ValidatedItem,
  ValidationBatchOptions,
  ValidationOutcome,
  ValidationReport,
  ValidationRequest,
} from './category-validator.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createCacheKey, ResultCache } from './database.js';
export type { CacheStats, SaveResultInput } from './database.js';
export * from './errors.js';
export { DEFAULT_MAX_BODY_BYTES, handleNodeRequest, readBody, toRequest, writeResponse } from './http-adapter.js';
export type { AdapterOptions, NodeRequest, NodeResponse } from './http-adapter.js';
export { formatKeyword, LocalKeywordExtractor, MAX_KEYWORD_WORDS } from './keyword-extractor.js';
export type { ExtractBatchOptions, KeywordStrategy, LocalKeywordExtractorOptions } from './keyword-extractor.js';
export { groupByProductType, LlmCategoryFallback } from './llm-category-fallback.js';
export type { CategoryFallbackOutcome, CategoryFallbackRequest } from './llm-category-fallback.js';
export { BedrockLlmClient, DEFAULT_MODEL_ID, itemKey, parseStructuredOutput } from './llm-client.js';
export type { BedrockConfig, ConverseOptions, LlmClient, LlmResponse } from './llm-client.js';
export { buildKeywordPrompt, KEYWORD_SYSTEM_PROMPT, LlmKeywordExtractor } from './llm-keyword-extractor.js';
export type { LlmKeywordExtractorOptions } from './llm-keyword-extractor.js';
export { calculatePeakPopularity, calculatePeakSeasonality, mergeSearchVolume, monthName } from './seasonality.js';
export type { SearchVolumeFields, SearchVolumeRow } from './seasonality.js';
export { deriveKeywords, isOther, TaxonomyIndex } from './taxonomy-index.js';
export type { TaxonomyIndexOptions, TaxonomyStats } from './taxonomy-index.js';
export { DEFAULT_TAXONOMY_PATH, loadTaxonomyCsv, parseTaxonomyCsv } from './taxonomy-loader.js';
export * from './text-normalizer.js';
export * from './types.js';
export {
  loadAccessoryRules,
  loadDefaultLabels,
  loadKeywordEnrichment,
  loadVocabulary,
  parseAccessoryRules,
  parseKeywordEnrichment,
} from './vocabulary.js';
export type { AccessoryRuleTable, DefaultLabels, KeywordEnrichment, Vocabulary } from './vocabulary.js';

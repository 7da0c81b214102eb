import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export const DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

const wordList = z.array(z.string().min(1));

const vocabularySchema = z.object({
  genericWords: wordList,
  extractionStopwords: wordList,
  descriptorWords: wordList,
  geographicWords: wordList,
  giftWords: wordList,
  promoWords: wordList,
  multipackWords: wordList,
  retailerNames: wordList,
  productTypeWords: wordList,
  spellingVariants: z.array(z.array(z.string().min(1)).min(2)),
});

const defaultLabelsSchema = z.object({
  defaultLabels: z.record(z.string().min(1)),
  aliases: z.record(z.string().min(1)).default({}),
});

const enrichmentRuleSchema = z.object({
  match: z.string().min(1),
  add: wordList.default([]),
  remove: wordList.default([]),
});

const enrichmentSchema = z.record(z.array(enrichmentRuleSchema));

const accessoryRuleSchema = z.object({
  name: z.string().min(1),
  accessorySignals: wordList,
  contextSignals: wordList.default([]),
  coreSignals: wordList.default([]),
  mainSignals: wordList.default([]),
  mainRequires: wordList.default([]),
  accessoryCategories: wordList,
  mainCategories: wordList.default([]),
});

const accessoryRulesSchema = z.record(z.array(accessoryRuleSchema));

export type RawVocabulary = z.infer<typeof vocabularySchema>;
export type KeywordEnrichmentRule = z.infer<typeof enrichmentRuleSchema>;
export type KeywordEnrichment = z.infer<typeof enrichmentSchema>;
export type AccessoryRule = z.infer<typeof accessoryRuleSchema>;
export type AccessoryRuleTable = z.infer<typeof accessoryRulesSchema>;

/**
 * Word lists used by normalization, keyword derivation and extraction.
 * Lists are lower case; phrases may contain spaces.
 */
export interface Vocabulary {
  genericWords: ReadonlySet<string>;
  extractionStopwords: ReadonlySet<string>;
  descriptorWords: ReadonlySet<string>;
  geographicWords: ReadonlySet<string>;
  giftWords: readonly string[];
  promoWords: readonly string[];
  multipackWords: readonly string[];
  retailerNames: readonly string[];
  productTypeWords: ReadonlySet<string>;
  /** Each entry lists the canonical spelling first, then its alternates */
  spellingVariants: readonly (readonly string[])[];
}

export interface DefaultLabels {
  defaultLabels: Readonly<Record<string, string>>;
  aliases: Readonly<Record<string, string>>;
}

function readDataFile(fileName: string): unknown {
  return JSON.parse(readFileSync(`${DATA_DIR}${fileName}`, 'utf-8'));
}

function lower(words: string[]): string[] {
  return words.map(w => w.toLowerCase().trim());
}

export function toVocabulary(raw: RawVocabulary): Vocabulary {
  return Object.freeze({
    genericWords: new Set(lower(raw.genericWords)),
    extractionStopwords: new Set(lower(raw.extractionStopwords)),
    descriptorWords: new Set(lower(raw.descriptorWords)),
    geographicWords: new Set(lower(raw.geographicWords)),
    giftWords: lower(raw.giftWords),
    promoWords: lower(raw.promoWords),
    multipackWords: lower(raw.multipackWords),
    retailerNames: lower(raw.retailerNames),
    productTypeWords: new Set(lower(raw.productTypeWords)),
    spellingVariants: raw.spellingVariants.map(lower),
  });
}

let vocabulary: Vocabulary | null = null;
let defaultLabels: DefaultLabels | null = null;
let enrichment: KeywordEnrichment | null = null;
let accessoryRules: AccessoryRuleTable | null = null;

export function loadVocabulary(): Vocabulary {
  if (!vocabulary) {
    vocabulary = toVocabulary(vocabularySchema.parse(readDataFile('vocabulary.json')));
  }
  return vocabulary;
}

export function loadDefaultLabels(): DefaultLabels {
  if (!defaultLabels) {
    defaultLabels = defaultLabelsSchema.parse(readDataFile('default-labels.json'));
  }
  return defaultLabels;
}

export function loadKeywordEnrichment(): KeywordEnrichment {
  if (!enrichment) {
    enrichment = enrichmentSchema.parse(readDataFile('keyword-enrichment.json'));
  }
  return enrichment;
}

export function loadAccessoryRules(): AccessoryRuleTable {
  if (!accessoryRules) {
    accessoryRules = accessoryRulesSchema.parse(readDataFile('accessory-rules.json'));
  }
  return accessoryRules;
}

/** Parses an accessory rule table supplied by a caller instead of the bundled one */
export function parseAccessoryRules(input: unknown): AccessoryRuleTable {
  return accessoryRulesSchema.parse(input);
}

export function parseKeywordEnrichment(input: unknown): KeywordEnrichment {
  return enrichmentSchema.parse(input);
}

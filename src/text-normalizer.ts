/**
 * Text normalization primitives shared by the classifier and the keyword
 * extractors. Every function here is total and idempotent.
 */

export interface NoiseVocabulary {
  giftWords: readonly string[];
  promoWords: readonly string[];
  multipackWords: readonly string[];
  retailerNames: readonly string[];
}

// Marks are stripped only after a Latin letter; й and ё keep theirs
const LATIN_WITH_MARKS = /(\p{Script=Latin})\p{M}+/gu;
const SPECIAL_LETTERS: Record<string, string> = {
  'ß': 'ss',
  'ẞ': 'SS',
  'æ': 'ae',
  'Æ': 'AE',
  'œ': 'oe',
  'Œ': 'OE',
  'ø': 'o',
  'Ø': 'O',
  'ł': 'l',
  'Ł': 'L',
  'đ': 'd',
  'Đ': 'D',
  'ð': 'd',
  'Ð': 'D',
  'þ': 'th',
  'Þ': 'Th',
  'ı': 'i',
};
const SPECIAL_LETTER_PATTERN = new RegExp(`[${Object.keys(SPECIAL_LETTERS).join('')}]`, 'g');

const APOSTROPHES = /['’‘`´]/g;
const SEPARATORS = /[^\p{L}\p{M}\p{N}\s]+/gu;

// Word edges that also hold for accented and non-Latin letters
const WORD_START = '(?<![\\p{L}\\p{N}])';
const WORD_END = '(?![\\p{L}\\p{N}])';

const AGE_PATTERNS = [
  /\b(\d+)[\s-]?(?:years?|yrs?)[\s-]?old\b/gi, // 12 Year Old, 12-year-old
  /\b(\d+)\s?yo\b/gi, // 12yo
];

const ABV_AND_SIZE_PATTERNS = [
  /\d+(?:[.,]\d+)?\s?%(?:\s?(?:abv|vol)\b)?/gi, // 40%, 13.5% vol
  /\b\d+\s?proof\b/gi,
  /\b\d+\s?x\s?\d+(?:[.,]\d+)?\s?(?:ml|cl|ltr|l|g|kg|oz)?\b/gi, // 24x330ml, 6 x 500ml
  /\b\d+(?:[.,]\d+)?\s?(?:ml|cl|ltr|litres?|liters?|l|kg|g|oz|lbs?)\b/gi,
  /\b\d+\s?(?:pack|pk|bottles?|cans?|miniatures?)\b/gi,
  /\bcase\s+of\s+\d+\b/gi,
  /\b\d+x\b/gi,
  /\bx\s?\d+\b/gi,
  /\b\d{5,}\b/g, // barcodes
];

const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/g;

const ASIDE_PATTERNS = [
  /\([^)]*\)/g,
  /\[[^\]]*\]/g,
  /\|.*$/g,
];

const BRAND_PLACEHOLDER = '\uE000';

const MAX_PASSES = 5;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Builds a case-insensitive whole-word alternation, longest phrase first */
function phrasePattern(phrases: readonly string[]): RegExp | null {
  const alternatives = [...new Set(phrases.map(p => collapseWhitespace(p.toLowerCase())))]
    .filter(p => p.length > 0)
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map(p => p.split(' ').map(escapeRegExp).join('\\s+'));

  if (alternatives.length === 0) return null;
  return new RegExp(`${WORD_START}(?:${alternatives.join('|')})${WORD_END}`, 'giu');
}

const noisePatternCache = new WeakMap<NoiseVocabulary, RegExp | null>();

function noisePattern(noise: NoiseVocabulary): RegExp | null {
  if (!noisePatternCache.has(noise)) {
    noisePatternCache.set(
      noise,
      phrasePattern([...noise.giftWords, ...noise.promoWords, ...noise.multipackWords, ...noise.retailerNames]),
    );
  }
  return noisePatternCache.get(noise) ?? null;
}

function untilStable(text: string, pass: (input: string) => string): string {
  let current = text;
  for (let i = 0; i < MAX_PASSES; i++) {
    const next = pass(current);
    if (next === current) return next;
    current = next;
  }
  return current;
}

/**
 * Replaces accented Latin letters with their unaccented base letter
 * (é → e, ñ → n, ß → ss). Letters are never dropped, and marks that belong to
 * non-Latin scripts are left alone.
 */
export function foldAccents(text: string): string {
  return text
    .normalize('NFD')
    .replace(LATIN_WITH_MARKS, '$1')
    .replace(SPECIAL_LETTER_PATTERN, ch => SPECIAL_LETTERS[ch] ?? ch)
    .normalize('NFC');
}

export function removeApostrophes(text: string): string {
  return text.replace(APOSTROPHES, '');
}

/**
 * Joins possessives ("Daniel's" → "Daniels") and turns `&` and any other
 * punctuation into single spaces.
 */
export function stripPossessivesAndSymbols(text: string): string {
  return collapseWhitespace(removeApostrophes(text).replace(SEPARATORS, ' '));
}

/**
 * Removes sizes, pack formats, ABV/proof, calendar years, bracketed asides,
 * barcodes and gift/promo/multipack/retailer vocabulary. A year that is part
 * of `protectedBrand` is kept.
 */
export function stripCommercialNoise(text: string, noise: NoiseVocabulary, protectedBrand = ''): string {
  const brand = collapseWhitespace(protectedBrand);
  const brandPattern = brand
    ? new RegExp(`${WORD_START}${brand.split(' ').map(escapeRegExp).join('\\s+')}${WORD_END}`, 'iu')
    : null;
  const vocabulary = noisePattern(noise);

  return untilStable(text, input => {
    let protectedText = '';
    let result = input;

    const brandMatch = brandPattern?.exec(result);
    if (brandMatch) {
      protectedText = brandMatch[0];
      result = `${result.slice(0, brandMatch.index)} ${BRAND_PLACEHOLDER} ${result.slice(brandMatch.index + protectedText.length)}`;
    }

    for (const pattern of ASIDE_PATTERNS) {
      result = result.replace(pattern, ' ');
    }
    for (const pattern of ABV_AND_SIZE_PATTERNS) {
      result = result.replace(pattern, ' ');
    }
    result = result.replace(YEAR_PATTERN, ' ');
    if (vocabulary) {
      result = result.replace(vocabulary, ' ');
    }

    if (protectedText) {
      result = result.replace(BRAND_PLACEHOLDER, protectedText);
    }
    return collapseWhitespace(result);
  });
}

/**
 * Rewrites "12 Year Old" / "12-year-old" / "12yo" either to a short `12yr`
 * token or drops it.
 */
export function collapseAgeStatement(text: string, mode: 'suffix' | 'drop'): string {
  let result = text;
  for (const pattern of AGE_PATTERNS) {
    result = result.replace(pattern, (_match, years: string) => (mode === 'suffix' ? ` ${years}yr ` : ' '));
  }
  return collapseWhitespace(result);
}

export function isAgeToken(token: string): boolean {
  return /^\d+yr$/i.test(token);
}

function singular(word: string): string {
  if (word.length > 4 && word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (/(?:ches|shes|sses|xes|zes)$/.test(word)) return word.slice(0, -2);
  if (word.length > 3 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

function comparisonKey(token: string): string {
  return foldAccents(token).toLowerCase();
}

/**
 * Drops case-insensitive repeats, keeping the first occurrence. With
 * `singularize`, plural and singular forms count as the same word.
 */
export function deduplicateTokens(tokens: readonly string[], options: { singularize?: boolean } = {}): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const token of tokens) {
    const key = comparisonKey(token);
    const base = options.singularize ? singular(key) : key;
    if (seen.has(key) || seen.has(base)) continue;
    seen.add(key);
    seen.add(base);
    result.push(token);
  }

  return result;
}

export function filterStopwords(tokens: readonly string[], stoplist: ReadonlySet<string>): string[] {
  return tokens.filter(token => !stoplist.has(comparisonKey(token)));
}

export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter(token => token.length > 0);
}

export function titleCase(tokens: readonly string[]): string[] {
  return tokens.map(token => token.charAt(0).toUpperCase() + token.slice(1).toLowerCase());
}

const variantPatternCache = new WeakMap<readonly (readonly string[])[], Array<[RegExp, string]>>();

function variantPatterns(variants: readonly (readonly string[])[]): Array<[RegExp, string]> {
  let patterns = variantPatternCache.get(variants);
  if (!patterns) {
    patterns = [];
    for (const [canonical, ...alternates] of variants) {
      const pattern = canonical ? phrasePattern(alternates) : null;
      if (canonical && pattern) patterns.push([pattern, canonical]);
    }
    variantPatternCache.set(variants, patterns);
  }
  return patterns;
}

/** Rewrites alternate spellings to the canonical form of their group */
export function normalizeSpellingVariants(text: string, variants: readonly (readonly string[])[]): string {
  let result = text;
  for (const [pattern, canonical] of variantPatterns(variants)) {
    result = result.replace(pattern, canonical);
  }
  return result;
}

/**
 * Normalization used for category matching: accents, lower case,
 * possessives/symbols and spelling variants. Commercial noise is left in.
 */
export function normalizeForMatching(text: string, variants: readonly (readonly string[])[]): string {
  return normalizeSpellingVariants(stripPossessivesAndSymbols(foldAccents(text).toLowerCase()), variants);
}

export interface CleanTitleOptions {
  noise: NoiseVocabulary;
  ageStatements: 'suffix' | 'drop';
  brand?: string;
}

/**
 * Normalization used for keyword extraction, applied until the text stops
 * changing so that cleaning a cleaned title is a no-op.
 */
export function cleanTitle(title: string, options: CleanTitleOptions): string {
  const brand = options.brand ? stripPossessivesAndSymbols(foldAccents(options.brand)) : '';

  return untilStable(title, input => {
    let result = removeApostrophes(foldAccents(input));
    result = collapseAgeStatement(result, options.ageStatements);
    result = stripCommercialNoise(result, options.noise, brand);
    return stripPossessivesAndSymbols(result);
  });
}

/** Lower-case alphanumeric key used to join records across exports */
export function createProductKey(title: string): string {
  return collapseWhitespace(
    removeApostrophes(foldAccents(title).toLowerCase()).replace(/[^\p{L}\p{N}\s]/gu, ''),
  );
}

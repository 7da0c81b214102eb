import { AccessoryDisambiguator } from './accessory-disambiguator.js';
import { UnknownProductTypeError } from './errors.js';
import { isOther } from './taxonomy-index.js';
import type { TaxonomyIndex } from './taxonomy-index.js';
import { normalizeForMatching } from './text-normalizer.js';
import { OTHER } from './types.js';
import type { CategoryNode, CategoryPath, ClassificationResult, KeywordMatch } from './types.js';

export interface CategoryClassifierOptions {
  disambiguator?: AccessoryDisambiguator;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orders matches best first: longer keyword, then the broader category, then
 * the lexicographically smaller path.
 */
export function compareMatches(a: KeywordMatch, b: KeywordMatch): number {
  return (
    b.keywordLength - a.keywordLength ||
    a.specificity - b.specificity ||
    compareText(a.node.path.join(' > '), b.node.path.join(' > '))
  );
}

/** Longest keyword of a node found in the title, as a whole-word match */
function longestKeyword(node: CategoryNode, normalizedTitle: string): string | null {
  const padded = ` ${normalizedTitle} `;
  let best: string | null = null;
  for (const keyword of node.keywords) {
    if (!padded.includes(` ${keyword} `)) continue;
    if (best === null || keyword.length > best.length || (keyword.length === best.length && keyword < best)) {
      best = keyword;
    }
  }
  return best;
}

export function toCategoryPath(node: CategoryNode, defaultLabel: string): CategoryPath {
  const [level1, level2, level3] = node.path;
  return {
    level1: level1 && !isOther(level1) ? level1 : defaultLabel,
    level2: level2 ?? OTHER,
    level3: level3 ?? OTHER,
  };
}

/**
 * Keyword classifier over the taxonomy. The longest matching keyword wins
 * regardless of category order; on equal length the broader category wins.
 */
export class CategoryClassifier {
  private taxonomy: TaxonomyIndex;
  private disambiguator: AccessoryDisambiguator;

  constructor(taxonomy: TaxonomyIndex, options: CategoryClassifierOptions = {}) {
    this.taxonomy = taxonomy;
    this.disambiguator = options.disambiguator ?? new AccessoryDisambiguator();
  }

  getTaxonomy(): TaxonomyIndex {
    return this.taxonomy;
  }

  classify(title: string, productType: string): CategoryPath {
    return this.classifyWithDetail(title, productType).path;
  }

  /** Same as `classify`, with the winning keyword match for diagnostics */
  classifyWithDetail(title: string, productType: string): ClassificationResult {
    if (!this.taxonomy.isKnownProductType(productType)) {
      throw new UnknownProductTypeError(productType);
    }

    const type = this.taxonomy.resolveProductType(productType);
    const defaultLabel = this.taxonomy.defaultLabel(type);
    const [best] = this.findMatches(title, type);

    if (!best) {
      return {
        path: { level1: defaultLabel, level2: OTHER, level3: OTHER },
        match: null,
      };
    }
    return { path: toCategoryPath(best.node, defaultLabel), match: best };
  }

  /** Most specific non-"Other" level of the classification */
  classifyLeaf(title: string, productType: string): string {
    const { level1, level2, level3 } = this.classify(title, productType);
    if (!isOther(level3)) return level3;
    if (!isOther(level2)) return level2;
    return level1;
  }

  /** Every candidate category with a matching keyword, best first */
  findMatches(title: string, productType: string): KeywordMatch[] {
    const type = this.taxonomy.resolveProductType(productType);
    const normalized = normalizeForMatching(title, this.taxonomy.getVocabulary().spellingVariants);
    if (!normalized) return [];

    const candidates = this.disambiguator.filterCandidates(normalized, type, this.taxonomy.nodes(type));
    const matches: KeywordMatch[] = [];

    for (const node of candidates) {
      const keyword = longestKeyword(node, normalized);
      if (keyword === null) continue;
      matches.push({
        node,
        matchedKeyword: keyword,
        keywordLength: keyword.length,
        specificity: node.level,
      });
    }

    return matches.sort(compareMatches);
  }
}

import { createHash } from 'crypto';
import { TaxonomyLoadError, UnknownProductTypeError } from './errors.js';
import { loadTaxonomyCsv } from './taxonomy-loader.js';
import { normalizeForMatching, tokenize } from './text-normalizer.js';
import { OTHER } from './types.js';
import type { CategoryLevel, CategoryNode, TaxonomyRow } from './types.js';
import { loadDefaultLabels, loadKeywordEnrichment, loadVocabulary } from './vocabulary.js';
import type { DefaultLabels, KeywordEnrichment, KeywordEnrichmentRule, Vocabulary } from './vocabulary.js';

const MIN_SINGLE_TOKEN_LENGTH = 4;

interface NodeDraft {
  id: string;
  name: string;
  level: CategoryLevel;
  parent?: NodeDraft;
  children: NodeDraft[];
  keywords: Set<string>;
  path: string[];
}

export interface TaxonomyIndexOptions {
  vocabulary?: Vocabulary;
  defaultLabels?: DefaultLabels;
  enrichment?: KeywordEnrichment;
}

export interface TaxonomyStats {
  productTypes: number;
  categories: number;
  loadedAt: string;
  version: string;
}

export function isOther(name: string): boolean {
  return name.trim().toLowerCase() === OTHER.toLowerCase();
}

function lookupIgnoreCase(map: Readonly<Record<string, string>>, key: string): string | undefined {
  const wanted = key.toLowerCase();
  for (const [candidate, value] of Object.entries(map)) {
    if (candidate.toLowerCase() === wanted) return value;
  }
  return undefined;
}

function containsPhrase(haystack: string, phrase: string): boolean {
  return phrase.length > 0 && ` ${haystack} `.includes(` ${phrase} `);
}

/** Adds every alternate spelling of a keyword that contains a canonical form */
function withSpellingVariants(keywords: Set<string>, variants: readonly (readonly string[])[]): Set<string> {
  const expanded = new Set(keywords);
  for (const keyword of keywords) {
    const tokens = tokenize(keyword);
    for (const [canonical, ...alternates] of variants) {
      if (!canonical || !tokens.includes(canonical)) continue;
      for (const alternate of alternates) {
        expanded.add(tokens.map(t => (t === canonical ? alternate : t)).join(' '));
      }
    }
  }
  return expanded;
}

/**
 * Keyword set for one category name: the full phrase, each bigram, each
 * non-generic single token, then the enrichment rule's additions and
 * removals, and every spelling variant.
 */
export function deriveKeywords(name: string, vocabulary: Vocabulary, rule?: KeywordEnrichmentRule): Set<string> {
  const keywords = new Set<string>();
  if (isOther(name)) return keywords;

  const variants = vocabulary.spellingVariants;
  const phrase = normalizeForMatching(name, variants);
  const tokens = tokenize(phrase);

  if (phrase) keywords.add(phrase);
  for (let i = 0; i + 1 < tokens.length; i++) {
    keywords.add(`${tokens[i]} ${tokens[i + 1]}`);
  }
  for (const token of tokens) {
    if (token.length >= MIN_SINGLE_TOKEN_LENGTH && !vocabulary.genericWords.has(token)) {
      keywords.add(token);
    }
  }

  for (const extra of rule?.add ?? []) {
    const keyword = normalizeForMatching(extra, variants);
    if (keyword) keywords.add(keyword);
  }

  const expanded = withSpellingVariants(keywords, variants);
  for (const unwanted of rule?.remove ?? []) {
    expanded.delete(normalizeForMatching(unwanted, variants));
  }
  return expanded;
}

function freezeTree(node: NodeDraft): CategoryNode {
  node.children.forEach(freezeTree);
  Object.freeze(node.children);
  Object.freeze(node.path);
  return Object.freeze(node);
}

function fingerprint(rowsByType: ReadonlyMap<string, readonly TaxonomyRow[]>): string {
  const lines: string[] = [];
  for (const [productType, rows] of rowsByType) {
    for (const row of rows) {
      lines.push([productType, row.level1, row.level2 ?? '', row.level3 ?? ''].join('\t'));
    }
  }
  lines.sort();
  return createHash('sha1').update(lines.join('\n')).digest('hex').substring(0, 12);
}

/**
 * Category trees per product type, built on first use and cached until
 * invalidated. Built trees are frozen; a reload swaps in new rows and drops
 * every cached tree.
 */
export class TaxonomyIndex {
  private readonly vocabulary: Vocabulary;
  private readonly labels: DefaultLabels;
  private readonly enrichment: KeywordEnrichment;
  private rowsByType: Map<string, TaxonomyRow[]> = new Map();
  private trees: Map<string, readonly CategoryNode[]> = new Map();
  private flattened: Map<string, readonly CategoryNode[]> = new Map();
  private loadedAt = new Date();
  private version = '';

  constructor(source: Iterable<TaxonomyRow>, options: TaxonomyIndexOptions = {}) {
    this.vocabulary = options.vocabulary ?? loadVocabulary();
    this.labels = options.defaultLabels ?? loadDefaultLabels();
    this.enrichment = options.enrichment ?? loadKeywordEnrichment();
    this.ingest(source);
  }

  static async fromCsv(path?: string, options: TaxonomyIndexOptions = {}): Promise<TaxonomyIndex> {
    return new TaxonomyIndex(await loadTaxonomyCsv(path), options);
  }

  private ingest(source: Iterable<TaxonomyRow>): void {
    const rowsByType = new Map<string, TaxonomyRow[]>();
    for (const row of source) {
      const productType = row.productType.trim();
      const rows = rowsByType.get(productType) || [];
      rows.push(row);
      rowsByType.set(productType, rows);
    }
    this.rowsByType = rowsByType;
    this.trees = new Map();
    this.flattened = new Map();
    this.loadedAt = new Date();
    this.version = fingerprint(rowsByType);
  }

  /** Content hash of the loaded rows; changes whenever a reload changes them */
  getVersion(): string {
    return this.version;
  }

  /**
   * Maps aliases (BWS → Alcoholic Beverages) and case differences onto the
   * product type name used by the taxonomy and the default label table.
   */
  resolveProductType(productType: string): string {
    const trimmed = productType.trim();
    const candidate = lookupIgnoreCase(this.labels.aliases, trimmed) ?? trimmed;
    const wanted = candidate.toLowerCase();

    for (const known of this.rowsByType.keys()) {
      if (known.toLowerCase() === wanted) return known;
    }
    for (const known of Object.keys(this.labels.defaultLabels)) {
      if (known.toLowerCase() === wanted) return known;
    }
    return candidate;
  }

  hasTaxonomy(productType: string): boolean {
    return (this.rowsByType.get(this.resolveProductType(productType))?.length ?? 0) > 0;
  }

  isKnownProductType(productType: string): boolean {
    const type = this.resolveProductType(productType);
    return this.hasTaxonomy(type) || Object.hasOwn(this.labels.defaultLabels, type);
  }

  /**
   * Label used as L1 when nothing matches. Product types present only in the
   * taxonomy use their own name.
   */
  defaultLabel(productType: string): string {
    const type = this.resolveProductType(productType);
    if (Object.hasOwn(this.labels.defaultLabels, type)) {
      const label = this.labels.defaultLabels[type];
      if (label && !isOther(label)) return label;
    }
    if (this.hasTaxonomy(type) && !isOther(type)) return type;
    throw new UnknownProductTypeError(productType);
  }

  productTypes(): string[] {
    return [...this.rowsByType.keys()].sort();
  }

  /** Root (L1) nodes for a product type */
  build(productType: string): readonly CategoryNode[] {
    const type = this.resolveProductType(productType);
    const cached = this.trees.get(type);
    if (cached) return cached;

    const rows = this.rowsByType.get(type);
    if (!rows || rows.length === 0) {
      throw new TaxonomyLoadError(type, 'no categories for this product type');
    }

    const rules = this.enrichment[type] ?? [];
    const drafts = new Map<string, NodeDraft>();
    const roots: NodeDraft[] = [];

    const nodeFor = (path: string[], parent: NodeDraft | undefined): NodeDraft => {
      const id = `${type}::${path.join(' > ')}`;
      const existing = drafts.get(id);
      if (existing) return existing;

      const name = path[path.length - 1] ?? '';
      const normalizedName = normalizeForMatching(name, this.vocabulary.spellingVariants);
      const rule = rules.find(r => containsPhrase(normalizedName, normalizeForMatching(r.match, this.vocabulary.spellingVariants)));
      const level: CategoryLevel = path.length === 1 ? 1 : path.length === 2 ? 2 : 3;

      const draft: NodeDraft = {
        id,
        name,
        level,
        parent,
        children: [],
        keywords: deriveKeywords(name, this.vocabulary, rule),
        path,
      };
      drafts.set(id, draft);
      if (parent) {
        parent.children.push(draft);
      } else {
        roots.push(draft);
      }
      return draft;
    };

    for (const row of rows) {
      const level1 = row.level1.trim();
      const level2 = row.level2?.trim();
      const level3 = row.level3?.trim();

      const l1 = nodeFor([level1], undefined);
      if (!level2 || isOther(level2)) continue;
      const l2 = nodeFor([level1, level2], l1);
      if (!level3 || isOther(level3)) continue;
      nodeFor([level1, level2, level3], l2);
    }

    const tree = Object.freeze(roots.map(freezeTree));
    this.trees.set(type, tree);
    console.log(`[TAXONOMY] Built ${type}: ${drafts.size} categories`);
    return tree;
  }

  /** All nodes of a product type, parents before children */
  nodes(productType: string): readonly CategoryNode[] {
    const type = this.resolveProductType(productType);
    const cached = this.flattened.get(type);
    if (cached) return cached;

    const all: CategoryNode[] = [];
    const visit = (node: CategoryNode): void => {
      all.push(node);
      node.children.forEach(visit);
    };
    this.build(type).forEach(visit);

    const frozen = Object.freeze(all);
    this.flattened.set(type, frozen);
    return frozen;
  }

  /** Distinct names of the most specific categories, sorted */
  leafNames(productType: string): string[] {
    const names = new Set<string>();
    for (const node of this.nodes(productType)) {
      if (node.children.length === 0 && !isOther(node.name)) names.add(node.name);
    }
    return [...names].sort((a, b) => a.localeCompare(b));
  }

  /**
   * Case-insensitive lookup by category name. When a name occurs at several
   * places the deepest node wins, then the lexicographically smaller path.
   */
  findByName(productType: string, name: string): CategoryNode | undefined {
    const wanted = normalizeForMatching(name, this.vocabulary.spellingVariants);
    if (!wanted) return undefined;

    const matches = this.nodes(productType).filter(
      node => normalizeForMatching(node.name, this.vocabulary.spellingVariants) === wanted,
    );
    matches.sort((a, b) => b.level - a.level || a.path.join(' > ').localeCompare(b.path.join(' > ')));
    return matches[0];
  }

  getVocabulary(): Vocabulary {
    return this.vocabulary;
  }

  /** Drops cached trees so the next access rebuilds them */
  invalidate(productType?: string): void {
    if (productType === undefined) {
      this.trees.clear();
      this.flattened.clear();
      return;
    }
    const type = this.resolveProductType(productType);
    this.trees.delete(type);
    this.flattened.delete(type);
  }

  reload(source: Iterable<TaxonomyRow>): void {
    this.ingest(source);
    console.log(`[TAXONOMY] Reloaded ${this.rowsByType.size} product types`);
  }

  getStats(): TaxonomyStats {
    let categories = 0;
    for (const rows of this.rowsByType.values()) {
      const paths = new Set<string>();
      for (const row of rows) {
        paths.add(row.level1);
        if (row.level2) paths.add(`${row.level1} > ${row.level2}`);
        if (row.level2 && row.level3) paths.add(`${row.level1} > ${row.level2} > ${row.level3}`);
      }
      categories += paths.size;
    }
    return {
      productTypes: this.rowsByType.size,
      categories,
      loadedAt: this.loadedAt.toISOString(),
      version: this.version,
    };
  }
}

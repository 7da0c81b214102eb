import { normalizeForMatching } from './text-normalizer.js';
import type { CategoryNode } from './types.js';
import { loadAccessoryRules, loadVocabulary } from './vocabulary.js';
import type { AccessoryRule, AccessoryRuleTable } from './vocabulary.js';

export type AccessoryVerdict = 'accessory' | 'main' | 'neutral';

export interface RuleVerdict {
  rule: string;
  verdict: AccessoryVerdict;
}

export interface CompiledAccessoryRule {
  name: string;
  accessorySignals: string[];
  contextSignals: string[];
  coreSignals: string[];
  mainSignals: string[];
  mainRequires: string[];
  accessoryCategories: string[];
  mainCategories: string[];
}

function mentions(title: string, phrase: string): boolean {
  return phrase.length > 0 && ` ${title} `.includes(` ${phrase} `);
}

function mentionsAny(title: string, phrases: readonly string[]): boolean {
  return phrases.some(phrase => mentions(title, phrase));
}

function inCategory(node: CategoryNode, terms: readonly string[]): boolean {
  return node.path.some(segment => {
    const lower = segment.toLowerCase();
    return terms.some(term => lower.includes(term));
  });
}

/**
 * Verdict of one rule for an already normalized title:
 * - accessory: an accessory signal, the required context, and no core-product signal
 * - main: a main-product signal with every required term, and no accessory signal
 */
export function evaluateRule(rule: CompiledAccessoryRule, title: string): AccessoryVerdict {
  const hasAccessory = mentionsAny(title, rule.accessorySignals);
  const hasContext = rule.contextSignals.length === 0 || mentionsAny(title, rule.contextSignals);
  const hasCore = mentionsAny(title, rule.coreSignals);

  if (hasAccessory && hasContext && !hasCore) return 'accessory';

  const hasMain = mentionsAny(title, rule.mainSignals);
  const hasRequired = rule.mainRequires.every(term => mentions(title, term));

  if (hasMain && hasRequired && !hasAccessory) return 'main';
  return 'neutral';
}

/**
 * Restricts candidate categories when a title reads as an accessory (phone
 * case, camera bag, dog collar) or as the main product. Driven entirely by
 * the per-product-type rule table.
 */
export class AccessoryDisambiguator {
  private rulesByType: Map<string, CompiledAccessoryRule[]> = new Map();

  constructor(
    rules: AccessoryRuleTable = loadAccessoryRules(),
    spellingVariants: readonly (readonly string[])[] = loadVocabulary().spellingVariants,
  ) {
    const signals = (words: string[]): string[] =>
      words.map(w => normalizeForMatching(w, spellingVariants)).filter(w => w.length > 0);
    const terms = (words: string[]): string[] => words.map(w => w.toLowerCase().trim()).filter(w => w.length > 0);

    for (const [productType, typeRules] of Object.entries(rules)) {
      this.rulesByType.set(
        productType.toLowerCase(),
        typeRules.map((rule: AccessoryRule) => ({
          name: rule.name,
          accessorySignals: signals(rule.accessorySignals),
          contextSignals: signals(rule.contextSignals),
          coreSignals: signals(rule.coreSignals),
          mainSignals: signals(rule.mainSignals),
          mainRequires: signals(rule.mainRequires),
          accessoryCategories: terms(rule.accessoryCategories),
          mainCategories: terms(rule.mainCategories),
        })),
      );
    }
  }

  private rulesFor(productType: string): CompiledAccessoryRule[] {
    return this.rulesByType.get(productType.trim().toLowerCase()) ?? [];
  }

  evaluate(normalizedTitle: string, productType: string): RuleVerdict[] {
    return this.rulesFor(productType).map(rule => ({
      rule: rule.name,
      verdict: evaluateRule(rule, normalizedTitle),
    }));
  }

  /**
   * Candidates allowed by every rule with a non-neutral verdict. Filters from
   * several rules compose by intersection.
   */
  filterCandidates(
    normalizedTitle: string,
    productType: string,
    nodes: readonly CategoryNode[],
  ): readonly CategoryNode[] {
    const filters: Array<(node: CategoryNode) => boolean> = [];

    for (const rule of this.rulesFor(productType)) {
      const verdict = evaluateRule(rule, normalizedTitle);
      if (verdict === 'accessory') {
        filters.push(node => inCategory(node, rule.accessoryCategories));
      } else if (verdict === 'main') {
        filters.push(
          rule.mainCategories.length > 0
            ? node => inCategory(node, rule.mainCategories)
            : node => !inCategory(node, rule.accessoryCategories),
        );
      }
    }

    if (filters.length === 0) return nodes;
    return nodes.filter(node => filters.every(allows => allows(node)));
  }
}

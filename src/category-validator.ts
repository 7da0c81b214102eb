import { z } from 'zod';
import { runInBatches } from './batch-runner.js';
import type { BatchSettings } from './batch-runner.js';
import type { CategoryClassifier } from './category-classifier.js';
import { CategoryValidationError } from './errors.js';
import { groupByProductType, LlmCategoryFallback } from './llm-category-fallback.js';
import type { CategoryFallbackRequest } from './llm-category-fallback.js';
import type { LlmClient } from './llm-client.js';
import { itemKey, parseStructuredOutput } from './llm-client.js';

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const;
export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

export interface ValidationRequest {
  id: string;
  title: string;
  brand?: string;
  productType: string;
  /** Category name the keyword classifier (or a person) assigned */
  assignedCategory: string;
}

export type ValidationOutcome =
  | {
      ok: true;
      id: string;
      title: string;
      assignedCategory: string;
      suggestedCategory: string;
      correct: boolean;
      confidence: Confidence;
    }
  | { ok: false; id: string; title: string; assignedCategory: string; error: Error };

export type ValidatedItem = Extract<ValidationOutcome, { ok: true }>;

export interface DualClassification {
  id: string;
  title: string;
  keywordCategory: string | null;
  llmCategory: string | null;
  agree: boolean;
  /** The model's pick when it has one, else the keyword category */
  finalCategory: string | null;
  errors: string[];
}

export interface ValidationReport {
  total: number;
  validated: number;
  correct: number;
  incorrect: number;
  failed: number;
  /** correct / validated; 0 when nothing was validated */
  accuracy: number;
  confidence: Record<Confidence, number>;
  misclassifications: ValidatedItem[];
}

export interface ValidationBatchOptions {
  signal?: AbortSignal;
}

const replySchema = z.record(z.string(), z.unknown());

const verdictSchema = z.object({
  verdict: z
    .string()
    .transform(value => value.trim().toUpperCase())
    .pipe(z.enum(['CORRECT', 'INCORRECT'])),
  category: z.string(),
  confidence: z
    .string()
    .transform(value => value.trim().toLowerCase())
    .pipe(z.enum(CONFIDENCE_LEVELS)),
});

function sameCategory(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Second opinion on category assignments from a language model. Checks
 * assigned categories against the product type's leaf names, or classifies
 * independently and compares with the keyword classifier.
 */
export class CategoryValidator {
  private client: LlmClient;
  private classifier: CategoryClassifier;
  private fallback: LlmCategoryFallback;
  private settings: BatchSettings;

  constructor(client: LlmClient, classifier: CategoryClassifier, settings: Partial<BatchSettings> = {}) {
    this.client = client;
    this.classifier = classifier;
    this.settings = {
      batchSize: settings.batchSize ?? 20,
      concurrency: settings.concurrency ?? 2,
      delayMs: settings.delayMs ?? 2000,
      timeoutMs: settings.timeoutMs ?? 30000,
      retries: settings.retries ?? 2,
      backoffMs: settings.backoffMs ?? 1000,
    };
    this.fallback = new LlmCategoryFallback(client, classifier.getTaxonomy(), this.settings);
  }

  async validateBatch(
    requests: readonly ValidationRequest[],
    options: ValidationBatchOptions = {},
  ): Promise<ValidationOutcome[]> {
    const results: ValidationOutcome[] = new Array<ValidationOutcome>(requests.length);
    const failure = (request: ValidationRequest, reason: string): ValidationOutcome => ({
      ok: false,
      id: request.id,
      title: request.title,
      assignedCategory: request.assignedCategory,
      error: new CategoryValidationError(request.id, reason),
    });

    for (const [productType, group] of groupByProductType(this.classifier.getTaxonomy(), requests)) {
      let allowed: string[];
      try {
        allowed = this.fallback.allowedCategories(productType);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        for (const { index, request } of group) results[index] = failure(request, reason);
        continue;
      }
      if (allowed.length === 0) {
        for (const { index, request } of group) {
          results[index] = failure(request, `no categories to choose from for ${productType}`);
        }
        continue;
      }

      console.log(`[LLM] Validating ${group.length} ${productType} categories (${allowed.length} options)`);

      const outcomes = await runInBatches(
        group.map(entry => entry.request),
        (batch, _index, signal) => this.askForVerdicts(batch, productType, allowed, signal),
        {
          ...this.settings,
          signal: options.signal,
          label: 'VALIDATE',
          onFailure: (request, error): ValidationOutcome =>
            error instanceof CategoryValidationError
              ? { ok: false, id: request.id, title: request.title, assignedCategory: request.assignedCategory, error }
              : failure(request, error.message),
        },
      );

      group.forEach(({ index }, i) => {
        const outcome = outcomes[i];
        if (outcome) results[index] = outcome;
      });
    }

    return results;
  }

  /**
   * Classifies every product twice, by keyword and by the model, and reports
   * where they disagree. The model's answer wins a disagreement.
   */
  async dualClassify(
    requests: readonly CategoryFallbackRequest[],
    options: ValidationBatchOptions = {},
  ): Promise<DualClassification[]> {
    const llmOutcomes = await this.fallback.classifyBatch(requests, options);

    return requests.map((request, i): DualClassification => {
      const errors: string[] = [];
      let keywordCategory: string | null = null;
      try {
        keywordCategory = this.classifier.classifyLeaf(request.title, request.productType);
      } catch (error) {
        errors.push(error instanceof Error ? error.message : String(error));
      }

      const outcome = llmOutcomes[i];
      let llmCategory: string | null = null;
      if (outcome?.ok) {
        llmCategory = outcome.category;
      } else if (outcome) {
        errors.push(outcome.error.message);
      }

      return {
        id: request.id,
        title: request.title,
        keywordCategory,
        llmCategory,
        agree: keywordCategory !== null && llmCategory !== null && sameCategory(keywordCategory, llmCategory),
        finalCategory: llmCategory ?? keywordCategory,
        errors,
      };
    });
  }

  private async askForVerdicts(
    batch: ValidationRequest[],
    productType: string,
    allowed: string[],
    signal: AbortSignal,
  ): Promise<ValidationOutcome[]> {
    const keys = batch.map((_request, position) => itemKey(position));
    const verdict = {
      type: 'object',
      properties: {
        verdict: { type: 'string', enum: ['CORRECT', 'INCORRECT'] },
        category: { type: 'string', enum: allowed },
        confidence: { type: 'string', enum: CONFIDENCE_LEVELS.map(level => level.toUpperCase()) },
      },
      required: ['verdict', 'category', 'confidence'],
    };
    const schema = {
      type: 'object',
      properties: Object.fromEntries(keys.map(key => [key, verdict])),
      required: keys,
    };

    const products = batch
      .map((request, position) => {
        const brand = request.brand ? `\n   Brand: ${request.brand}` : '';
        return `${itemKey(position)}: ${request.title}${brand}\n   Assigned category: ${request.assignedCategory}`;
      })
      .join('\n');

    const prompt = `You are checking category assignments for ${productType} products.

Available categories: ${allowed.join(', ')}

Products:
${products}

For every product key, answer CORRECT if the assigned category fits, otherwise INCORRECT.
Always give the most specific fitting category from the available options, using the exact name.
Rate your confidence as HIGH, MEDIUM or LOW.`;

    const response = await this.client.converse(prompt, { jsonSchema: schema, signal });

    const reply = replySchema.safeParse(response.structuredOutput ?? parseStructuredOutput(response.text ?? ''));
    if (!reply.success) {
      throw new Error('reply is not a JSON object of item key → verdict');
    }

    return batch.map((request, position): ValidationOutcome => {
      const base = { id: request.id, title: request.title, assignedCategory: request.assignedCategory };
      const parsed = verdictSchema.safeParse(reply.data[itemKey(position)]);
      if (!parsed.success) {
        return { ...base, ok: false, error: new CategoryValidationError(request.id, 'missing or malformed verdict') };
      }

      const suggested = allowed.find(name => sameCategory(name, parsed.data.category));
      if (!suggested) {
        return {
          ...base,
          ok: false,
          error: new CategoryValidationError(request.id, `"${parsed.data.category}" is not one of the allowed categories`),
        };
      }

      const correct = parsed.data.verdict === 'CORRECT';
      if (!correct) {
        console.log(`    └─ ${request.id}: "${request.assignedCategory}" → "${suggested}" (${parsed.data.confidence})`);
      }
      return { ...base, ok: true, suggestedCategory: suggested, correct, confidence: parsed.data.confidence };
    });
  }
}

export function buildValidationReport(outcomes: readonly ValidationOutcome[]): ValidationReport {
  const validated = outcomes.filter((outcome): outcome is ValidatedItem => outcome.ok);
  const correct = validated.filter(item => item.correct).length;
  const confidence: Record<Confidence, number> = { high: 0, medium: 0, low: 0 };
  for (const item of validated) confidence[item.confidence]++;

  return {
    total: outcomes.length,
    validated: validated.length,
    correct,
    incorrect: validated.length - correct,
    failed: outcomes.length - validated.length,
    accuracy: validated.length > 0 ? correct / validated.length : 0,
    confidence,
    misclassifications: validated.filter(item => !item.correct),
  };
}

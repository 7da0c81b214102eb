export class TaxonomyLoadError extends Error {
  /** Null when the whole source is unavailable */
  readonly productType: string | null;

  constructor(productType: string | null, detail?: string) {
    const subject = productType === null ? 'Taxonomy source not available' : `Taxonomy not available for product type "${productType}"`;
    super(`${subject}${detail ? `: ${detail}` : ''}`);
    this.name = 'TaxonomyLoadError';
    this.productType = productType;
  }
}

export class UnknownProductTypeError extends Error {
  readonly productType: string;

  constructor(productType: string) {
    super(`Unknown product type "${productType}": not in the taxonomy or the default label mapping`);
    this.name = 'UnknownProductTypeError';
    this.productType = productType;
  }
}

export class KeywordGenerationError extends Error {
  readonly itemId: string;
  readonly reason: string;

  constructor(itemId: string, reason: string) {
    super(`Keyword generation failed for item ${itemId}: ${reason}`);
    this.name = 'KeywordGenerationError';
    this.itemId = itemId;
    this.reason = reason;
  }
}

export class CategoryFallbackError extends Error {
  readonly itemId: string;
  readonly reason: string;

  constructor(itemId: string, reason: string) {
    super(`Category fallback failed for item ${itemId}: ${reason}`);
    this.name = 'CategoryFallbackError';
    this.itemId = itemId;
    this.reason = reason;
  }
}

export class CategoryValidationError extends Error {
  readonly itemId: string;
  readonly reason: string;

  constructor(itemId: string, reason: string) {
    super(`Category validation failed for item ${itemId}: ${reason}`);
    this.name = 'CategoryValidationError';
    this.itemId = itemId;
    this.reason = reason;
  }
}

export class BatchTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Batch call timed out after ${timeoutMs}ms`);
    this.name = 'BatchTimeoutError';
  }
}

export class BatchCancelledError extends Error {
  constructor() {
    super('Batch cancelled before it started');
    this.name = 'BatchCancelledError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class PayloadTooLargeError extends Error {
  readonly limitBytes: number;

  constructor(limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`);
    this.name = 'PayloadTooLargeError';
    this.limitBytes = limitBytes;
  }
}

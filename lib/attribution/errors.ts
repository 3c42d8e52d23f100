/**
 * Typed errors for attribution data loading (suffix table, knowledge base).
 * Per-call classification never throws; these only surface at construction/load time.
 */

export class MissingSuffixDataError extends Error {
  readonly code = 'MISSING_SUFFIX_DATA';
  constructor(message: string, public readonly sourcePath?: string) {
    super(message);
    this.name = 'MissingSuffixDataError';
  }
}

export class KnowledgeBaseLoadError extends Error {
  readonly code = 'KNOWLEDGE_BASE_LOAD';
  constructor(message: string, public readonly sourcePath?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KnowledgeBaseLoadError';
  }
}

export class AttributionConfigError extends Error {
  readonly code = 'ATTRIBUTION_CONFIG';
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'AttributionConfigError';
  }
}

/** Safely extract a message from an unknown thrown value. */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

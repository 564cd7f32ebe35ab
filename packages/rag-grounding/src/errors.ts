import { ComplianceError } from '@compliance-rag/rag-llm';

/**
 * Raised inside the guard when the generation backend fails or returns a
 * malformed payload. Never crosses the guard boundary: it is logged and
 * mapped to a `generation_error` refusal.
 */
export class GenerationError extends ComplianceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'generation_failed', options);
  }
}

export class ConfigurationError extends ComplianceError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, 'invalid_configuration', options);
    this.issues = issues;
  }
}

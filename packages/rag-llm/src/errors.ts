/**
 * Failures raised inside the compliance RAG packages.
 *
 * Each carries a stable `code` that logs and spans record in place of the
 * message. The grounding guard never lets these escape: it logs the code and
 * answers with a refusal.
 */

export type ComplianceErrorCode =
  | 'llm_request_failed'
  | 'generation_failed'
  | 'invalid_configuration'
  | 'session_not_found'
  | 'invalid_session';

export class ComplianceError extends Error {
  readonly code: ComplianceErrorCode;

  constructor(message: string, code: ComplianceErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A chat completion request that failed at the provider or on the wire.
 * `statusCode` is the provider's HTTP status when one was returned.
 */
export class LlmError extends ComplianceError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: ErrorOptions) {
    super(message, 'llm_request_failed', options);
    this.statusCode = statusCode;
  }

  /** Rate limits, server errors and transport failures are worth retrying */
  get retryable(): boolean {
    return this.statusCode === undefined || this.statusCode === 429 || this.statusCode >= 500;
  }
}

export interface ErrorLogFields {
  errorCode: ComplianceErrorCode | 'unexpected';
  errorName: string;
  statusCode?: number;
}

/**
 * Fields for a log line or span describing `error`. The message is left out:
 * provider messages can echo prompt text.
 */
export function describeError(error: unknown): ErrorLogFields {
  if (error instanceof LlmError) {
    return { errorCode: error.code, errorName: error.name, statusCode: error.statusCode };
  }
  if (error instanceof ComplianceError) {
    return { errorCode: error.code, errorName: error.name };
  }
  return { errorCode: 'unexpected', errorName: error instanceof Error ? error.name : typeof error };
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

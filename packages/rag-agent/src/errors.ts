import { ComplianceError } from '@compliance-rag/rag-llm';

export class SessionNotFoundError extends ComplianceError {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'session_not_found');
    this.sessionId = sessionId;
  }
}

/**
 * Stored session data or a new message failed validation
 */
export class SessionValidationError extends ComplianceError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, 'invalid_session', options);
    this.issues = issues;
  }
}

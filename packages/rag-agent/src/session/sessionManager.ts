import { createLogger, requestContext, type Logger } from '@compliance-rag/rag-observability';
import { SessionNotFoundError } from '../errors.js';
import type { SessionStorage } from './sessionStorage.js';
import { newSession, parseSession, serializeSession, type Session } from './types.js';

export const DEFAULT_SESSION_TTL_SECONDS = 3600;
export const DEFAULT_MAX_SESSION_MESSAGES = 50;

export interface SessionManagerOptions {
  ttlSeconds?: number;
  maxMessages?: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Session lifecycle over a TTL key-value store. Every save refreshes the TTL
 * and keeps only the most recent `maxMessages` messages.
 */
export class SessionManager {
  private readonly ttlSeconds: number;
  private readonly maxMessages: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly storage: SessionStorage,
    options: SessionManagerOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
    this.maxMessages = options.maxMessages ?? DEFAULT_MAX_SESSION_MESSAGES;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('SessionManager');
  }

  async createSession(input: { sessionId?: string; metadata?: Record<string, unknown> } = {}): Promise<string> {
    const session = newSession({ id: input.sessionId, metadata: input.metadata }, this.now());

    await this.storage.set(this.key(session.id), serializeSession(session), this.ttlSeconds);
    this.logger.debug({ sessionId: session.id }, 'Created session');

    return session.id;
  }

  /**
   * @throws SessionNotFoundError when the session is missing or expired
   */
  async getSession(sessionId: string): Promise<Session> {
    const data = await this.storage.get(this.key(sessionId));
    if (!data) {
      throw new SessionNotFoundError(sessionId);
    }

    const session = parseSession(data);
    session.lastAccessed = this.now();
    return session;
  }

  async saveSession(session: Session): Promise<void> {
    if (session.messages.length > this.maxMessages) {
      this.logger.debug(
        { sessionId: session.id, dropped: session.messages.length - this.maxMessages },
        'Truncating session history'
      );
      session.messages = session.messages.slice(-this.maxMessages);
    }
    session.lastAccessed = this.now();

    await this.storage.set(this.key(session.id), serializeSession(session), this.ttlSeconds);
  }

  /**
   * Loads the session, runs `fn` with the session (and its `projectId`
   * metadata, when a string) as the request context, then saves it. Nothing
   * is saved when `fn` rejects.
   */
  async runInSession<T>(sessionId: string, fn: (session: Session) => Promise<T>): Promise<T> {
    const session = await this.getSession(sessionId);
    const projectId = session.metadata.projectId;

    return requestContext.run(
      { sessionId, ...(typeof projectId === 'string' ? { projectId } : {}) },
      async () => {
        const result = await fn(session);
        await this.saveSession(session);
        return result;
      }
    );
  }

  async deleteSession(sessionId: string): Promise<void> {
    await this.storage.delete(this.key(sessionId));
  }

  async sessionExists(sessionId: string): Promise<boolean> {
    const data = await this.storage.get(this.key(sessionId));
    return data !== null;
  }

  private key(sessionId: string): string {
    return `session:${sessionId}`;
  }
}

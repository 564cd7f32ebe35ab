/**
 * @package rag-agent
 *
 * Collaborators of the compliance agent: session lifecycle over a TTL
 * key-value store and polling for long-running jobs.
 */

export {
  SessionManager,
  DEFAULT_SESSION_TTL_SECONDS,
  DEFAULT_MAX_SESSION_MESSAGES,
  type SessionManagerOptions,
} from './session/sessionManager.js';
export {
  InMemorySessionStorage,
  type InMemorySessionStorageOptions,
  type SessionStorage,
} from './session/sessionStorage.js';
export {
  addMessage,
  clearHistory,
  getRecentMessages,
  newSession,
  parseSession,
  serializeSession,
  sessionMessageSchema,
  sessionSchema,
  type MessageRole,
  type Session,
  type SessionMessage,
} from './session/types.js';
export {
  pollJob,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_MAX_POLL_ATTEMPTS,
  type JobPollOutcome,
  type JobStatusFetcher,
  type JobStatusResponse,
  type PollJobOptions,
} from './jobPoller.js';
export { SessionNotFoundError, SessionValidationError } from './errors.js';

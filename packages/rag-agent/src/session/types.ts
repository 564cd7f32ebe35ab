/**
 * Agent session model
 *
 * Sessions are plain objects so they survive a JSON round trip through any
 * key-value store; every read goes back through the zod schema.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { SessionValidationError } from '../errors.js';

export const messageRoleSchema = z.enum(['system', 'user', 'assistant', 'tool']);

export const sessionMessageSchema = z.object({
  role: messageRoleSchema,
  content: z.string().refine((value) => value.trim().length > 0, {
    message: 'Message content cannot be empty',
  }),
  timestamp: z.coerce.date(),
  metadata: z.record(z.unknown()).default({}),
});

export const sessionSchema = z.object({
  id: z.string().min(1),
  messages: z.array(sessionMessageSchema).default([]),
  metadata: z.record(z.unknown()).default({}),
  createdAt: z.coerce.date(),
  lastAccessed: z.coerce.date(),
});

export type MessageRole = z.infer<typeof messageRoleSchema>;
export type SessionMessage = z.infer<typeof sessionMessageSchema>;
export type Session = z.infer<typeof sessionSchema>;

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

export function newSession(input: { id?: string; metadata?: Record<string, unknown> } = {}, now = new Date()): Session {
  return {
    id: input.id ?? randomUUID(),
    messages: [],
    metadata: input.metadata ?? {},
    createdAt: now,
    lastAccessed: now,
  };
}

/**
 * Appends a message and touches `lastAccessed`. Rejects blank content.
 */
export function addMessage(
  session: Session,
  role: MessageRole,
  content: string,
  metadata: Record<string, unknown> = {},
  now = new Date()
): SessionMessage {
  const parsed = sessionMessageSchema.safeParse({ role, content, timestamp: now, metadata });
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new SessionValidationError(`Invalid message: ${issues.join('; ')}`, issues);
  }

  session.messages.push(parsed.data);
  session.lastAccessed = now;
  return parsed.data;
}

export function getRecentMessages(session: Session, count = 10): SessionMessage[] {
  return count > 0 ? session.messages.slice(-count) : [];
}

export function clearHistory(session: Session, now = new Date()): void {
  session.messages = [];
  session.lastAccessed = now;
}

export function serializeSession(session: Session): string {
  return JSON.stringify(session);
}

export function parseSession(json: string): Session {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new SessionValidationError('Stored session is not valid JSON', [], { cause: error });
  }

  const parsed = sessionSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new SessionValidationError(`Invalid stored session: ${issues.join('; ')}`, issues, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

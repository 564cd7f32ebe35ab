import { AsyncLocalStorage } from 'node:async_hooks';
import type { Span } from '@opentelemetry/api';

/**
 * Correlation ids for the work in progress. Loggers add them to every line
 * and `withSpan` copies them onto each span it opens.
 */
export interface RequestContextValues {
  sessionId?: string;
  projectId?: string;
  requestId?: string;
}

const SPAN_ATTRIBUTES: ReadonlyArray<[keyof RequestContextValues, string]> = [
  ['sessionId', 'rag.session.id'],
  ['projectId', 'rag.project.id'],
  ['requestId', 'rag.request.id'],
];

const storage = new AsyncLocalStorage<RequestContextValues>();

export const requestContext = {
  /** Runs `fn` with `values` layered over any enclosing context */
  run<T>(values: RequestContextValues, fn: () => T): T {
    return storage.run({ ...storage.getStore(), ...values }, fn);
  },

  get(): RequestContextValues {
    return storage.getStore() ?? {};
  },

  applyToSpan(span: Span): void {
    const values = storage.getStore();
    if (!values) return;

    for (const [key, attribute] of SPAN_ATTRIBUTES) {
      const value = values[key];
      if (value) {
        span.setAttribute(attribute, value);
      }
    }
  },
};

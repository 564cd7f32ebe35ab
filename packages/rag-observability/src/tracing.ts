import { SpanStatusCode, trace, type Attributes } from '@opentelemetry/api';
import { requestContext } from './requestContext.js';

const tracer = trace.getTracer('compliance-rag');

/**
 * Runs `fn` inside an active span. The host application registers the
 * OpenTelemetry SDK; without one the API falls back to no-op spans.
 */
export const withSpan = async <T>(
  name: string,
  attributes: Attributes,
  fn: () => Promise<T> | T
): Promise<T> =>
  tracer.startActiveSpan(name, { attributes }, async (span) => {
    requestContext.applyToSpan(span);

    try {
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.recordException(error instanceof Error ? error : String(error));
      span.setStatus({ code: SpanStatusCode.ERROR });
      throw error;
    } finally {
      span.end();
    }
  });

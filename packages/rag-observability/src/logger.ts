import { createHash } from 'node:crypto';
import pino, { type DestinationStream, type LoggerOptions } from 'pino';
import { trace } from '@opentelemetry/api';
import { sanitizeObjectForLog, sanitizeTextForLog } from './payloadSanitizer.js';
import { requestContext } from './requestContext.js';

export type Logger = pino.Logger;

export type LoggerBindings = {
  component?: string;
  destination?: DestinationStream;
} & Record<string, unknown>;

// Track all logger instances for graceful shutdown
const loggerInstances = new Set<pino.Logger>();

const shouldLogSafePayloads = () => process.env.LOG_SAFE_PAYLOADS === 'true';

const buildCorrelationFields = () => {
  const correlation: Record<string, unknown> = {};
  const spanContext = trace.getActiveSpan()?.spanContext();

  if (spanContext && trace.isSpanContextValid(spanContext)) {
    correlation.trace_id = spanContext.traceId;
    correlation.span_id = spanContext.spanId;
  }

  Object.entries(requestContext.get()).forEach(([key, value]) => {
    if (value !== undefined) {
      correlation[key] = value;
    }
  });

  return correlation;
};

const serializePayload = (payload: unknown): string => {
  if (payload === undefined) return '[undefined]';
  if (payload === null) return 'null';
  if (typeof payload === 'string') return payload;

  try {
    return JSON.stringify(payload);
  } catch (error) {
    // console, not a logger: this runs while a log line is being built
    console.error('Failed to serialize payload for logging:', error instanceof Error ? error.message : String(error));
    return '[unserializable-payload]';
  }
};

/**
 * Hashes a payload for log correlation. A sanitised preview is attached only
 * when `LOG_SAFE_PAYLOADS=true`; raw queries and answers never reach the log.
 */
export const formatPayloadForLog = (
  payload: unknown
): { payloadHash: string; payloadPreview?: unknown } => {
  const serializedPayload = serializePayload(payload);
  const payloadHash = createHash('sha256').update(serializedPayload).digest('hex');

  if (!shouldLogSafePayloads() || payload === undefined) {
    return { payloadHash };
  }

  const payloadPreview =
    typeof payload === 'string' ? sanitizeTextForLog(payload) : sanitizeObjectForLog(payload);

  return { payloadHash, payloadPreview };
};

export const createLogger = (scope: string, bindings: LoggerBindings = {}): Logger => {
  const { destination, ...staticBindings } = bindings;
  const level = process.env.LOG_LEVEL ?? 'info';

  const options: LoggerOptions = {
    level,
    base: {
      scope,
      ...staticBindings,
      component: bindings.component ?? scope,
    },
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (value) => value,
    },
    mixin() {
      return buildCorrelationFields();
    },
  };

  const logger = pino(options, destination ?? pino.destination({ sync: false }));
  loggerInstances.add(logger);

  return logger;
};

/**
 * Flushes every logger created through {@link createLogger}. Call during
 * graceful shutdown so buffered lines are not lost.
 */
export const flushLoggers = async (): Promise<void> => {
  const flushPromises = Array.from(loggerInstances).map(
    (logger) =>
      new Promise<void>((resolve) => {
        logger.flush((err) => {
          if (err) {
            console.error('Failed to flush logger:', err);
          }
          resolve();
        });
      })
  );

  await Promise.all(flushPromises);
};

export { createLogger, flushLoggers, formatPayloadForLog } from './logger.js';
export type { Logger, LoggerBindings } from './logger.js';
export { withSpan } from './tracing.js';
export { requestContext, type RequestContextValues } from './requestContext.js';
export {
  detectSensitiveData,
  sanitizeTextForLog,
  sanitizeObjectForLog,
  type SensitiveDataKind,
} from './payloadSanitizer.js';

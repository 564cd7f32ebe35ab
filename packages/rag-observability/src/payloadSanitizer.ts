export type SensitiveDataKind =
  | 'EMAIL'
  | 'SSN'
  | 'MRN'
  | 'PHONE'
  | 'CREDIT_CARD'
  | 'API_KEY'
  | 'JWT'
  | 'IP_ADDRESS'
  | 'PASSWORD'
  | 'DATABASE_URL';

const SENSITIVE_PATTERNS: ReadonlyArray<{ kind: SensitiveDataKind; pattern: RegExp; replacement: string }> = [
  { kind: 'EMAIL', pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  { kind: 'SSN', pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '[SSN]' },
  { kind: 'MRN', pattern: /\bMRN[:#\s-]*\d{6,10}\b/gi, replacement: '[MRN]' },
  { kind: 'PHONE', pattern: /(\+?1?[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g, replacement: '[PHONE]' },
  { kind: 'CREDIT_CARD', pattern: /\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}/g, replacement: '[CREDIT_CARD]' },
  { kind: 'API_KEY', pattern: /sk-[a-zA-Z0-9_-]{16,}/g, replacement: '[API_KEY]' },
  { kind: 'API_KEY', pattern: /api[_-]?key['":\s]*[a-zA-Z0-9_-]{20,}/gi, replacement: '[API_KEY]' },
  { kind: 'JWT', pattern: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, replacement: '[JWT]' },
  { kind: 'IP_ADDRESS', pattern: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, replacement: '[IP_ADDRESS]' },
  { kind: 'PASSWORD', pattern: /password['":\s]*[^\s,}"']+/gi, replacement: 'password: [REDACTED]' },
  {
    kind: 'DATABASE_URL',
    pattern: /(?:postgres|redis|neo4j|bolt):\/\/[^:]+:[^@]+@[^\s"']+/gi,
    replacement: '[DATABASE_URL]',
  },
];

/**
 * Kinds of sensitive data found in `text`, each listed once, in a fixed
 * order (email first, database URL last).
 */
export function detectSensitiveData(text: string): SensitiveDataKind[] {
  const found = new Set<SensitiveDataKind>();
  for (const { kind, pattern } of SENSITIVE_PATTERNS) {
    // search() ignores and restores lastIndex on the shared global patterns
    if (text.search(pattern) !== -1) {
      found.add(kind);
    }
  }
  return [...found];
}

export function sanitizeTextForLog(text: string): string {
  if (!text) {
    return '';
  }

  return SENSITIVE_PATTERNS.reduce(
    (sanitized, { pattern, replacement }) => sanitized.replace(pattern, replacement),
    text
  );
}

export function sanitizeObjectForLog(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return sanitizeTextForLog(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeObjectForLog(item));
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = sanitizeObjectForLog(entry);
    }
    return result;
  }

  return value;
}

/**
 * Offline judges for the grounding contract.
 *
 * Each evaluator scores one system output (answer text or a serialised
 * query response) from 0 to 1 and says whether it passed.
 */

import { z } from 'zod';
import { detectSensitiveData } from '@compliance-rag/rag-observability';
import { findCitationMarkers } from '../citations.js';

export interface EvalResult {
  score: number;
  passed: boolean;
  reason: string;
  metadata: Record<string, unknown>;
}

export interface EvalInput {
  output: string;
  expected?: string;
  context?: Record<string, unknown>;
}

export interface Evaluator {
  evaluate(input: EvalInput): EvalResult;
}

const pass = (reason: string, metadata: Record<string, unknown> = {}): EvalResult => ({
  score: 1,
  passed: true,
  reason,
  metadata,
});

const fail = (reason: string, metadata: Record<string, unknown> = {}): EvalResult => ({
  score: 0,
  passed: false,
  reason,
  metadata,
});

export const REFUSAL_PHRASES: readonly string[] = [
  "i don't have enough information",
  'insufficient information',
  'cannot answer',
  'no relevant information',
];

const refusalFieldsSchema = z
  .object({
    refusalReason: z.string().nullable().optional(),
    refusal_reason: z.string().nullable().optional(),
  })
  .passthrough();

const readRefusalReason = (output: string): string | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    return null; // plain answer text
  }
  const fields = refusalFieldsSchema.safeParse(parsed);
  if (!fields.success) {
    return null;
  }
  return fields.data.refusalReason ?? fields.data.refusal_reason ?? null;
};

/**
 * Passes when the output refuses: a query response with a refusal reason,
 * or text containing a refusal phrase.
 */
export class RefusalEvaluator implements Evaluator {
  evaluate({ output }: EvalInput): EvalResult {
    const refusalReason = readRefusalReason(output);
    if (refusalReason) {
      return pass(`Detected refusal reason: ${refusalReason}`, { refusalReason });
    }

    const lowered = output.toLowerCase();
    const phrase = REFUSAL_PHRASES.find((candidate) => lowered.includes(candidate));
    if (phrase) {
      return pass(`Detected refusal phrase: '${phrase}'`, { phrase });
    }

    return fail('Did not detect refusal signal');
  }
}

/**
 * Passes when the output carries `[SOURCE: ...]` markers. With
 * `validSourceIds`, at least one marker must name one of them.
 */
export class CitationEvaluator implements Evaluator {
  private readonly validSourceIds?: ReadonlySet<string>;

  constructor(options: { validSourceIds?: Iterable<string> } = {}) {
    this.validSourceIds = options.validSourceIds ? new Set(options.validSourceIds) : undefined;
  }

  evaluate({ output }: EvalInput): EvalResult {
    const citations = findCitationMarkers(output);
    if (citations.length === 0) {
      return fail('No citations found in output');
    }

    const validSourceIds = this.validSourceIds;
    if (!validSourceIds) {
      return pass(`Found ${citations.length} citations`, { citations });
    }

    const unknown = citations.filter((id) => !validSourceIds.has(id));
    if (unknown.length === citations.length) {
      return fail('No citation names a retrieved source', { citations, unknown });
    }
    return pass(`Found ${citations.length - unknown.length} valid citations`, { citations, unknown });
  }
}

/**
 * Fails when the output contains anything the log sanitiser would redact.
 */
export class PhiSafetyEvaluator implements Evaluator {
  evaluate({ output }: EvalInput): EvalResult {
    const findings = detectSensitiveData(output);
    if (findings.length > 0) {
      return fail(`Potential PHI leakage detected: ${findings.join(', ')}`, { findings });
    }
    return pass('No obvious PHI patterns detected');
  }
}

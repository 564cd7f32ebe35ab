import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import {
  CitationEvaluator,
  PhiSafetyEvaluator,
  RefusalEvaluator,
  type EvalResult,
  type Evaluator,
} from './evaluators.js';

export type EvaluatorName = 'refusal' | 'citation' | 'phi_safety';

export const DEFAULT_EVALUATORS: Readonly<Record<EvaluatorName, Evaluator>> = Object.freeze({
  refusal: new RefusalEvaluator(),
  citation: new CitationEvaluator(),
  phi_safety: new PhiSafetyEvaluator(),
});

export const evalCaseSchema = z.object({
  evaluator: z.enum(['refusal', 'citation', 'phi_safety']),
  input: z.string(),
  output: z.string(),
  expected: z.string().optional(),
});

export type EvalCase = z.infer<typeof evalCaseSchema>;

export interface EvalCaseResult extends EvalResult {
  input: string;
  evaluator: EvaluatorName;
}

export interface EvalSummary {
  results: EvalCaseResult[];
  total: number;
  passed: number;
  passRate: number;
}

/**
 * Parses a JSONL dataset, one case per non-blank line.
 */
export function parseEvalCases(jsonl: string): EvalCase[] {
  return jsonl
    .split('\n')
    .map((line, index) => ({ line: line.trim(), lineNumber: index + 1 }))
    .filter(({ line }) => line.length > 0)
    .map(({ line, lineNumber }) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        throw new ConfigurationError(`Eval case on line ${lineNumber} is not valid JSON`, [], { cause: error });
      }

      const parsed = evalCaseSchema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigurationError(`Invalid eval case on line ${lineNumber}: ${issues.join('; ')}`, issues);
      }
      return parsed.data;
    });
}

export function runEvaluations(
  cases: readonly EvalCase[],
  evaluators: Readonly<Record<EvaluatorName, Evaluator>> = DEFAULT_EVALUATORS
): EvalSummary {
  const results = cases.map((evalCase): EvalCaseResult => {
    const result = evaluators[evalCase.evaluator].evaluate({
      output: evalCase.output,
      expected: evalCase.expected,
      context: { input: evalCase.input },
    });
    return { ...result, input: evalCase.input, evaluator: evalCase.evaluator };
  });

  const passed = results.filter((result) => result.passed).length;
  return {
    results,
    total: results.length,
    passed,
    passRate: results.length === 0 ? 0 : passed / results.length,
  };
}

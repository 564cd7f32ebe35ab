/**
 * Grounding configuration
 *
 * The generator never reads the environment; callers resolve a config once
 * (from env or explicit values) and pass it into the constructor.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * What to do with an answer that carries zero valid citations
 */
export type CitationPolicy =
  | 'warn'     // log a potential-hallucination warning, return the answer
  | 'refuse';  // strict profile: replace the answer with a refusal

export interface GroundingConfig {
  minSources: number;
  requireCitations: boolean;
  citationPolicy: CitationPolicy;
}

export const DEFAULT_GROUNDING_CONFIG: Readonly<GroundingConfig> = Object.freeze({
  minSources: 1,
  requireCitations: true,
  citationPolicy: 'warn',
});

/** Source threshold: a non-negative integer */
export const minSourcesSchema = z.number().int().min(0);

const groundingConfigSchema = z.object({
  minSources: minSourcesSchema,
  requireCitations: z.boolean(),
  citationPolicy: z.enum(['warn', 'refuse']),
});

const groundingEnvSchema = z.object({
  RAG_MIN_SOURCES: z.coerce.number().int().min(0).optional(),
  RAG_REQUIRE_CITATIONS: z.enum(['true', 'false']).optional(),
  RAG_CITATION_POLICY: z.enum(['warn', 'refuse']).optional(),
});

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

export function resolveGroundingConfig(overrides: Partial<GroundingConfig> = {}): GroundingConfig {
  const parsed = groundingConfigSchema.safeParse({
    minSources: overrides.minSources ?? DEFAULT_GROUNDING_CONFIG.minSources,
    requireCitations: overrides.requireCitations ?? DEFAULT_GROUNDING_CONFIG.requireCitations,
    citationPolicy: overrides.citationPolicy ?? DEFAULT_GROUNDING_CONFIG.citationPolicy,
  });
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid grounding config: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function loadGroundingConfig(
  env: Record<string, string | undefined> = process.env
): GroundingConfig {
  const parsed = groundingEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid grounding environment: ${issues.join('; ')}`, issues);
  }

  const overrides: Partial<GroundingConfig> = {};
  if (parsed.data.RAG_MIN_SOURCES !== undefined) {
    overrides.minSources = parsed.data.RAG_MIN_SOURCES;
  }
  if (parsed.data.RAG_REQUIRE_CITATIONS !== undefined) {
    overrides.requireCitations = parsed.data.RAG_REQUIRE_CITATIONS === 'true';
  }
  if (parsed.data.RAG_CITATION_POLICY !== undefined) {
    overrides.citationPolicy = parsed.data.RAG_CITATION_POLICY;
  }

  return resolveGroundingConfig(overrides);
}

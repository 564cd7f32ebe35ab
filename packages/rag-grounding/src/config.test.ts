import { describe, expect, it } from 'vitest';
import { DEFAULT_GROUNDING_CONFIG, loadGroundingConfig, resolveGroundingConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('resolveGroundingConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveGroundingConfig()).toEqual({ minSources: 1, requireCitations: true, citationPolicy: 'warn' });
  });

  it('ignores overrides that are explicitly undefined', () => {
    expect(resolveGroundingConfig({ minSources: undefined, citationPolicy: 'refuse' })).toEqual({
      minSources: 1,
      requireCitations: true,
      citationPolicy: 'refuse',
    });
  });

  it('rejects a negative or fractional threshold', () => {
    expect(() => resolveGroundingConfig({ minSources: -1 })).toThrow(ConfigurationError);
    expect(() => resolveGroundingConfig({ minSources: 1.5 })).toThrow(ConfigurationError);
  });

  it('lists the offending field in the issues', () => {
    try {
      resolveGroundingConfig({ minSources: -2 });
      expect.fail('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^minSources: /);
      }
    }
  });

  it('keeps the shared defaults frozen', () => {
    expect(Object.isFrozen(DEFAULT_GROUNDING_CONFIG)).toBe(true);
  });
});

describe('loadGroundingConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadGroundingConfig({})).toEqual({ minSources: 1, requireCitations: true, citationPolicy: 'warn' });
  });

  it('reads every grounding variable', () => {
    expect(
      loadGroundingConfig({
        RAG_MIN_SOURCES: '3',
        RAG_REQUIRE_CITATIONS: 'false',
        RAG_CITATION_POLICY: 'refuse',
        UNRELATED: 'ignored',
      })
    ).toEqual({ minSources: 3, requireCitations: false, citationPolicy: 'refuse' });
  });

  it('rejects a non-numeric threshold', () => {
    expect(() => loadGroundingConfig({ RAG_MIN_SOURCES: 'many' })).toThrow(ConfigurationError);
  });

  it('rejects an unknown policy or boolean spelling', () => {
    expect(() => loadGroundingConfig({ RAG_CITATION_POLICY: 'block' })).toThrow(ConfigurationError);
    expect(() => loadGroundingConfig({ RAG_REQUIRE_CITATIONS: 'yes' })).toThrow(ConfigurationError);
  });
});

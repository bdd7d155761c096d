import { describe, expect, it } from 'vitest';

import { ConfigurationError, EmptyCandidateSetError } from '../errors';
import { FuzzyMatcher, SENSITIVITY_PRESETS, createFuzzyMatcher, describeClassification } from '../matching';
import type { FuzzyMatchResult } from '../matching';
import { SENSITIVITIES } from '../types';

const CAPITALS = ['Paris', 'The capital of France', 'Paris, France'];

describe('FuzzyMatcher.match', () => {
  it('accepts a one-letter typo of Paris at medium sensitivity', () => {
    const matcher = new FuzzyMatcher('medium');
    const result = matcher.match('Pari', CAPITALS);

    expect(result.distance).toBe(1);
    expect(result.classification).toBe('minor-typo');
    expect(result.matchedAnswer).toBe('Paris');
    expect(result.confidence).toBeCloseTo(0.9, 10);
    expect(result.confidence).toBeGreaterThanOrEqual(0.85);
    expect(result.suggestion).toBe("Did you mean 'Paris'?");
    expect(matcher.shouldAutoAccept(result)).toBe(true);
    expect(matcher.shouldSuggest(result)).toBe(false);
  });

  it('only suggests the same typo under strict sensitivity', () => {
    const matcher = new FuzzyMatcher('strict');
    const result = matcher.match('Pari', CAPITALS);

    expect(result.classification).toBe('minor-typo');
    expect(matcher.shouldAutoAccept(result)).toBe(false);
    expect(matcher.shouldSuggest(result)).toBe(true);
  });

  it.each(SENSITIVITIES)('rejects an unrelated answer at %s sensitivity', (sensitivity) => {
    const matcher = new FuzzyMatcher(sensitivity);
    const result = matcher.match('London', CAPITALS);

    expect(result.classification).toBe('no-match');
    expect(result.matchedAnswer).toBeNull();
    expect(result.suggestion).toBeNull();
    expect(matcher.shouldAutoAccept(result)).toBe(false);
  });

  it('scores a verbatim answer as exact', () => {
    const result = createFuzzyMatcher().match('  Paris, France ', CAPITALS);

    expect(result).toEqual({
      classification: 'exact',
      matchedAnswer: 'Paris, France',
      confidence: 1,
      distance: 0,
      suggestion: null,
    });
  });

  it('scores a case-only difference as case-insensitive', () => {
    const result = createFuzzyMatcher().match('PARIS', CAPITALS);

    expect(result.classification).toBe('case-insensitive');
    expect(result.confidence).toBe(0.98);
    expect(result.distance).toBe(0);
    expect(result.matchedAnswer).toBe('Paris');
  });

  it('keeps the first candidate when confidences tie', () => {
    const matcher = createFuzzyMatcher();

    expect(matcher.match('cab', ['cat', 'car']).matchedAnswer).toBe('cat');
    expect(matcher.match('cab', ['car', 'cat']).matchedAnswer).toBe('car');
  });

  it('scales confidence down when the lengths differ a lot', () => {
    const result = createFuzzyMatcher().match('ab', ['abcdef']);

    expect(result.distance).toBe(4);
    expect(result.classification).toBe('major-typo');
    expect(result.confidence).toBeCloseTo(0.2852, 3);
  });

  it('returns no match for empty input', () => {
    const result = createFuzzyMatcher().match('   ', CAPITALS);

    expect(result.classification).toBe('no-match');
    expect(result.distance).toBe(Number.POSITIVE_INFINITY);
    expect(result.confidence).toBe(0);
  });

  it('throws when there is nothing to match against', () => {
    const matcher = createFuzzyMatcher();

    expect(() => matcher.match('Paris', [])).toThrow(EmptyCandidateSetError);
    expect(() => matcher.match('Paris', ['  ', ''])).toThrow(EmptyCandidateSetError);
  });

  it('returns the same result for the same input', () => {
    const matcher = createFuzzyMatcher('lenient');

    expect(matcher.match('Paaris', CAPITALS)).toEqual(matcher.match('Paaris', CAPITALS));
  });
});

describe('FuzzyMatcher.confidenceFor', () => {
  const matcher = new FuzzyMatcher('medium');

  it('adds a tenth of the shared prefix and suffix ratios', () => {
    expect(matcher.confidenceFor('Pari', 'Paris', 1)).toBeCloseTo(0.9, 10);
    expect(matcher.confidenceFor('olour', 'colour', 1)).toBeCloseTo(1 - 1 / 6 + 0.1, 10);
    expect(matcher.confidenceFor('colxur', 'colour', 1)).toBeCloseTo(1 - 1 / 6 + 0.05 + 0.1 / 3, 10);
  });

  it('caps the affix boost at 0.1', () => {
    expect(matcher.confidenceFor('aaa', 'aaaa', 1)).toBeCloseTo(0.85, 10);
  });

  it('scales by the length ratio below the preset minimum', () => {
    expect(matcher.confidenceFor('ab', 'abcdef', 4)).toBeCloseTo((1 / 3) * (1 / 3 / 0.6) + 0.1, 10);
  });
});

describe('FuzzyMatcher decisions', () => {
  const matcher = createFuzzyMatcher();

  function result(overrides: Partial<FuzzyMatchResult>): FuzzyMatchResult {
    return {
      classification: 'minor-typo',
      matchedAnswer: 'Paris',
      confidence: 1,
      distance: 1,
      suggestion: null,
      ...overrides,
    };
  }

  it('never auto-accepts major typos or non-matches', () => {
    expect(matcher.shouldAutoAccept(result({ classification: 'major-typo' }))).toBe(false);
    expect(matcher.shouldAutoAccept(result({ classification: 'no-match' }))).toBe(false);
    expect(matcher.shouldAutoAccept(result({ classification: 'moderate-typo' }))).toBe(false);
  });

  it('suggests only between the suggest and auto-accept thresholds', () => {
    expect(matcher.shouldSuggest(result({ classification: 'moderate-typo', confidence: 0.7 }))).toBe(true);
    expect(matcher.shouldSuggest(result({ classification: 'moderate-typo', confidence: 0.5 }))).toBe(false);
    expect(matcher.shouldSuggest(result({ classification: 'no-match', confidence: 0.7 }))).toBe(false);
  });
});

describe('FuzzyMatcher configuration', () => {
  it('switches presets by name', () => {
    const matcher = new FuzzyMatcher();
    matcher.setSensitivity('lenient');

    expect(matcher.sensitivity).toBe('lenient');
    expect(matcher.thresholds).toEqual(SENSITIVITY_PRESETS.lenient);
  });

  it('keeps constructor overrides when switching presets', () => {
    const matcher = new FuzzyMatcher('medium', { autoAccept: 0.85 });
    matcher.setSensitivity('strict');

    expect(matcher.thresholds).toEqual({ ...SENSITIVITY_PRESETS.strict, autoAccept: 0.85 });
  });

  it('rejects unknown sensitivity names', () => {
    expect(() => new FuzzyMatcher().setSensitivity('extreme')).toThrow(ConfigurationError);
  });

  it('rejects thresholds that are not ascending', () => {
    expect(() => new FuzzyMatcher('medium', { minorTypo: 4 })).toThrow(ConfigurationError);
  });

  it('classifies distances against the preset', () => {
    const matcher = new FuzzyMatcher('medium');

    expect([0, 2, 3, 5, 6].map((distance) => matcher.classify(distance))).toEqual([
      'minor-typo',
      'minor-typo',
      'moderate-typo',
      'major-typo',
      'no-match',
    ]);
    expect(describeClassification('case-insensitive')).toBe('Correct apart from capitalisation');
  });
});

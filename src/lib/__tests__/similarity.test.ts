import { describe, expect, it } from 'vitest';

import {
  charLength,
  commonPrefixLength,
  commonSuffixLength,
  isCaseInsensitiveEqual,
  levenshtein,
  normalizeForFuzzy,
} from '../similarity';

describe('levenshtein', () => {
  it('returns known distances', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('pari', 'paris')).toBe(1);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('flaw', 'lawn')).toBe(2);
  });

  it('is symmetric', () => {
    const pairs: [string, string][] = [
      ['kitten', 'sitting'],
      ['Paris', 'paris, france'],
      ['', 'x'],
      ['añejo', 'anejo'],
    ];
    for (const [a, b] of pairs) {
      expect(levenshtein(a, b)).toBe(levenshtein(b, a));
    }
  });

  it('is zero only for identical strings and is case sensitive', () => {
    expect(levenshtein('Paris', 'Paris')).toBe(0);
    expect(levenshtein('Paris', 'paris')).toBe(1);
    expect(levenshtein('abc', 'abd')).toBeGreaterThan(0);
  });

  it('counts astral characters as a single edit', () => {
    expect(levenshtein('cat🐱', 'cat🐶')).toBe(1);
    expect(charLength('🐱🐶')).toBe(2);
  });
});

describe('affix helpers', () => {
  it('measures shared prefixes and suffixes', () => {
    expect(commonPrefixLength('pari', 'paris')).toBe(4);
    expect(commonSuffixLength('pari', 'paris')).toBe(0);
    expect(commonSuffixLength('colour', 'flavour')).toBe(3);
    expect(commonPrefixLength('', 'abc')).toBe(0);
  });
});

describe('normalization', () => {
  it('trims and lowercases for fuzzy comparison', () => {
    expect(normalizeForFuzzy('  The Capital ')).toBe('the capital');
    expect(isCaseInsensitiveEqual(' PARIS', 'paris ')).toBe(true);
    expect(isCaseInsensitiveEqual('Paris', 'Pari')).toBe(false);
  });
});

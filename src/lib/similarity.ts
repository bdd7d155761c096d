/**
 * String distance helpers used by the answer matcher. Strings are compared
 * by code point, so an accented letter or an emoji counts as one edit.
 */

function chars(s: string): string[] {
  return Array.from(s);
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  let longer = chars(a);
  let shorter = chars(b);
  if (longer.length < shorter.length) {
    [longer, shorter] = [shorter, longer];
  }
  if (shorter.length === 0) return longer.length;

  let previous = Array.from({ length: shorter.length + 1 }, (_, i) => i);
  for (let i = 0; i < longer.length; i += 1) {
    const current = [i + 1];
    for (let j = 0; j < shorter.length; j += 1) {
      const insertion = previous[j + 1] + 1;
      const deletion = current[j] + 1;
      const substitution = previous[j] + (longer[i] === shorter[j] ? 0 : 1);
      current.push(Math.min(insertion, deletion, substitution));
    }
    previous = current;
  }
  return previous[shorter.length];
}

export function commonPrefixLength(a: string, b: string): number {
  const x = chars(a), y = chars(b);
  const limit = Math.min(x.length, y.length);
  let n = 0;
  while (n < limit && x[n] === y[n]) n += 1;
  return n;
}

export function commonSuffixLength(a: string, b: string): number {
  const x = chars(a), y = chars(b);
  const limit = Math.min(x.length, y.length);
  let n = 0;
  while (n < limit && x[x.length - 1 - n] === y[y.length - 1 - n]) n += 1;
  return n;
}

export function charLength(s: string): number {
  return chars(s).length;
}

export function normalizeForExact(s: string): string {
  return s.trim();
}

export function normalizeForFuzzy(s: string): string {
  return s.trim().toLowerCase();
}

export function isCaseInsensitiveEqual(a: string, b: string): boolean {
  return normalizeForFuzzy(a) === normalizeForFuzzy(b);
}

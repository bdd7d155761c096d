import { ConfigurationError, EmptyCandidateSetError } from './errors';
import {
  charLength,
  commonPrefixLength,
  commonSuffixLength,
  levenshtein,
  normalizeForExact,
  normalizeForFuzzy,
} from './similarity';
import { SENSITIVITIES } from './types';
import type { Sensitivity } from './types';

export type MatchClassification =
  | 'exact'
  | 'case-insensitive'
  | 'minor-typo'
  | 'moderate-typo'
  | 'major-typo'
  | 'no-match';

export interface FuzzyMatchResult {
  classification: MatchClassification;
  matchedAnswer: string | null;
  confidence: number;
  /** Edit distance; Infinity when nothing was compared. */
  distance: number;
  suggestion: string | null;
}

export interface SensitivityPreset {
  minorTypo: number;
  moderateTypo: number;
  majorTypo: number;
  /** Shorter/longer length ratio below which confidence is scaled down. */
  lengthRatio: number;
  autoAccept: number;
  suggest: number;
}

export const SENSITIVITY_PRESETS: Readonly<Record<Sensitivity, Readonly<SensitivityPreset>>> = {
  strict: { minorTypo: 1, moderateTypo: 2, majorTypo: 3, lengthRatio: 0.8, autoAccept: 0.95, suggest: 0.7 },
  medium: { minorTypo: 2, moderateTypo: 3, majorTypo: 5, lengthRatio: 0.6, autoAccept: 0.9, suggest: 0.6 },
  lenient: { minorTypo: 3, moderateTypo: 5, majorTypo: 7, lengthRatio: 0.4, autoAccept: 0.8, suggest: 0.5 },
};

export const EXACT_CONFIDENCE = 1;
export const CASE_INSENSITIVE_CONFIDENCE = 0.98;

const AFFIX_WEIGHT = 0.1;
const MAX_AFFIX_BOOST = 0.1;
const THRESHOLD_EPSILON = 1e-9;

const AUTO_ACCEPTABLE: ReadonlySet<MatchClassification> = new Set(['exact', 'case-insensitive', 'minor-typo']);

export function isSensitivity(value: string): value is Sensitivity {
  return SENSITIVITIES.some((name) => name === value);
}

export function noMatch(): FuzzyMatchResult {
  return { classification: 'no-match', matchedAnswer: null, confidence: 0, distance: Number.POSITIVE_INFINITY, suggestion: null };
}

export function exactMatch(answer: string): FuzzyMatchResult {
  return { classification: 'exact', matchedAnswer: answer, confidence: EXACT_CONFIDENCE, distance: 0, suggestion: null };
}

export function caseInsensitiveMatch(answer: string): FuzzyMatchResult {
  return {
    classification: 'case-insensitive',
    matchedAnswer: answer,
    confidence: CASE_INSENSITIVE_CONFIDENCE,
    distance: 0,
    suggestion: null,
  };
}

export function describeClassification(classification: MatchClassification): string {
  switch (classification) {
    case 'exact':
      return 'Exact match';
    case 'case-insensitive':
      return 'Correct apart from capitalisation';
    case 'minor-typo':
      return 'Minor typo';
    case 'moderate-typo':
      return 'Moderate typo';
    case 'major-typo':
      return 'Major typo';
    case 'no-match':
      return 'No match';
    default: {
      const unreachable: never = classification;
      return unreachable;
    }
  }
}

function meets(value: number, threshold: number): boolean {
  return value >= threshold - THRESHOLD_EPSILON;
}

function validatePreset(preset: SensitivityPreset): SensitivityPreset {
  const { minorTypo, moderateTypo, majorTypo } = preset;
  if (!(minorTypo >= 0 && minorTypo <= moderateTypo && moderateTypo <= majorTypo)) {
    throw new ConfigurationError(
      `Typo thresholds must be ascending, received ${minorTypo}/${moderateTypo}/${majorTypo}.`,
    );
  }
  for (const key of ['lengthRatio', 'autoAccept', 'suggest'] as const) {
    const value = preset[key];
    if (!(value >= 0 && value <= 1)) {
      throw new ConfigurationError(`${key} must be between 0 and 1, received ${value}.`);
    }
  }
  return preset;
}

export class FuzzyMatcher {
  private currentSensitivity: Sensitivity;

  private preset: SensitivityPreset;

  private readonly overrides: Partial<SensitivityPreset>;

  constructor(sensitivity: Sensitivity = 'medium', overrides: Partial<SensitivityPreset> = {}) {
    this.currentSensitivity = sensitivity;
    this.overrides = { ...overrides };
    this.preset = validatePreset({ ...SENSITIVITY_PRESETS[sensitivity], ...this.overrides });
  }

  get sensitivity(): Sensitivity {
    return this.currentSensitivity;
  }

  get thresholds(): Readonly<SensitivityPreset> {
    return { ...this.preset };
  }

  /** Switches to another preset; constructor overrides are applied on top of it again. */
  setSensitivity(sensitivity: string): void {
    if (!isSensitivity(sensitivity)) {
      throw new ConfigurationError(`Sensitivity must be one of ${SENSITIVITIES.join(', ')}, received '${sensitivity}'.`);
    }
    this.preset = validatePreset({ ...SENSITIVITY_PRESETS[sensitivity], ...this.overrides });
    this.currentSensitivity = sensitivity;
  }

  /**
   * Scores `input` against every candidate and keeps the one with the
   * strictly highest confidence. On ties the earlier candidate wins.
   */
  match(input: string, candidates: readonly string[]): FuzzyMatchResult {
    const answers = candidates.map(normalizeForExact).filter((answer) => answer !== '');
    if (answers.length === 0) {
      throw new EmptyCandidateSetError();
    }

    const received = normalizeForExact(input);
    if (received === '') {
      return noMatch();
    }

    let best: FuzzyMatchResult | null = null;
    for (const answer of answers) {
      const result = this.matchOne(received, answer);
      if (result.confidence > (best?.confidence ?? 0)) {
        best = result;
      }
    }
    return best ?? noMatch();
  }

  shouldAutoAccept(result: FuzzyMatchResult): boolean {
    return AUTO_ACCEPTABLE.has(result.classification) && meets(result.confidence, this.preset.autoAccept);
  }

  shouldSuggest(result: FuzzyMatchResult): boolean {
    return (
      result.classification !== 'no-match' &&
      meets(result.confidence, this.preset.suggest) &&
      !this.shouldAutoAccept(result)
    );
  }

  classify(distance: number): MatchClassification {
    if (distance <= this.preset.minorTypo) return 'minor-typo';
    if (distance <= this.preset.moderateTypo) return 'moderate-typo';
    if (distance <= this.preset.majorTypo) return 'major-typo';
    return 'no-match';
  }

  /**
   * `1 - distance / maxLen`, scaled by `minLen / maxLen / lengthRatio` when
   * the length ratio is below the preset's, plus `0.1 * prefix/minLen +
   * 0.1 * suffix/minLen` capped at 0.1, clamped to [0, 1]. Lengths are
   * counted on the trimmed, lower-cased strings.
   */
  confidenceFor(received: string, answer: string, distance: number): number {
    const a = normalizeForFuzzy(received);
    const b = normalizeForFuzzy(answer);
    const lenA = charLength(a);
    const lenB = charLength(b);
    const maxLen = Math.max(lenA, lenB);
    const minLen = Math.min(lenA, lenB);
    if (maxLen === 0) return 1;

    let confidence = Math.max(0, Math.min(1, 1 - distance / maxLen));

    const lengthRatio = minLen / maxLen;
    if (lengthRatio < this.preset.lengthRatio) {
      confidence *= lengthRatio / this.preset.lengthRatio;
    }

    if (minLen > 0) {
      const prefixRatio = commonPrefixLength(a, b) / minLen;
      const suffixRatio = commonSuffixLength(a, b) / minLen;
      confidence += Math.min(MAX_AFFIX_BOOST, AFFIX_WEIGHT * prefixRatio + AFFIX_WEIGHT * suffixRatio);
    }

    return Math.max(0, Math.min(1, confidence));
  }

  private matchOne(received: string, answer: string): FuzzyMatchResult {
    if (received === answer) {
      return exactMatch(answer);
    }
    if (normalizeForFuzzy(received) === normalizeForFuzzy(answer)) {
      return caseInsensitiveMatch(answer);
    }

    const distance = levenshtein(normalizeForFuzzy(received), normalizeForFuzzy(answer));
    const confidence = this.confidenceFor(received, answer, distance);
    const classification = this.classify(distance);
    const matchedAnswer = classification === 'no-match' ? null : answer;
    const suggestion =
      matchedAnswer !== null && meets(confidence, this.preset.suggest) ? `Did you mean '${matchedAnswer}'?` : null;

    return { classification, matchedAnswer, confidence, distance, suggestion };
  }
}

export function createFuzzyMatcher(sensitivity: Sensitivity = 'medium'): FuzzyMatcher {
  return new FuzzyMatcher(sensitivity);
}

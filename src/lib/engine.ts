import { InvalidQualityError } from './errors';
import {
  CONFIDENCE_CAPACITY,
  DIFFICULTY_HISTORY_CAPACITY,
  RESPONSE_TIME_CAPACITY,
  appendBounded,
} from './history';
import { assertConfidence, clampEase } from './item';
import type { ConfidenceLevel, Item, Quality } from './types';

const DAY = 24 * 60 * 60 * 1000;

export interface OutcomeInput {
  correct: boolean;
  quality: number;
  /** Seconds; only positive values are kept. */
  responseTime: number;
  confidence?: number | null;
}

export interface SchedulerOptions {
  correctStep: number;
  incorrectStep: number;
  minimumIntervalDays: number;
}

export const DEFAULT_SCHEDULER_OPTIONS: Readonly<SchedulerOptions> = {
  correctStep: 0.05,
  incorrectStep: 0.1,
  minimumIntervalDays: 1,
};

export function isQuality(value: number): value is Quality {
  return Number.isInteger(value) && value >= 0 && value <= 5;
}

export function assertQuality(value: number): Quality {
  if (!isQuality(value)) {
    throw new InvalidQualityError(value);
  }
  return value;
}

/** Quality for a review without an explicit grade: wrong is 0, then faster is better. */
export function qualityFromOutcome(correct: boolean, responseTime: number): Quality {
  if (!correct) return 0;
  if (responseTime <= 3) return 5;
  if (responseTime <= 5) return 4;
  if (responseTime <= 10) return 3;
  return 2;
}

export function nextReviewFromInterval(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() + days * DAY);
}

export class Scheduler {
  private readonly options: SchedulerOptions;

  constructor(options: Partial<SchedulerOptions> = {}) {
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...options };
  }

  intervalDays(correct: boolean, ease: number, difficulty: number): number {
    const minimum = this.options.minimumIntervalDays;
    if (!correct) return minimum;
    return Math.max(minimum, Math.round(ease * (1 - difficulty)));
  }

  /**
   * Applies one review to `item` and returns the new state. The input is
   * left untouched; invalid quality or confidence throws before any work.
   */
  recordOutcome(item: Item, outcome: OutcomeInput, now: Date = new Date()): Item {
    assertQuality(outcome.quality);
    const confidence: ConfidenceLevel | null =
      outcome.confidence === undefined || outcome.confidence === null ? null : assertConfidence(outcome.confidence);

    const difficultyHistory = appendBounded(item.difficultyHistory, item.difficulty, DIFFICULTY_HISTORY_CAPACITY);
    const responseTimes =
      Number.isFinite(outcome.responseTime) && outcome.responseTime > 0
        ? appendBounded(item.responseTimes, outcome.responseTime, RESPONSE_TIME_CAPACITY)
        : [...item.responseTimes];
    const confidenceRatings =
      confidence === null
        ? [...item.confidenceRatings]
        : appendBounded(item.confidenceRatings, confidence, CONFIDENCE_CAPACITY);

    const difficulty = outcome.correct
      ? Math.max(0, item.difficulty - this.options.correctStep)
      : Math.min(1, item.difficulty + this.options.incorrectStep);

    const ease = clampEase(item.ease);
    const days = this.intervalDays(outcome.correct, ease, difficulty);

    return {
      ...item,
      ease,
      difficulty,
      difficultyHistory,
      responseTimes,
      confidenceRatings,
      reviewCount: item.reviewCount + 1,
      correctCount: item.correctCount + (outcome.correct ? 1 : 0),
      nextReviewAt: nextReviewFromInterval(days, now),
      lastReviewedAt: new Date(now.getTime()),
    };
  }
}

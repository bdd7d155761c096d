export type ID = string;

export type QuizMode = 'spaced' | 'random' | 'sequential' | 'difficulty-first';

export const QUIZ_MODES: readonly QuizMode[] = ['spaced', 'random', 'sequential', 'difficulty-first'];

export type Sensitivity = 'strict' | 'medium' | 'lenient';

export const SENSITIVITIES: readonly Sensitivity[] = ['strict', 'medium', 'lenient'];

/** Self-reported confidence, 1 = guessing, 5 = certain. */
export type ConfidenceLevel = 1 | 2 | 3 | 4 | 5;

/** 0 = blackout, 5 = perfect and fast. */
export type Quality = 0 | 1 | 2 | 3 | 4 | 5;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type Metadata = { [key: string]: JsonValue };

export interface DifficultyUpdate {
  at: Date;
  from: number;
  to: number;
  reason: string;
}

export interface Item {
  readonly id: ID;
  readonly prompt: string;
  /** @deprecated Read acceptedAnswers[0]; kept for single-answer consumers. */
  readonly primaryAnswer: string;
  readonly acceptedAnswers: readonly string[];
  readonly difficulty: number;
  readonly ease: number;
  readonly reviewCount: number;
  readonly correctCount: number;
  readonly createdAt: Date;
  readonly nextReviewAt: Date;
  readonly lastReviewedAt: Date | null;
  readonly lastDifficultyUpdateAt: Date | null;
  readonly tags: readonly string[];
  readonly responseTimes: readonly number[];
  readonly confidenceRatings: readonly ConfidenceLevel[];
  readonly difficultyHistory: readonly number[];
  readonly difficultyUpdates: readonly DifficultyUpdate[];
  readonly metadata: Readonly<Metadata>;
}

/** One review result as seen by the difficulty adapter. */
export interface ReviewOutcome {
  correct: boolean;
}

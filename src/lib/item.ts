import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import {
  InvalidAnswerSetError,
  InvalidConfidenceError,
  InvalidDifficultyError,
  InvalidEaseError,
  InvalidItemError,
} from './errors';
import {
  CONFIDENCE_CAPACITY,
  DIFFICULTY_HISTORY_CAPACITY,
  DIFFICULTY_UPDATE_CAPACITY,
  RESPONSE_TIME_CAPACITY,
  appendBounded,
  mean,
  truncateBounded,
} from './history';
import type { ConfidenceLevel, DifficultyUpdate, ID, Item, JsonValue, Metadata } from './types';

export const DEFAULT_DIFFICULTY = 0.5;
export const DEFAULT_EASE = 2.5;
export const MINIMUM_EASE = 1.3;

export interface ItemInput {
  id?: ID;
  prompt: string;
  answer: string;
  alternatives?: readonly string[];
  difficulty?: number;
  ease?: number;
  tags?: readonly string[];
  metadata?: Metadata;
}

export function assertDifficulty(value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidDifficultyError(value);
  }
  return value;
}

export function assertEase(value: number): number {
  if (!Number.isFinite(value) || value < MINIMUM_EASE) {
    throw new InvalidEaseError(value);
  }
  return value;
}

export function clampEase(value: number): number {
  return Math.max(MINIMUM_EASE, value);
}

export function clampDifficulty(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function isConfidenceLevel(value: number): value is ConfidenceLevel {
  return value === 1 || value === 2 || value === 3 || value === 4 || value === 5;
}

export function assertConfidence(value: number): ConfidenceLevel {
  if (!isConfidenceLevel(value)) {
    throw new InvalidConfidenceError(value);
  }
  return value;
}

/**
 * Trims every answer, drops exact duplicates and puts the primary answer
 * first. Blank answers are rejected rather than skipped.
 */
export function normalizeAnswers(primary: string, alternatives: readonly string[] = []): string[] {
  const first = primary.trim();
  if (first === '') {
    throw new InvalidAnswerSetError('The primary answer cannot be empty.');
  }

  const answers = [first];
  for (const raw of alternatives) {
    const answer = raw.trim();
    if (answer === '') {
      throw new InvalidAnswerSetError('Accepted answers cannot contain blank entries.');
    }
    if (!answers.includes(answer)) {
      answers.push(answer);
    }
  }
  return answers;
}

function normalizeTags(tags: readonly string[]): string[] {
  const seen: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    if (tag !== '' && !seen.includes(tag)) seen.push(tag);
  }
  return seen;
}

export function createItem(input: ItemInput, now: Date = new Date()): Item {
  const prompt = input.prompt.trim();
  if (prompt === '') {
    throw new InvalidItemError('An item prompt cannot be empty.');
  }

  const acceptedAnswers = normalizeAnswers(input.answer, input.alternatives);

  return {
    id: input.id ?? randomUUID(),
    prompt,
    primaryAnswer: acceptedAnswers[0],
    acceptedAnswers,
    difficulty: assertDifficulty(input.difficulty ?? DEFAULT_DIFFICULTY),
    ease: assertEase(input.ease ?? DEFAULT_EASE),
    reviewCount: 0,
    correctCount: 0,
    createdAt: new Date(now.getTime()),
    nextReviewAt: new Date(now.getTime()),
    lastReviewedAt: null,
    lastDifficultyUpdateAt: null,
    tags: normalizeTags(input.tags ?? []),
    responseTimes: [],
    confidenceRatings: [],
    difficultyHistory: [],
    difficultyUpdates: [],
    metadata: { ...(input.metadata ?? {}) },
  };
}

/** Direct difficulty setter; records the previous value in the history. */
export function withDifficulty(item: Item, value: number, reason?: string, now: Date = new Date()): Item {
  const next = assertDifficulty(value);
  const updates =
    reason && reason.trim() !== ''
      ? appendBounded(
          item.difficultyUpdates,
          { at: new Date(now.getTime()), from: item.difficulty, to: next, reason: reason.trim() },
          DIFFICULTY_UPDATE_CAPACITY,
        )
      : item.difficultyUpdates;

  return {
    ...item,
    difficulty: next,
    difficultyHistory: appendBounded(item.difficultyHistory, item.difficulty, DIFFICULTY_HISTORY_CAPACITY),
    difficultyUpdates: updates,
    lastDifficultyUpdateAt: new Date(now.getTime()),
  };
}

export function withAcceptedAnswers(item: Item, alternatives: readonly string[]): Item {
  const acceptedAnswers = normalizeAnswers(item.primaryAnswer, alternatives);
  return { ...item, acceptedAnswers };
}

export function accuracy(item: Item): number {
  if (item.reviewCount === 0) return 0;
  return item.correctCount / item.reviewCount;
}

export function isDue(item: Item, now: Date = new Date()): boolean {
  return now.getTime() >= item.nextReviewAt.getTime();
}

export function averageResponseTime(item: Item): number {
  return mean(item.responseTimes);
}

export function averageConfidence(item: Item): number {
  return mean(item.confidenceRatings);
}

/** Positive when the item has been getting harder, negative when easier. */
export function difficultyTrend(item: Item): number {
  const history = item.difficultyHistory;
  if (history.length < 2) return 0;

  const recent = history.length >= 3 ? history.slice(-3) : history.slice(-1);
  const earlier = history.length >= 6 ? history.slice(0, -3) : history.slice(0, -1);
  if (earlier.length === 0) return 0;

  return mean(recent) - mean(earlier);
}

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const timestampSchema = z.string().datetime({ offset: true });

const confidenceSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]);

const counterSchema = z.number().int().nonnegative();

export const itemRecordSchema = z.object({
  id: z.string().min(1),
  prompt: z.string(),
  primaryAnswer: z.string(),
  acceptedAnswers: z.array(z.string()),
  difficulty: z.number(),
  ease: z.number(),
  reviewCount: counterSchema,
  correctCount: counterSchema,
  createdAt: timestampSchema,
  nextReviewAt: timestampSchema,
  lastReviewedAt: timestampSchema.nullable(),
  lastDifficultyUpdateAt: timestampSchema.nullable(),
  tags: z.array(z.string()),
  responseTimes: z.array(z.number().nonnegative()),
  confidenceRatings: z.array(confidenceSchema),
  difficultyHistory: z.array(z.number().min(0).max(1)),
  difficultyUpdates: z
    .array(
      z.object({
        at: timestampSchema,
        from: z.number(),
        to: z.number(),
        reason: z.string(),
      }),
    )
    .default([]),
  metadata: z.record(jsonValueSchema).default({}),
});

export type ItemRecord = z.input<typeof itemRecordSchema>;

function isoOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

function dateOrNull(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

export function serializeItem(item: Item): ItemRecord {
  return {
    id: item.id,
    prompt: item.prompt,
    primaryAnswer: item.primaryAnswer,
    acceptedAnswers: [...item.acceptedAnswers],
    difficulty: item.difficulty,
    ease: item.ease,
    reviewCount: item.reviewCount,
    correctCount: item.correctCount,
    createdAt: item.createdAt.toISOString(),
    nextReviewAt: item.nextReviewAt.toISOString(),
    lastReviewedAt: isoOrNull(item.lastReviewedAt),
    lastDifficultyUpdateAt: isoOrNull(item.lastDifficultyUpdateAt),
    tags: [...item.tags],
    responseTimes: [...item.responseTimes],
    confidenceRatings: [...item.confidenceRatings],
    difficultyHistory: [...item.difficultyHistory],
    difficultyUpdates: item.difficultyUpdates.map((update) => ({
      at: update.at.toISOString(),
      from: update.from,
      to: update.to,
      reason: update.reason,
    })),
    metadata: { ...item.metadata },
  };
}

export function deserializeItem(raw: unknown): Item {
  const parsed = itemRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new InvalidItemError(`Invalid item record${where}: ${first?.message ?? 'unknown issue'}`, {
      cause: parsed.error,
    });
  }

  const record = parsed.data;
  const prompt = record.prompt.trim();
  if (prompt === '') {
    throw new InvalidItemError('An item prompt cannot be empty.');
  }
  if (record.correctCount > record.reviewCount) {
    throw new InvalidItemError(
      `correctCount (${record.correctCount}) cannot exceed reviewCount (${record.reviewCount}).`,
    );
  }

  const acceptedAnswers = normalizeAnswers(
    record.primaryAnswer,
    record.acceptedAnswers.filter((answer) => answer.trim() !== record.primaryAnswer.trim()),
  );

  const updates: DifficultyUpdate[] = record.difficultyUpdates.map((update) => ({
    at: new Date(update.at),
    from: update.from,
    to: update.to,
    reason: update.reason,
  }));

  return {
    id: record.id,
    prompt,
    primaryAnswer: acceptedAnswers[0],
    acceptedAnswers,
    difficulty: assertDifficulty(record.difficulty),
    ease: assertEase(record.ease),
    reviewCount: record.reviewCount,
    correctCount: record.correctCount,
    createdAt: new Date(record.createdAt),
    nextReviewAt: new Date(record.nextReviewAt),
    lastReviewedAt: dateOrNull(record.lastReviewedAt),
    lastDifficultyUpdateAt: dateOrNull(record.lastDifficultyUpdateAt),
    tags: normalizeTags(record.tags),
    responseTimes: truncateBounded(record.responseTimes, RESPONSE_TIME_CAPACITY),
    confidenceRatings: truncateBounded(record.confidenceRatings, CONFIDENCE_CAPACITY),
    difficultyHistory: truncateBounded(record.difficultyHistory, DIFFICULTY_HISTORY_CAPACITY),
    difficultyUpdates: truncateBounded(updates, DIFFICULTY_UPDATE_CAPACITY),
    metadata: record.metadata,
  };
}

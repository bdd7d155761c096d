import { isDue } from './item';
import { shuffle } from './random';
import type { RandomSource } from './random';
import type { Item, QuizMode } from './types';

function earliestDueFirst(items: readonly Item[], now: Date): Item[] {
  const due = items.filter((item) => isDue(item, now));
  const candidates = due.length > 0 ? due : [...items];
  return candidates.sort((a, b) => a.nextReviewAt.getTime() - b.nextReviewAt.getTime());
}

/** Full presentation order a policy gives `items`. Sorting is stable, so ties keep input order. */
export function orderForMode(items: readonly Item[], mode: QuizMode, now: Date, random: RandomSource): Item[] {
  switch (mode) {
    case 'spaced':
      return earliestDueFirst(items, now);
    case 'difficulty-first':
      return [...items].sort((a, b) => b.difficulty - a.difficulty);
    case 'random':
      return shuffle(items, random);
    case 'sequential':
      return [...items];
    default: {
      const unreachable: never = mode;
      throw new Error(`Unknown quiz mode: ${String(unreachable)}`);
    }
  }
}

export function selectNext(pool: readonly Item[], mode: QuizMode, now: Date, random: RandomSource): Item | null {
  if (pool.length === 0) return null;
  if (mode === 'random') {
    const index = Math.min(pool.length - 1, Math.floor(random.next() * pool.length));
    return pool[index];
  }
  return orderForMode(pool, mode, now, random)[0] ?? null;
}

export function planSession(
  items: readonly Item[],
  mode: QuizMode,
  now: Date,
  random: RandomSource,
  count?: number,
): Item[] {
  const ordered = orderForMode(items, mode, now, random);
  return count === undefined ? ordered : ordered.slice(0, Math.max(0, count));
}

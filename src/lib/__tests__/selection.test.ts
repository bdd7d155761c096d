import { describe, expect, it } from 'vitest';

import { createItem } from '../item';
import { orderForMode, planSession, selectNext } from '../selection';
import type { RandomSource } from '../random';
import type { Item } from '../types';

const NOW = new Date('2024-03-10T12:00:00.000Z');
const HOUR = 60 * 60 * 1000;
const firstPick: RandomSource = { next: () => 0 };

function card(id: string, offsetHours: number, difficulty: number): Item {
  return {
    ...createItem({ id, prompt: `Prompt ${id}`, answer: `Answer ${id}`, difficulty }, NOW),
    nextReviewAt: new Date(NOW.getTime() + offsetHours * HOUR),
  };
}

const items = [card('a', -2, 0.3), card('b', -24, 0.8), card('c', 24, 0.5), card('e', -2, 0.8)];

function ids(list: readonly Item[]): string[] {
  return list.map((item) => item.id);
}

describe('orderForMode', () => {
  it('puts the most overdue items first in spaced mode', () => {
    expect(ids(orderForMode(items, 'spaced', NOW, firstPick))).toEqual(['b', 'a', 'e']);
  });

  it('falls back to every item when nothing is due', () => {
    const earlier = new Date(NOW.getTime() - 48 * HOUR);

    expect(ids(orderForMode(items, 'spaced', earlier, firstPick))).toEqual(['b', 'a', 'e', 'c']);
  });

  it('orders by descending difficulty and keeps ties in input order', () => {
    expect(ids(orderForMode(items, 'difficulty-first', NOW, firstPick))).toEqual(['b', 'e', 'c', 'a']);
  });

  it('keeps input order in sequential mode', () => {
    expect(ids(orderForMode(items, 'sequential', NOW, firstPick))).toEqual(['a', 'b', 'c', 'e']);
  });

  it('shuffles in random mode', () => {
    expect(ids(orderForMode(items, 'random', NOW, firstPick))).toEqual(['b', 'c', 'e', 'a']);
  });
});

describe('selectNext', () => {
  it('returns null for an empty pool', () => {
    expect(selectNext([], 'spaced', NOW, firstPick)).toBeNull();
  });

  it('picks the head of the policy order', () => {
    expect(selectNext(items, 'spaced', NOW, firstPick)?.id).toBe('b');
    expect(selectNext(items, 'sequential', NOW, firstPick)?.id).toBe('a');
    expect(selectNext(items, 'random', NOW, { next: () => 0.6 })?.id).toBe('c');
  });
});

describe('planSession', () => {
  it('truncates the plan to the requested count', () => {
    expect(ids(planSession(items, 'spaced', NOW, firstPick, 2))).toEqual(['b', 'a']);
    expect(planSession(items, 'sequential', NOW, firstPick, 0)).toEqual([]);
    expect(planSession(items, 'sequential', NOW, firstPick)).toHaveLength(4);
  });
});

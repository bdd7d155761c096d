export const RESPONSE_TIME_CAPACITY = 20;
export const CONFIDENCE_CAPACITY = 20;
export const DIFFICULTY_HISTORY_CAPACITY = 10;
export const DIFFICULTY_UPDATE_CAPACITY = 10;

/** Returns a new list with `value` appended, keeping only the newest `capacity` entries. */
export function appendBounded<T>(list: readonly T[], value: T, capacity: number): T[] {
  if (capacity <= 0) return [];
  const next = [...list, value];
  return next.length > capacity ? next.slice(next.length - capacity) : next;
}

/** Keeps the newest `capacity` entries of an incoming list. */
export function truncateBounded<T>(list: readonly T[], capacity: number): T[] {
  if (capacity <= 0) return [];
  return list.length > capacity ? list.slice(list.length - capacity) : [...list];
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/** Sample variance (n - 1 denominator); 0 for fewer than two values. */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  let sum = 0;
  for (const value of values) {
    sum += (value - avg) * (value - avg);
  }
  return sum / (values.length - 1);
}

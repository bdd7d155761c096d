import { accuracy, isDue } from './item';
import type { ID, Item } from './types';

/**
 * Ordered item collection the session reads from and commits to.
 * Storage is up to the implementation.
 */
export interface Deck {
  items(): readonly Item[];
  due(now?: Date): Item[];
  find(id: ID): Item | undefined;
  add(item: Item): boolean;
  remove(id: ID): boolean;
  /** Replaces the stored item with the same id. */
  commit(item: Item): boolean;
}

export class InMemoryDeck implements Deck {
  private entries: Item[];

  constructor(items: readonly Item[] = []) {
    this.entries = [];
    for (const item of items) {
      this.add(item);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  items(): readonly Item[] {
    return [...this.entries];
  }

  due(now: Date = new Date()): Item[] {
    return this.entries.filter((item) => isDue(item, now));
  }

  dueCount(now: Date = new Date()): number {
    return this.due(now).length;
  }

  averageAccuracy(): number {
    if (this.entries.length === 0) return 0;
    const total = this.entries.reduce((sum, item) => sum + accuracy(item), 0);
    return total / this.entries.length;
  }

  withTag(tag: string): Item[] {
    return this.entries.filter((item) => item.tags.includes(tag));
  }

  find(id: ID): Item | undefined {
    return this.entries.find((item) => item.id === id);
  }

  add(item: Item): boolean {
    if (this.find(item.id)) return false;
    this.entries.push(item);
    return true;
  }

  remove(id: ID): boolean {
    const index = this.entries.findIndex((item) => item.id === id);
    if (index === -1) return false;
    this.entries.splice(index, 1);
    return true;
  }

  commit(item: Item): boolean {
    const index = this.entries.findIndex((entry) => entry.id === item.id);
    if (index === -1) return false;
    this.entries[index] = item;
    return true;
  }
}

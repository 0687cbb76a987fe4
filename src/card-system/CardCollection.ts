/**
 * CardCollection: the ordered card sequence every pile is built on.
 *
 * The last element of the internal array is the top of the
 * collection. Cards enter only through `put` and leave only through
 * `take`/`takeAll`.
 */

import type { Card } from './Card';
import { EmptyError } from './errors';

/** Read-only view handed to presentation code. */
export interface ReadonlyCardCollection {
  /** The top card, or `undefined` when empty. */
  peek(): Card | undefined;
  /** Card at `index` (negative counts from the top), or `undefined`. */
  at(index: number): Card | undefined;
  size(): number;
  isEmpty(): boolean;
  /** Copy of all cards, bottom to top. */
  toArray(): Card[];
}

export class CardCollection implements ReadonlyCardCollection {
  protected readonly cards: Card[];

  /**
   * Create a collection, optionally pre-populated with cards.
   * The last element of the array is treated as the top.
   */
  constructor(cards: readonly Card[] = []) {
    this.cards = [...cards];
  }

  /**
   * Remove and return the top `count` cards, bottom to top.
   *
   * `take(1)` removes only the top card.
   *
   * @throws RangeError if `count` is not a positive integer.
   * @throws EmptyError if `count` exceeds the collection size.
   */
  take(count: number = 1): Card[] {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Take count must be a positive integer, got ${count}`);
    }
    if (count > this.cards.length) {
      throw new EmptyError(count, this.cards.length);
    }
    return this.cards.splice(this.cards.length - count, count);
  }

  /** Remove and return every card, bottom to top. */
  takeAll(): Card[] {
    return this.cards.splice(0, this.cards.length);
  }

  /** Append one card, or a sequence in its given order. */
  put(incoming: Card | readonly Card[]): void {
    if (isCardList(incoming)) {
      this.cards.push(...incoming);
    } else {
      this.cards.push(incoming);
    }
  }

  peek(): Card | undefined {
    return this.cards.length > 0
      ? this.cards[this.cards.length - 1]
      : undefined;
  }

  at(index: number): Card | undefined {
    return this.cards.at(index);
  }

  isEmpty(): boolean {
    return this.cards.length === 0;
  }

  size(): number {
    return this.cards.length;
  }

  toArray(): Card[] {
    return [...this.cards];
  }
}

export function isCardList(value: Card | readonly Card[]): value is readonly Card[] {
  return Array.isArray(value);
}

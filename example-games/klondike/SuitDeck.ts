/**
 * Foundation pile: one suit, built up from Ace to King.
 *
 * Two layers guard the run. `verify` is the recoverable pre-check
 * the game consults before a move; `put` re-checks every card and
 * throws InvalidCardError, which only fires if a caller skipped
 * `verify`.
 */

import type { Card, Suit } from '../../src/card-system/Card';
import { formatCard, rankValue } from '../../src/card-system/Card';
import { CardCollection, isCardList } from '../../src/card-system/CardCollection';
import {
  InvalidCardError,
  UnsupportedOperationError,
} from '../../src/card-system/errors';
import type { CardPile } from '../../src/rule-engine/PileRules';
import { CARDS_PER_SUIT } from './KlondikeState';

/** Read-only view of a foundation for presentation code. */
export interface ReadonlyFoundation {
  readonly suit: Suit;
  peek(): Card | undefined;
  size(): number;
  isEmpty(): boolean;
  isComplete(): boolean;
  toArray(): Card[];
}

export class SuitDeck
  extends CardCollection
  implements CardPile, ReadonlyFoundation
{
  readonly kind = 'foundation';

  constructor(
    readonly suit: Suit,
    cards: readonly Card[] = [],
  ) {
    super();
    this.put(cards);
  }

  verify(candidate: Card): boolean {
    return nextFits(this.suit, this.peek(), candidate);
  }

  /**
   * Append cards, checking each against the run. A sequence is
   * checked in full before anything is appended.
   *
   * @throws InvalidCardError if a card does not continue the run.
   */
  override put(incoming: Card | readonly Card[]): void {
    const cards = isCardList(incoming) ? incoming : [incoming];
    let top = this.peek();
    for (const card of cards) {
      if (!nextFits(this.suit, top, card)) {
        throw new InvalidCardError(
          `${formatCard(card)} does not continue the ${this.suit} foundation ` +
            `(top: ${top ? formatCard(top) : 'empty'})`,
        );
      }
      top = card;
    }
    super.put(cards);
  }

  /** Cards never leave a foundation. */
  override take(): never {
    throw new UnsupportedOperationError(
      `Cannot take cards from the ${this.suit} foundation`,
    );
  }

  override takeAll(): never {
    return this.take();
  }

  /** Nothing on a foundation can be moved. */
  movableCards(): Card[] {
    return [];
  }

  isComplete(): boolean {
    return this.size() === CARDS_PER_SUIT;
  }
}

function nextFits(suit: Suit, top: Card | undefined, candidate: Card): boolean {
  if (candidate.suit !== suit) return false;
  if (!top) return candidate.rank === 'A';
  return rankValue(candidate.rank) - rankValue(top.rank) === 1;
}

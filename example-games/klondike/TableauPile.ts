/**
 * A tableau pile: face-down cards under a run of face-up cards.
 *
 * Only the face-up (shown) cards take part in moves. Whenever a take
 * leaves the shown run empty, the top hidden card is turned face-up
 * before `take` returns, so between operations a non-empty pile always
 * shows at least one card.
 */

import type { Card } from '../../src/card-system/Card';
import { cardColor, rankValue } from '../../src/card-system/Card';
import { CardCollection } from '../../src/card-system/CardCollection';
import type { CardPile } from '../../src/rule-engine/PileRules';

/** Result of a tableau take. */
export interface TableauTakeResult {
  /** The removed cards, bottom to top. */
  readonly cards: Card[];
  /** The hidden card turned face-up by this take, if any. */
  readonly revealed: Card | undefined;
}

/** Read-only view of a tableau pile for presentation code. */
export interface ReadonlyTableauPile {
  /** Top face-up card, or `undefined` when the pile is empty. */
  peek(): Card | undefined;
  /** Face-up cards, bottom to top. */
  shownCards(): Card[];
  hiddenCount(): number;
  /** Hidden plus shown cards. */
  size(): number;
  isEmpty(): boolean;
  /** Every card, hidden ones first, bottom to top. */
  toArray(): Card[];
}

export class TableauPile implements CardPile, ReadonlyTableauPile {
  readonly kind = 'tableau';

  private readonly hidden: CardCollection;
  private readonly shown: CardCollection;

  constructor(hidden: readonly Card[] = [], shown: readonly Card[] = []) {
    this.hidden = new CardCollection(hidden);
    this.shown = new CardCollection(shown);
    this.reveal();
  }

  /**
   * Build a freshly dealt pile: the last card face-up, the rest
   * face-down.
   */
  static deal(cards: readonly Card[]): TableauPile {
    return new TableauPile(cards.slice(0, -1), cards.slice(-1));
  }

  /**
   * Remove the top `count` shown cards and report any card the take
   * revealed.
   *
   * @throws EmptyError if fewer than `count` cards are shown.
   */
  takeWithReveal(count: number = 1): TableauTakeResult {
    const cards = this.shown.take(count);
    return { cards, revealed: this.reveal() };
  }

  take(count: number = 1): Card[] {
    return this.takeWithReveal(count).cards;
  }

  /** Append to the shown run. Hidden cards are never a target. */
  put(incoming: Card | readonly Card[]): void {
    this.shown.put(incoming);
  }

  /**
   * Whether `candidate` may be laid on this pile: one rank below the
   * shown top and the opposite color, or a King on an empty pile.
   */
  verify(candidate: Card): boolean {
    const top = this.shown.peek();
    if (!top) {
      return candidate.rank === 'K';
    }
    return (
      rankValue(top.rank) - rankValue(candidate.rank) === 1 &&
      cardColor(candidate) !== cardColor(top)
    );
  }

  movableCards(): Card[] {
    return this.shown.toArray();
  }

  peek(): Card | undefined {
    return this.shown.peek();
  }

  /** Shown card at `index` (negative counts from the top). */
  at(index: number): Card | undefined {
    return this.shown.at(index);
  }

  shownCards(): Card[] {
    return this.shown.toArray();
  }

  hiddenCount(): number {
    return this.hidden.size();
  }

  size(): number {
    return this.hidden.size() + this.shown.size();
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  toArray(): Card[] {
    return [...this.hidden.toArray(), ...this.shown.toArray()];
  }

  /** Turn the top hidden card face-up if nothing is shown. */
  private reveal(): Card | undefined {
    if (!this.shown.isEmpty() || this.hidden.isEmpty()) {
      return undefined;
    }
    const [card] = this.hidden.take(1);
    this.shown.put(card);
    return card;
  }
}

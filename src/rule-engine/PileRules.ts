/**
 * The capability every pile kind exposes to the rule engine.
 *
 * A move is validated by asking the destination to `verify` the card
 * that would touch it, then carried out with `take` on the source and
 * `put` on the destination.
 */

import type { Card } from '../card-system/Card';
import type { ReadonlyCardCollection } from '../card-system/CardCollection';

export type PileKind = 'stock' | 'tableau' | 'foundation' | 'hand';

export interface CardPile extends ReadonlyCardCollection {
  readonly kind: PileKind;

  /** Whether `candidate` may become the new top of this pile. */
  verify(candidate: Card): boolean;

  /**
   * Cards a move may lift off this pile, bottom to top. For most piles
   * this is every card; a tableau only offers its face-up cards.
   */
  movableCards(): Card[];

  /** Remove and return the top `count` cards, bottom to top. */
  take(count: number): Card[];

  /** Append one card or a sequence, keeping its order. */
  put(incoming: Card | readonly Card[]): void;
}

/**
 * A resolved move endpoint. Integer addresses decode to one of these
 * before a move is checked.
 */
export type PileRef =
  | { readonly kind: 'stock' }
  | { readonly kind: 'tableau'; readonly index: number }
  | { readonly kind: 'foundation'; readonly index: number };

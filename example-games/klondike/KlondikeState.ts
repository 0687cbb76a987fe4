/**
 * Klondike layout constants and the plain layout type the game is
 * built from.
 */

import type { Card, Suit } from '../../src/card-system/Card';

// ── Constants ───────────────────────────────────────────────

/** Number of tableau piles. */
export const TABLEAU_COUNT = 7;

/** Number of foundation piles (one per suit). */
export const FOUNDATION_COUNT = 4;

/** Cards in a complete foundation (Ace through King). */
export const CARDS_PER_SUIT = 13;

/** Foundation suit order: foundation `i` collects FOUNDATION_SUITS[i]. */
export const FOUNDATION_SUITS: readonly Suit[] = [
  'spades',
  'hearts',
  'diamonds',
  'clubs',
] as const;

/** Integer address of the stock. */
export const STOCK_ADDRESS = -1;

/** Bit that marks an integer address as a foundation. */
export const FOUNDATION_FLAG = 0x10;

// ── Layout ──────────────────────────────────────────────────

/** Cards of one tableau pile, bottom to top. */
export interface TableauLayout {
  readonly hidden?: readonly Card[];
  readonly shown: readonly Card[];
}

/**
 * Position of every card on the board. Arrays run bottom to top.
 *
 * Produced by the deal, or written by hand to start a game from a
 * chosen position.
 */
export interface KlondikeLayout {
  readonly stock: readonly Card[];
  /** Exactly TABLEAU_COUNT piles. */
  readonly tableau: readonly TableauLayout[];
  /** Up to FOUNDATION_COUNT runs, in FOUNDATION_SUITS order. */
  readonly foundations?: ReadonlyArray<readonly Card[]>;
}

/**
 * Card types and factory functions for the Klondike engine.
 *
 * Defines Rank, Suit, and Card as the foundational data model
 * consumed by the piles and the rule engine.
 */

/** Standard playing card ranks. */
export type Rank =
  | 'A'
  | '2'
  | '3'
  | '4'
  | '5'
  | '6'
  | '7'
  | '8'
  | '9'
  | '10'
  | 'J'
  | 'Q'
  | 'K';

/** All ranks in order (Ace low). */
export const RANKS: readonly Rank[] = [
  'A',
  '2',
  '3',
  '4',
  '5',
  '6',
  '7',
  '8',
  '9',
  '10',
  'J',
  'Q',
  'K',
] as const;

/** Standard playing card suits. */
export type Suit = 'spades' | 'hearts' | 'diamonds' | 'clubs';

/** All suits, in foundation order. */
export const SUITS: readonly Suit[] = [
  'spades',
  'hearts',
  'diamonds',
  'clubs',
] as const;

export type CardColor = 'black' | 'red';

/**
 * A playing card. Immutable: there is exactly one physical card per
 * rank/suit pair, so two cards with the same rank and suit are the
 * same card.
 */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

/**
 * Create a single card. The returned object is frozen.
 */
export function createCard(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}

/**
 * Numeric value of a rank (A=1, K=13).
 */
export function rankValue(rank: Rank): number {
  return RANKS.indexOf(rank) + 1;
}

export function cardColor(card: Card): CardColor {
  return card.suit === 'spades' || card.suit === 'clubs' ? 'black' : 'red';
}

/** Whether two cards are the same physical card. */
export function isSameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

const SUIT_SYMBOLS: Record<Suit, string> = {
  spades: '♠',
  hearts: '♥',
  diamonds: '♦',
  clubs: '♣',
};

/**
 * Short human-readable label, e.g. `Q♥` or `10♣`.
 */
export function formatCard(card: Card): string {
  return `${card.rank}${SUIT_SYMBOLS[card.suit]}`;
}

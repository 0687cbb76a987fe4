/**
 * Fixture builders for Klondike tests.
 */

import type { Card, Rank, Suit } from '../../src/card-system/Card';
import { RANKS, createCard, isSameCard } from '../../src/card-system/Card';
import { createStandardDeck } from '../../src/card-system/Deck';
import type {
  KlondikeLayout,
  TableauLayout,
} from '../../example-games/klondike/KlondikeState';
import { TABLEAU_COUNT } from '../../example-games/klondike/KlondikeState';

export function card(rank: Rank, suit: Suit): Card {
  return createCard(rank, suit);
}

/** Ace up to `through` of one suit. */
export function run(suit: Suit, through: Rank = 'K'): Card[] {
  return RANKS.slice(0, RANKS.indexOf(through) + 1).map((r) => card(r, suit));
}

export interface PartialLayout {
  /** Cards placed on top of the stock, last one on top. */
  stockTop?: Card[];
  /** Tableau piles by index; missing piles are empty. */
  tableau?: Partial<Record<number, TableauLayout>>;
  foundations?: Card[][];
}

/**
 * Complete a partial layout into a legal 52-card one. Cards not
 * mentioned go to the bottom of the stock in standard deck order.
 */
export function layoutWith(partial: PartialLayout): KlondikeLayout {
  const tableau: TableauLayout[] = [];
  for (let i = 0; i < TABLEAU_COUNT; i++) {
    tableau.push(partial.tableau?.[i] ?? { shown: [] });
  }
  const foundations = partial.foundations ?? [];
  const used: Card[] = [
    ...(partial.stockTop ?? []),
    ...tableau.flatMap((p) => [...(p.hidden ?? []), ...p.shown]),
    ...foundations.flat(),
  ];
  const rest = createStandardDeck().filter(
    (c) => !used.some((u) => isSameCard(u, c)),
  );
  return {
    stock: [...rest, ...(partial.stockTop ?? [])],
    tableau,
    foundations,
  };
}

/**
 * Deterministic Fisher-Yates shuffle of a standard deck.
 */
export function shuffledDeck(seed: number): Card[] {
  let s = seed;
  const rng = () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
  const deck = createStandardDeck();
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [deck[i], deck[j]] = [deck[j], deck[i]];
  }
  return deck;
}

/** `rank-suit` keys, for duplicate checks. */
export function cardKeys(cards: readonly Card[]): string[] {
  return cards.map((c) => `${c.rank}-${c.suit}`);
}

/**
 * Deck construction for the Klondike engine.
 *
 * A deck is represented as a plain Card array, last element on top.
 * Shuffling is left to the caller: the engine deals whatever order
 * it is given.
 */

import type { Card } from './Card';
import { RANKS, SUITS, createCard, formatCard } from './Card';
import { InvalidCardError } from './errors';

/** Cards in a standard deck (no jokers). */
export const DECK_SIZE = 52;

/**
 * Create a standard 52-card deck (no jokers).
 *
 * Cards are ordered by suit (SUITS order) then rank (A through K).
 */
export function createStandardDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/**
 * Throw InvalidCardError unless `cards` holds each of the 52 cards
 * exactly once.
 */
export function assertFullDeck(cards: readonly Card[]): void {
  if (cards.length !== DECK_SIZE) {
    throw new InvalidCardError(
      `Expected a ${DECK_SIZE}-card deck, got ${cards.length} cards`,
    );
  }
  const seen = new Set<string>();
  for (const card of cards) {
    const key = formatCard(card);
    if (seen.has(key)) {
      throw new InvalidCardError(`Duplicate card in deck: ${key}`);
    }
    seen.add(key);
  }
}

/**
 * Klondike deal.
 *
 * Pure functions over card arrays; the game turns the resulting
 * layout into piles.
 *
 * Classic Klondike deal:
 * - 52-card deck, no jokers, dealt in the order given (the caller
 *   shuffles).
 * - Tableau pile `i` (0-6) receives `i + 1` cards, drawn one at a time
 *   from the top of the stock. The last card drawn is face-up.
 * - The remaining 24 cards stay in the stock.
 * - Foundations start empty.
 */

import type { Card } from '../../src/card-system/Card';
import { CardCollection } from '../../src/card-system/CardCollection';
import { assertFullDeck } from '../../src/card-system/Deck';
import type { KlondikeLayout, TableauLayout } from './KlondikeState';
import { TABLEAU_COUNT } from './KlondikeState';

/**
 * Deal `deck` (last element on top) into the opening layout.
 *
 * @throws InvalidCardError unless `deck` is a full 52-card deck.
 */
export function dealLayout(deck: readonly Card[]): KlondikeLayout {
  assertFullDeck(deck);

  const stock = new CardCollection(deck);
  const tableau: TableauLayout[] = [];
  for (let pile = 0; pile < TABLEAU_COUNT; pile++) {
    const dealt: Card[] = [];
    for (let n = 0; n <= pile; n++) {
      dealt.push(...stock.take(1));
    }
    tableau.push({ hidden: dealt.slice(0, -1), shown: dealt.slice(-1) });
  }

  return { stock: stock.toArray(), tableau, foundations: [] };
}

/** Every card in a layout: stock, then tableaus, then foundations. */
export function layoutCards(layout: KlondikeLayout): Card[] {
  const cards: Card[] = [...layout.stock];
  for (const pile of layout.tableau) {
    cards.push(...(pile.hidden ?? []), ...pile.shown);
  }
  for (const run of layout.foundations ?? []) {
    cards.push(...run);
  }
  return cards;
}

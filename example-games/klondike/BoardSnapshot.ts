/**
 * Plain-data view of a Klondike board for presentation layers and
 * debug logs. Hidden tableau cards appear only as a count.
 */

import type { Card, Suit } from '../../src/card-system/Card';
import { formatCard } from '../../src/card-system/Card';
import type { CardSnapshot } from '../../src/core-engine/CardSnapshot';
import { snapshotCard } from '../../src/core-engine/CardSnapshot';
import { FOUNDATION_COUNT, TABLEAU_COUNT } from './KlondikeState';
import type { ReadonlyTableauPile } from './TableauPile';
import type { ReadonlyFoundation } from './SuitDeck';

export interface TableauSnapshot {
  hiddenCount: number;
  shown: CardSnapshot[];
}

export interface FoundationSnapshot {
  suit: Suit;
  cards: CardSnapshot[];
}

export interface BoardSnapshot {
  /** Bottom to top; only the top card is face-up. */
  stock: CardSnapshot[];
  tableau: TableauSnapshot[];
  foundations: FoundationSnapshot[];
  finished: boolean;
}

/** The accessors a snapshot reads. KlondikeGame provides them. */
export interface BoardView {
  stockCards(): Card[];
  tableau(index: number): ReadonlyTableauPile;
  foundation(index: number): ReadonlyFoundation;
  isFinished(): boolean;
}

export function snapshotBoard(view: BoardView): BoardSnapshot {
  const stock = view.stockCards();
  const tableau: TableauSnapshot[] = [];
  for (let i = 0; i < TABLEAU_COUNT; i++) {
    const pile = view.tableau(i);
    tableau.push({
      hiddenCount: pile.hiddenCount(),
      shown: pile.shownCards().map((c) => snapshotCard(c)),
    });
  }
  const foundations: FoundationSnapshot[] = [];
  for (let i = 0; i < FOUNDATION_COUNT; i++) {
    const foundation = view.foundation(i);
    foundations.push({
      suit: foundation.suit,
      cards: foundation.toArray().map((c) => snapshotCard(c)),
    });
  }

  return {
    stock: stock.map((c, i) => snapshotCard(c, i === stock.length - 1)),
    tableau,
    foundations,
    finished: view.isFinished(),
  };
}

function formatRun(cards: readonly CardSnapshot[]): string {
  return `[${cards.map(formatCard).join(', ')}]`;
}

/**
 * Multi-line text form of a snapshot, one line per pile:
 *
 * ```text
 * stock: 24 cards, top J♥
 * tableau 0: 0 hidden, [K♣]
 * foundation 0 (spades): []
 * ```
 */
export function describeBoard(board: BoardSnapshot): string {
  const top = board.stock[board.stock.length - 1];
  const lines = [
    `stock: ${board.stock.length} cards` + (top ? `, top ${formatCard(top)}` : ''),
  ];
  board.tableau.forEach((pile, i) => {
    lines.push(`tableau ${i}: ${pile.hiddenCount} hidden, ${formatRun(pile.shown)}`);
  });
  board.foundations.forEach((foundation, i) => {
    lines.push(`foundation ${i} (${foundation.suit}): ${formatRun(foundation.cards)}`);
  });
  return lines.join('\n');
}

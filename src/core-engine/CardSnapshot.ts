/**
 * Serializable card snapshots shared by event payloads and board
 * snapshots.
 */

import type { Card, Rank, Suit } from '../card-system/Card';

/**
 * Plain card data (no methods), safe to hand to presentation code
 * or to log.
 */
export interface CardSnapshot {
  rank: Rank;
  suit: Suit;
  faceUp: boolean;
}

/**
 * Create a serializable snapshot of a card. Cards are face-up unless
 * the caller knows otherwise.
 */
export function snapshotCard(card: Card, faceUp: boolean = true): CardSnapshot {
  return {
    rank: card.rank,
    suit: card.suit,
    faceUp,
  };
}

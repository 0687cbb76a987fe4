/**
 * The stock and the hand buffer: plain collections that never accept
 * a card through a move.
 */

import type { Card } from '../../src/card-system/Card';
import { CardCollection } from '../../src/card-system/CardCollection';
import type { CardPile } from '../../src/rule-engine/PileRules';

/** The undealt draw pile. Drawn from one card at a time. */
export class StockDeck extends CardCollection implements CardPile {
  readonly kind = 'stock';

  verify(): boolean {
    return false;
  }

  movableCards(): Card[] {
    return this.toArray();
  }
}

/**
 * Transit buffer used inside a single move. Empty before and after
 * every move request.
 */
export class HandDeck extends CardCollection implements CardPile {
  readonly kind = 'hand';

  verify(): boolean {
    return false;
  }

  movableCards(): Card[] {
    return this.toArray();
  }
}

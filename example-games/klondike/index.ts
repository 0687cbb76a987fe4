/**
 * Klondike solitaire rule engine.
 */

export { KlondikeGame } from './KlondikeGame';
export type { KlondikeGameOptions } from './KlondikeGame';

export {
  TABLEAU_COUNT,
  FOUNDATION_COUNT,
  CARDS_PER_SUIT,
  FOUNDATION_SUITS,
  STOCK_ADDRESS,
  FOUNDATION_FLAG,
} from './KlondikeState';
export type { KlondikeLayout, TableauLayout } from './KlondikeState';

export { dealLayout, layoutCards } from './KlondikeRules';

export {
  STOCK,
  tableauRef,
  foundationRef,
  decodePileAddress,
  encodePileRef,
  isValidPileRef,
  resolvePileAddress,
  isSamePile,
  formatPileRef,
} from './PileAddress';
export type { PileAddress, PileRef } from './PileAddress';

export { TableauPile } from './TableauPile';
export type { ReadonlyTableauPile, TableauTakeResult } from './TableauPile';
export { SuitDeck } from './SuitDeck';
export type { ReadonlyFoundation } from './SuitDeck';
export { StockDeck, HandDeck } from './StockDeck';

export { snapshotBoard, describeBoard } from './BoardSnapshot';
export type {
  BoardSnapshot,
  BoardView,
  TableauSnapshot,
  FoundationSnapshot,
} from './BoardSnapshot';

/**
 * Card System Module
 *
 * Cards, deck construction, and the ordered CardCollection that
 * every pile in the engine is built on.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types and helpers
export type { Card, CardColor, Rank, Suit } from './Card';
export {
  RANKS,
  SUITS,
  createCard,
  rankValue,
  cardColor,
  isSameCard,
  formatCard,
} from './Card';

// Deck construction
export {
  DECK_SIZE,
  createStandardDeck,
  assertFullDeck,
} from './Deck';

// Collections
export type { ReadonlyCardCollection } from './CardCollection';
export { CardCollection, isCardList } from './CardCollection';

// Errors
export {
  EmptyError,
  InvalidCardError,
  UnsupportedOperationError,
} from './errors';

/**
 * Move rejection errors.
 */

/**
 * Why a move request was rejected. Callers branch on this instead of
 * parsing messages.
 */
export type MoveRejection =
  | 'same-pile'
  | 'stock-destination'
  | 'foundation-source'
  | 'unknown-pile'
  | 'stock-count'
  | 'bad-count'
  | 'foundation-count'
  | 'invalid-move';

/**
 * A move request broke the game rules. Recoverable: no pile was
 * touched, so the caller can reject the move and ask again.
 */
export class IllegalMoveError extends Error {
  constructor(
    readonly reason: MoveRejection,
    message: string,
  ) {
    super(message);
    this.name = 'IllegalMoveError';
  }
}

/**
 * Error types raised by card collections.
 *
 * These signal programming errors (a caller asked a collection for
 * something it cannot give), not rejected player moves. Rejected moves
 * use IllegalMoveError from the rule engine.
 */

/** A take asked for more cards than the collection holds. */
export class EmptyError extends Error {
  constructor(
    readonly requested: number,
    readonly available: number,
  ) {
    super(
      `Cannot take ${requested} card(s) from a collection of ${available}`,
    );
    this.name = 'EmptyError';
  }
}

/** A card broke a pile's write-path invariant. Fatal in correct code. */
export class InvalidCardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCardError';
  }
}

export class UnsupportedOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}

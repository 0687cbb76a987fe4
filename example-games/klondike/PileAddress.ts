/**
 * Pile addressing for Klondike moves.
 *
 * A move endpoint is either a PileRef or its integer encoding:
 *
 * | address  | pile                        |
 * |----------|-----------------------------|
 * | -1       | stock (source only)         |
 * | 0..6     | tableau `address`           |
 * | 16..19   | foundation `address - 16`   |
 *
 * Integer addresses are decoded once, at the edge of a move request.
 */

import { IllegalMoveError } from '../../src/rule-engine/errors';
import type { PileRef } from '../../src/rule-engine/PileRules';
import {
  FOUNDATION_COUNT,
  FOUNDATION_FLAG,
  FOUNDATION_SUITS,
  STOCK_ADDRESS,
  TABLEAU_COUNT,
} from './KlondikeState';

export type { PileRef };

/** Anything `place` accepts as an endpoint. */
export type PileAddress = number | PileRef;

export const STOCK: PileRef = { kind: 'stock' };

export function tableauRef(index: number): PileRef {
  return { kind: 'tableau', index };
}

export function foundationRef(index: number): PileRef {
  return { kind: 'foundation', index };
}

/**
 * Decode an integer address, or return `undefined` if it names no pile.
 */
export function decodePileAddress(address: number): PileRef | undefined {
  if (address === STOCK_ADDRESS) return STOCK;
  if (!Number.isInteger(address) || address < 0) return undefined;

  if (address >= FOUNDATION_FLAG) {
    return address < FOUNDATION_FLAG + FOUNDATION_COUNT
      ? foundationRef(address - FOUNDATION_FLAG)
      : undefined;
  }
  return address < TABLEAU_COUNT ? tableauRef(address) : undefined;
}

export function encodePileRef(ref: PileRef): number {
  switch (ref.kind) {
    case 'stock':
      return STOCK_ADDRESS;
    case 'tableau':
      return ref.index;
    case 'foundation':
      return FOUNDATION_FLAG | ref.index;
  }
}

/** Whether a ref's index is inside the board. */
export function isValidPileRef(ref: PileRef): boolean {
  switch (ref.kind) {
    case 'stock':
      return true;
    case 'tableau':
      return Number.isInteger(ref.index) && ref.index >= 0 && ref.index < TABLEAU_COUNT;
    case 'foundation':
      return (
        Number.isInteger(ref.index) && ref.index >= 0 && ref.index < FOUNDATION_COUNT
      );
  }
}

/**
 * Turn a move endpoint into a PileRef.
 *
 * @throws IllegalMoveError (`unknown-pile`) if it names no pile.
 */
export function resolvePileAddress(address: PileAddress): PileRef {
  const ref =
    typeof address === 'number' ? decodePileAddress(address) : address;
  if (!ref || !isValidPileRef(ref)) {
    throw new IllegalMoveError(
      'unknown-pile',
      `No pile at address ${formatPileAddress(address)}`,
    );
  }
  return ref;
}

export function isSamePile(a: PileRef, b: PileRef): boolean {
  return encodePileRef(a) === encodePileRef(b);
}

/** Label used in logs and error messages, e.g. `foundation 1 (hearts)`. */
export function formatPileRef(ref: PileRef): string {
  switch (ref.kind) {
    case 'stock':
      return 'stock';
    case 'tableau':
      return `tableau ${ref.index}`;
    case 'foundation':
      return `foundation ${ref.index} (${FOUNDATION_SUITS[ref.index] ?? '?'})`;
  }
}

function formatPileAddress(address: PileAddress): string {
  return typeof address === 'number' ? String(address) : formatPileRef(address);
}

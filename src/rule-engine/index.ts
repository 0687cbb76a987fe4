/**
 * Rule Engine Module
 *
 * The pile capability contract and the error raised when a move
 * request breaks the rules.
 */
export const RULE_ENGINE_VERSION = '0.1.0';

export type { CardPile, PileKind, PileRef } from './PileRules';

export type { MoveRejection } from './errors';
export { IllegalMoveError } from './errors';

/**
 * Core Engine Module
 *
 * Cross-cutting services for games built on the engine: the typed
 * event emitter, card snapshots, and tagged logging.
 */
export const ENGINE_VERSION = '0.1.0';

// Game event system
export type {
  CardsMovedPayload,
  CardRevealedPayload,
  MoveRejectedPayload,
  GameEndedPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';

// Card snapshots
export type { CardSnapshot } from './CardSnapshot';
export { snapshotCard } from './CardSnapshot';

// Logging
export type { GameLogger } from './GameLogger';
export { createTaggedLogger } from './GameLogger';

/**
 * Typed Event Emitter for the Klondike engine.
 *
 * Provides a type-safe, zero-dependency event emitter for move
 * lifecycle events. Works in Node.js and browsers alike.
 *
 * The game emits these events after each move request has been
 * resolved. Presentation layers, loggers and tests subscribe to them
 * instead of polling the board.
 */

import type { MoveRejection } from '../rule-engine/errors';
import type { PileRef } from '../rule-engine/PileRules';
import type { CardSnapshot } from './CardSnapshot';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted after a move has been carried out.
 */
export interface CardsMovedPayload {
  /** 1-based count of successful moves so far, this one included. */
  readonly moveNumber: number;
  /** Number of cards moved. */
  readonly count: number;
  readonly from: PileRef;
  readonly to: PileRef;
  /** The moved cards, bottom to top. */
  readonly cards: readonly CardSnapshot[];
}

/**
 * Emitted when taking cards off a tableau pile turned its top hidden
 * card face-up.
 */
export interface CardRevealedPayload {
  readonly tableauIndex: number;
  readonly card: CardSnapshot;
}

/**
 * Emitted when a move request was rejected. No pile changed.
 */
export interface MoveRejectedPayload {
  readonly count: number;
  /** The endpoints as the caller gave them. */
  readonly from: PileRef | number;
  readonly to: PileRef | number;
  readonly reason: MoveRejection;
  readonly message: string;
}

/**
 * Emitted once, when the last card reaches the foundations.
 */
export interface GameEndedPayload {
  /** The move that finished the game. */
  readonly moveNumber: number;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'cards-moved': CardsMovedPayload;
  'card-revealed': CardRevealedPayload;
  'move-rejected': MoveRejectedPayload;
  'game-ended': GameEndedPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for game lifecycle events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('cards-moved', (payload) => {
 *   console.log(`Move ${payload.moveNumber}: ${payload.count} card(s)`);
 * });
 * ```
 */
export class GameEventEmitter {
  private listeners: {
    [K in GameEventName]?: Array<GameEventListener<K>>;
  } = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    let list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list) {
      list = [];
      (this.listeners as Record<string, unknown>)[event] = list;
    }
    list.push(listener);

    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const wrapper: GameEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list) return;

    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list || list.length === 0) return;

    // Listeners may unsubscribe while we iterate
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: GameEventName): void {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  /**
   * Return the number of listeners for a given event.
   */
  listenerCount(event: GameEventName): number {
    const list = this.listeners[event];
    return list ? list.length : 0;
  }
}

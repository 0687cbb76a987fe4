import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  GameEventEmitter,
  type CardsMovedPayload,
  type CardRevealedPayload,
  type MoveRejectedPayload,
  type GameEndedPayload,
} from '../../src/core-engine/GameEventEmitter';

const moved: CardsMovedPayload = {
  moveNumber: 1,
  count: 1,
  from: { kind: 'stock' },
  to: { kind: 'tableau', index: 0 },
  cards: [{ rank: 'K', suit: 'spades', faceUp: true }],
};

describe('GameEventEmitter', () => {
  let emitter: GameEventEmitter;

  beforeEach(() => {
    emitter = new GameEventEmitter();
  });

  // ── Basic emission & subscription ─────────────────────

  describe('on / emit', () => {
    it('should call listener when event is emitted', () => {
      const listener = vi.fn();
      emitter.on('cards-moved', listener);

      emitter.emit('cards-moved', moved);

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith(moved);
    });

    it('should call listeners in registration order', () => {
      const order: string[] = [];
      emitter.on('game-ended', () => order.push('first'));
      emitter.on('game-ended', () => order.push('second'));

      emitter.emit('game-ended', { moveNumber: 3 });

      expect(order).toEqual(['first', 'second']);
    });

    it('should not call listeners for different events', () => {
      const listener = vi.fn();
      emitter.on('card-revealed', listener);

      emitter.emit('cards-moved', moved);

      expect(listener).not.toHaveBeenCalled();
    });

    it('should not throw when emitting with no listeners', () => {
      expect(() => emitter.emit('game-ended', { moveNumber: 0 })).not.toThrow();
    });
  });

  describe('event types', () => {
    it('should emit card-revealed events', () => {
      const listener = vi.fn();
      emitter.on('card-revealed', listener);
      const payload: CardRevealedPayload = {
        tableauIndex: 2,
        card: { rank: '9', suit: 'clubs', faceUp: true },
      };
      emitter.emit('card-revealed', payload);
      expect(listener).toHaveBeenCalledWith(payload);
    });

    it('should emit move-rejected events with integer endpoints', () => {
      const listener = vi.fn();
      emitter.on('move-rejected', listener);
      const payload: MoveRejectedPayload = {
        count: 1,
        from: 3,
        to: -1,
        reason: 'stock-destination',
        message: 'Cannot place cards onto the stock',
      };
      emitter.emit('move-rejected', payload);
      expect(listener).toHaveBeenCalledWith(payload);
    });

    it('should emit game-ended events', () => {
      const listener = vi.fn();
      emitter.on('game-ended', listener);
      const payload: GameEndedPayload = { moveNumber: 52 };
      emitter.emit('game-ended', payload);
      expect(listener).toHaveBeenCalledWith(payload);
    });
  });

  describe('off', () => {
    it('should remove a specific listener', () => {
      const listener = vi.fn();
      emitter.on('cards-moved', listener);
      emitter.off('cards-moved', listener);
      emitter.emit('cards-moved', moved);
      expect(listener).not.toHaveBeenCalled();
    });

    it('should not affect other listeners when removing one', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('cards-moved', a);
      emitter.on('cards-moved', b);
      emitter.off('cards-moved', a);
      emitter.emit('cards-moved', moved);
      expect(a).not.toHaveBeenCalled();
      expect(b).toHaveBeenCalledOnce();
    });

    it('should be safe to call off on an event with no listeners', () => {
      expect(() => emitter.off('game-ended', vi.fn())).not.toThrow();
    });

    it('should unsubscribe through the returned function', () => {
      const listener = vi.fn();
      const unsubscribe = emitter.on('cards-moved', listener);
      unsubscribe();
      emitter.emit('cards-moved', moved);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('once', () => {
    it('should fire only for the first emission', () => {
      const listener = vi.fn();
      emitter.once('game-ended', listener);
      emitter.emit('game-ended', { moveNumber: 1 });
      emitter.emit('game-ended', { moveNumber: 2 });
      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith({ moveNumber: 1 });
      expect(emitter.listenerCount('game-ended')).toBe(0);
    });

    it('should be cancellable before it fires', () => {
      const listener = vi.fn();
      const cancel = emitter.once('game-ended', listener);
      cancel();
      emitter.emit('game-ended', { moveNumber: 1 });
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('removeAllListeners / listenerCount', () => {
    it('should count listeners per event', () => {
      emitter.on('cards-moved', vi.fn());
      emitter.on('cards-moved', vi.fn());
      emitter.on('game-ended', vi.fn());
      expect(emitter.listenerCount('cards-moved')).toBe(2);
      expect(emitter.listenerCount('game-ended')).toBe(1);
      expect(emitter.listenerCount('card-revealed')).toBe(0);
    });

    it('should remove listeners for one event only', () => {
      emitter.on('cards-moved', vi.fn());
      emitter.on('game-ended', vi.fn());
      emitter.removeAllListeners('cards-moved');
      expect(emitter.listenerCount('cards-moved')).toBe(0);
      expect(emitter.listenerCount('game-ended')).toBe(1);
    });

    it('should remove every listener', () => {
      emitter.on('cards-moved', vi.fn());
      emitter.on('game-ended', vi.fn());
      emitter.removeAllListeners();
      expect(emitter.listenerCount('cards-moved')).toBe(0);
      expect(emitter.listenerCount('game-ended')).toBe(0);
    });
  });

  it('should let a listener unsubscribe during emission', () => {
    const second = vi.fn();
    const unsubscribe = emitter.on('cards-moved', () => unsubscribe());
    emitter.on('cards-moved', second);
    emitter.emit('cards-moved', moved);
    expect(second).toHaveBeenCalledOnce();
    expect(emitter.listenerCount('cards-moved')).toBe(1);
  });
});

/**
 * Klondike game: owns every pile and carries out move requests.
 *
 * A move is one synchronous transaction. It is fully validated before
 * any card leaves its pile, so a rejected request leaves the board
 * untouched; an accepted one travels source → hand → destination and
 * leaves the hand empty again.
 */

import type { Card } from '../../src/card-system/Card';
import { formatCard } from '../../src/card-system/Card';
import { assertFullDeck, createStandardDeck } from '../../src/card-system/Deck';
import { snapshotCard } from '../../src/core-engine/CardSnapshot';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { GameLogger } from '../../src/core-engine/GameLogger';
import { createTaggedLogger } from '../../src/core-engine/GameLogger';
import { IllegalMoveError } from '../../src/rule-engine/errors';
import type { CardPile, PileRef } from '../../src/rule-engine/PileRules';
import type { BoardSnapshot, BoardView } from './BoardSnapshot';
import { describeBoard, snapshotBoard } from './BoardSnapshot';
import { dealLayout, layoutCards } from './KlondikeRules';
import type { KlondikeLayout } from './KlondikeState';
import {
  FOUNDATION_COUNT,
  FOUNDATION_SUITS,
  TABLEAU_COUNT,
} from './KlondikeState';
import type { PileAddress } from './PileAddress';
import { formatPileRef, isSamePile, resolvePileAddress } from './PileAddress';
import { HandDeck, StockDeck } from './StockDeck';
import type { ReadonlyFoundation } from './SuitDeck';
import { SuitDeck } from './SuitDeck';
import type { ReadonlyTableauPile } from './TableauPile';
import { TableauPile } from './TableauPile';

export interface KlondikeGameOptions {
  /**
   * Pre-shuffled 52-card deck, last element on top. Defaults to
   * createStandardDeck() order.
   */
  deck?: readonly Card[];
  /**
   * Start from this position instead of dealing. Cannot be combined
   * with `deck`.
   */
  layout?: KlondikeLayout;
  /** Where log lines go. Default: the global console. */
  logger?: GameLogger;
  /** Log the board after the deal and after every move. Default: false. */
  debug?: boolean;
  /** Emitter to publish game events on. Default: a new emitter. */
  events?: GameEventEmitter;
}

export class KlondikeGame implements BoardView {
  readonly events: GameEventEmitter;

  private readonly log: GameLogger;
  private readonly stock: StockDeck;
  private readonly tableaus: TableauPile[];
  private readonly foundations: SuitDeck[];
  private readonly hand = new HandDeck();
  private moves = 0;
  private ended = false;

  constructor(options: KlondikeGameOptions = {}) {
    if (options.deck && options.layout) {
      throw new Error('Pass either a deck or a layout, not both');
    }
    this.events = options.events ?? new GameEventEmitter();
    this.log = createTaggedLogger(
      'KlondikeGame',
      options.logger,
      options.debug ?? false,
    );

    const layout = options.layout ?? dealLayout(options.deck ?? createStandardDeck());
    if (layout.tableau.length !== TABLEAU_COUNT) {
      throw new Error(
        `Expected ${TABLEAU_COUNT} tableau piles, got ${layout.tableau.length}`,
      );
    }
    const runs = layout.foundations ?? [];
    if (runs.length > FOUNDATION_COUNT) {
      throw new Error(
        `Expected at most ${FOUNDATION_COUNT} foundations, got ${runs.length}`,
      );
    }
    assertFullDeck(layoutCards(layout));

    this.stock = new StockDeck(layout.stock);
    this.tableaus = layout.tableau.map(
      (pile) => new TableauPile(pile.hidden ?? [], pile.shown),
    );
    this.foundations = FOUNDATION_SUITS.map(
      (suit, i) => new SuitDeck(suit, runs[i] ?? []),
    );
    this.ended = this.isFinished();

    this.log.debug(`board ready\n${describeBoard(this.snapshot())}`);
  }

  /**
   * Start a game from a chosen position.
   */
  static fromLayout(
    layout: KlondikeLayout,
    options: Omit<KlondikeGameOptions, 'deck' | 'layout'> = {},
  ): KlondikeGame {
    return new KlondikeGame({ ...options, layout });
  }

  // ── Moves ─────────────────────────────────────────────────

  /**
   * Move the top `count` cards of `source` onto `dest`.
   *
   * Endpoints are PileRefs or integer addresses (-1 stock, 0-6
   * tableau, 16-19 foundation). The card checked against `dest` is the
   * bottom card of the moved run, the one that will touch it.
   *
   * @returns This game, for chaining.
   * @throws IllegalMoveError if the move breaks the rules. The board is
   *         unchanged.
   */
  place(count: number, source: PileAddress, dest: PileAddress): this {
    try {
      this.move(count, source, dest);
    } catch (err) {
      if (err instanceof IllegalMoveError) {
        this.log.debug(`rejected move: ${err.message}`);
        this.events.emit('move-rejected', {
          count,
          from: source,
          to: dest,
          reason: err.reason,
          message: err.message,
        });
      }
      throw err;
    }
    return this;
  }

  private move(count: number, source: PileAddress, dest: PileAddress): void {
    const from = resolvePileAddress(source);
    const to = resolvePileAddress(dest);

    if (isSamePile(from, to)) {
      throw new IllegalMoveError(
        'same-pile',
        `Cannot move cards from ${formatPileRef(from)} onto itself`,
      );
    }
    if (to.kind === 'stock') {
      throw new IllegalMoveError('stock-destination', 'Cannot place cards onto the stock');
    }
    if (from.kind === 'foundation') {
      throw new IllegalMoveError(
        'foundation-source',
        `Cannot take cards from ${formatPileRef(from)}`,
      );
    }
    if (from.kind === 'stock' && count !== 1) {
      throw new IllegalMoveError(
        'stock-count',
        'Can only take 1 card at a time from the stock',
      );
    }
    if (to.kind === 'foundation' && count !== 1) {
      throw new IllegalMoveError(
        'foundation-count',
        'Can only place 1 card at a time onto a foundation',
      );
    }

    const sourcePile = this.pileAt(from);
    const destPile = this.pileAt(to);
    const movable = sourcePile.movableCards();
    if (!Number.isInteger(count) || count < 1 || count > movable.length) {
      throw new IllegalMoveError(
        'bad-count',
        `Cannot move ${count} card(s) from ${formatPileRef(from)}: ` +
          `${movable.length} available`,
      );
    }

    const candidate = movable[movable.length - count];
    if (!destPile.verify(candidate)) {
      const top = destPile.peek();
      throw new IllegalMoveError(
        'invalid-move',
        `invalid move: ${formatCard(candidate)} onto ${formatPileRef(to)} ` +
          `(top: ${top ? formatCard(top) : 'empty'})`,
      );
    }

    const { cards, revealed } = this.takeFrom(from, count);
    this.hand.put(cards);
    destPile.put(this.hand.takeAll());
    this.moves++;
    const won = !this.ended && this.isFinished();
    if (won) this.ended = true;

    this.log.debug(
      `move ${this.moves}: ${cards.map(formatCard).join(' ')} ` +
        `${formatPileRef(from)} -> ${formatPileRef(to)}\n` +
        describeBoard(this.snapshot()),
    );
    // game-ended fires even if an earlier listener throws.
    try {
      this.events.emit('cards-moved', {
        moveNumber: this.moves,
        count,
        from,
        to,
        cards: cards.map((c) => snapshotCard(c)),
      });
      if (revealed && from.kind === 'tableau') {
        this.events.emit('card-revealed', {
          tableauIndex: from.index,
          card: snapshotCard(revealed),
        });
      }
    } finally {
      if (won) {
        this.log.info(`game finished after ${this.moves} moves`);
        this.events.emit('game-ended', { moveNumber: this.moves });
      }
    }
  }

  private takeFrom(
    ref: PileRef,
    count: number,
  ): { cards: Card[]; revealed: Card | undefined } {
    if (ref.kind === 'tableau') {
      return this.tableaus[ref.index].takeWithReveal(count);
    }
    return { cards: this.pileAt(ref).take(count), revealed: undefined };
  }

  private pileAt(ref: PileRef): CardPile {
    switch (ref.kind) {
      case 'stock':
        return this.stock;
      case 'tableau':
        return this.tableaus[ref.index];
      case 'foundation':
        return this.foundations[ref.index];
    }
  }

  // ── State ─────────────────────────────────────────────────

  /** Whether every foundation holds Ace through King. */
  isFinished(): boolean {
    return this.foundations.every((f) => f.isComplete());
  }

  /** Number of successful moves so far. */
  get moveCount(): number {
    return this.moves;
  }

  // ── Read accessors ────────────────────────────────────────

  peekStock(): Card | undefined {
    return this.stock.peek();
  }

  /** Stock cards, bottom to top. */
  stockCards(): Card[] {
    return this.stock.toArray();
  }

  tableau(index: number): ReadonlyTableauPile {
    return this.tableaus[checkIndex(index, TABLEAU_COUNT, 'tableau')];
  }

  foundation(index: number): ReadonlyFoundation {
    return this.foundations[checkIndex(index, FOUNDATION_COUNT, 'foundation')];
  }

  /** Cards in the hand buffer. Zero between moves. */
  handSize(): number {
    return this.hand.size();
  }

  /** Every card the game holds, in any container. */
  allCards(): Card[] {
    const cards = [...this.stock.toArray(), ...this.hand.toArray()];
    for (const pile of this.tableaus) cards.push(...pile.toArray());
    for (const foundation of this.foundations) cards.push(...foundation.toArray());
    return cards;
  }

  snapshot(): BoardSnapshot {
    return snapshotBoard(this);
  }
}

function checkIndex(index: number, count: number, label: string): number {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new RangeError(`No ${label} pile at index ${index}`);
  }
  return index;
}

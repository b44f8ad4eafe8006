import type { GameSnapshot } from '@memory-match/shared';
import {
  DEFAULT_RULES,
  completeGame,
  concealPair,
  createGame,
  resolvePair,
  revealCard,
  tickClock
} from './engine.js';
import { silentLogger, type GameLogger } from './logger.js';
import { timerScheduler, type CancelTask, type Scheduler } from './scheduler.js';
import { toSnapshot } from './serializers.js';
import type { CardRef, FlipOutcome, GameRules, GameState, RandomSource } from './types.js';

export type SessionListener = () => void;

export interface SessionOptions {
  scheduler?: Scheduler;
  random?: RandomSource;
  rules?: GameRules;
  logger?: GameLogger;
}

/**
 * Owns one player's game: the current round's state, the elapsed-time clock,
 * the pending mismatch reconciliation and the observers notified after every
 * mutation. All mutation goes through `flip` and `reset`.
 */
export class MemoryMatchSession {
  private readonly listeners = new Set<SessionListener>();
  private readonly scheduler: Scheduler;
  private readonly random: RandomSource;
  private readonly rules: GameRules;
  private readonly logger: GameLogger;
  private game: GameState;
  private snapshot: GameSnapshot | null = null;
  private stopClock: CancelTask | null = null;
  private cancelConceal: CancelTask | null = null;

  constructor(options: SessionOptions = {}) {
    this.scheduler = options.scheduler ?? timerScheduler;
    this.random = options.random ?? Math.random;
    this.rules = options.rules ?? DEFAULT_RULES;
    this.logger = options.logger ?? silentLogger;
    this.game = createGame(0, this.random);
  }

  get state(): GameState {
    return this.game;
  }

  get clockActive(): boolean {
    return this.stopClock !== null;
  }

  get concealPending(): boolean {
    return this.cancelConceal !== null;
  }

  readonly getSnapshot = (): GameSnapshot => {
    if (!this.snapshot) {
      this.snapshot = toSnapshot(this.game);
    }
    return this.snapshot;
  };

  readonly subscribe = (listener: SessionListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  readonly flip = (ref: CardRef): FlipOutcome => {
    const reveal = revealCard(this.game, ref);

    if (reveal.outcome.kind === 'ignored') {
      this.logger.debug(`flip ignored for card ${ref.id} (round ${ref.round}): ${reveal.outcome.reason}`);
      return reveal.outcome;
    }

    if (!this.stopClock) {
      this.startClock();
    }

    this.commit(reveal.game);

    if (reveal.outcome.kind === 'first-selected') {
      this.logger.debug(`first card selected: ${this.describeCard(reveal.outcome.cardId)}`);
      return reveal.outcome;
    }

    const [, secondId] = reveal.outcome.cardIds;
    this.logger.debug(`second card selected: ${this.describeCard(secondId)}`);

    const resolved = resolvePair(this.game, this.rules);
    this.commit(resolved.game);

    if (resolved.outcome.kind === 'matched') {
      this.logger.debug(`cards match, awarding ${this.rules.matchAward} points (score ${this.game.score})`);
      this.evaluateWin();
      return resolved.outcome;
    }

    this.logger.debug(`cards do not match, deducting ${this.rules.mismatchPenalty} points (score ${this.game.score})`);
    this.scheduleConceal();
    return resolved.outcome;
  };

  readonly reset = (): void => {
    this.cancelTimers();
    this.game = createGame(this.game.round + 1, this.random);
    this.snapshot = null;
    this.logger.info(`round ${this.game.round} started`);
    this.notify();
  };

  dispose(): void {
    this.cancelTimers();
    this.listeners.clear();
  }

  private commit(next: GameState): void {
    if (next === this.game) {
      return;
    }

    this.game = next;
    this.snapshot = null;
    this.notify();
  }

  private notify(): void {
    this.listeners.forEach((listener) => listener());
  }

  private startClock(): void {
    this.stopClock = this.scheduler.scheduleRepeating(this.rules.tickIntervalMs, () => {
      this.commit(tickClock(this.game));
    });
  }

  private scheduleConceal(): void {
    const { round } = this.game;
    this.cancelConceal = this.scheduler.scheduleOnce(this.rules.peekDelayMs, () => {
      this.cancelConceal = null;
      const concealed = concealPair(this.game, round);
      if (concealed !== this.game) {
        this.logger.debug('flipping mismatched cards back');
      }
      this.commit(concealed);
    });
  }

  private evaluateWin(): void {
    const completed = completeGame(this.game);
    this.logger.debug(`checking win condition: allMatched=${completed.finished}`);
    if (completed === this.game) {
      return;
    }

    this.stopClockNow();
    this.commit(completed);
    this.logger.info(`round ${completed.round} won in ${completed.elapsedSeconds}s with score ${completed.score}`);
  }

  private stopClockNow(): void {
    this.stopClock?.();
    this.stopClock = null;
  }

  private cancelTimers(): void {
    this.stopClockNow();
    this.cancelConceal?.();
    this.cancelConceal = null;
  }

  private describeCard(cardId: number): string {
    const card = this.game.cards.find((candidate) => candidate.id === cardId);
    return card ? `id ${card.id}, content ${card.content}` : `id ${cardId}`;
  }
}

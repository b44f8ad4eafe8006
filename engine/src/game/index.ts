export {
  completeGame,
  concealPair,
  createGame,
  getPhase,
  isBoardCleared,
  resolvePair,
  revealCard,
  tickClock,
  DEFAULT_RULES
} from './engine.js';
export { DECK_SIZE, GRID_COLUMNS, PAIR_COUNT, generateDeck, shuffle } from './deck.js';
export { silentLogger } from './logger.js';
export type { GameLogger } from './logger.js';
export { ManualScheduler, timerScheduler } from './scheduler.js';
export type { CancelTask, Scheduler } from './scheduler.js';
export { MemoryMatchSession } from './session.js';
export type { SessionListener, SessionOptions } from './session.js';
export { toSnapshot } from './serializers.js';
export type {
  Card,
  CardRef,
  FlipOutcome,
  FlipRejection,
  GamePhase,
  GameRules,
  GameState,
  RandomSource,
  ResolveOutcome,
  RevealOutcome,
  Transition
} from './types.js';

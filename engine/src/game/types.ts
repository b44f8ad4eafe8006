import type { CardRef, GamePhase } from '@memory-match/shared';

export type { CardRef, GamePhase };

export interface Card {
  id: number;
  content: string;
  faceUp: boolean;
  matched: boolean;
}

export interface GameState {
  round: number;
  cards: Card[];
  pendingCardId: number | null;
  revealedPair: [number, number] | null;
  awaitingResolution: boolean;
  elapsedSeconds: number;
  score: number;
  finished: boolean;
  clockRunning: boolean;
}

export interface GameRules {
  matchAward: number;
  mismatchPenalty: number;
  peekDelayMs: number;
  tickIntervalMs: number;
}

export type FlipRejection =
  | 'stale-card'
  | 'unknown-card'
  | 'awaiting-resolution'
  | 'face-up'
  | 'matched';

export type RevealOutcome =
  | { kind: 'ignored'; reason: FlipRejection }
  | { kind: 'first-selected'; cardId: number }
  | { kind: 'second-selected'; cardIds: [number, number] };

export type ResolveOutcome =
  | { kind: 'matched'; cardIds: [number, number]; cleared: boolean }
  | { kind: 'mismatched'; cardIds: [number, number] };

export type FlipOutcome = Exclude<RevealOutcome, { kind: 'second-selected' }> | ResolveOutcome;

export interface Transition<TOutcome> {
  game: GameState;
  outcome: TOutcome;
}

export type RandomSource = () => number;

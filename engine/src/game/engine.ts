import { generateDeck } from './deck.js';
import type {
  Card,
  CardRef,
  FlipRejection,
  GamePhase,
  GameRules,
  GameState,
  RandomSource,
  ResolveOutcome,
  RevealOutcome,
  Transition
} from './types.js';

const DEFAULT_RULES: GameRules = {
  matchAward: 10,
  mismatchPenalty: 5,
  peekDelayMs: 1_000,
  tickIntervalMs: 1_000
};

const findCard = (game: GameState, cardId: number): Card => {
  const card = game.cards.find((candidate) => candidate.id === cardId);
  if (!card) {
    throw new Error(`Card ${cardId} is not part of round ${game.round}`);
  }
  return card;
};

const updateCards = (game: GameState, cardIds: readonly number[], patch: Partial<Omit<Card, 'id' | 'content'>>) =>
  game.cards.map((card) => (cardIds.includes(card.id) ? { ...card, ...patch } : card));

const getRevealedPair = (game: GameState): [number, number] => {
  if (!game.awaitingResolution || !game.revealedPair) {
    throw new Error('No revealed pair is awaiting resolution');
  }
  return game.revealedPair;
};

const ignored = (game: GameState, reason: FlipRejection): Transition<RevealOutcome> => ({
  game,
  outcome: { kind: 'ignored', reason }
});

export const isBoardCleared = (game: GameState): boolean => game.cards.every((card) => card.matched);

export const getPhase = (game: GameState): GamePhase => {
  if (game.finished) {
    return 'finished';
  }
  if (game.awaitingResolution) {
    return 'resolving';
  }
  return game.pendingCardId === null ? 'idle' : 'awaiting-second';
};

export const createGame = (round: number, random: RandomSource = Math.random): GameState => ({
  round,
  cards: generateDeck(random),
  pendingCardId: null,
  revealedPair: null,
  awaitingResolution: false,
  elapsedSeconds: 0,
  score: 0,
  finished: false,
  clockRunning: false
});

export const revealCard = (game: GameState, ref: CardRef): Transition<RevealOutcome> => {
  if (ref.round !== game.round) {
    return ignored(game, 'stale-card');
  }

  const card = game.cards.find((candidate) => candidate.id === ref.id);
  if (!card) {
    return ignored(game, 'unknown-card');
  }

  if (game.awaitingResolution) {
    return ignored(game, 'awaiting-resolution');
  }

  if (card.matched) {
    return ignored(game, 'matched');
  }

  if (card.faceUp) {
    return ignored(game, 'face-up');
  }

  const revealed: GameState = {
    ...game,
    cards: updateCards(game, [card.id], { faceUp: true }),
    clockRunning: true
  };

  if (game.pendingCardId === null) {
    return {
      game: { ...revealed, pendingCardId: card.id },
      outcome: { kind: 'first-selected', cardId: card.id }
    };
  }

  const cardIds: [number, number] = [game.pendingCardId, card.id];
  return {
    game: { ...revealed, awaitingResolution: true, revealedPair: cardIds },
    outcome: { kind: 'second-selected', cardIds }
  };
};

export const resolvePair = (game: GameState, rules: GameRules = DEFAULT_RULES): Transition<ResolveOutcome> => {
  const cardIds = getRevealedPair(game);
  const first = findCard(game, cardIds[0]);
  const second = findCard(game, cardIds[1]);

  if (first.content === second.content) {
    const matched: GameState = {
      ...game,
      cards: updateCards(game, cardIds, { matched: true }),
      score: game.score + rules.matchAward,
      pendingCardId: null,
      revealedPair: null,
      awaitingResolution: false
    };

    return {
      game: matched,
      outcome: { kind: 'matched', cardIds, cleared: isBoardCleared(matched) }
    };
  }

  return {
    game: { ...game, score: Math.max(game.score - rules.mismatchPenalty, 0) },
    outcome: { kind: 'mismatched', cardIds }
  };
};

export const concealPair = (game: GameState, round: number): GameState => {
  if (game.round !== round || !game.awaitingResolution || !game.revealedPair) {
    return game;
  }

  return {
    ...game,
    cards: updateCards(game, game.revealedPair, { faceUp: false }),
    pendingCardId: null,
    revealedPair: null,
    awaitingResolution: false
  };
};

export const completeGame = (game: GameState): GameState => {
  if (game.finished || !isBoardCleared(game)) {
    return game;
  }

  return {
    ...game,
    finished: true,
    clockRunning: false
  };
};

export const tickClock = (game: GameState): GameState => {
  if (!game.clockRunning || game.finished) {
    return game;
  }

  return {
    ...game,
    elapsedSeconds: game.elapsedSeconds + 1
  };
};

export { DEFAULT_RULES };

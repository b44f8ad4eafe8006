import { GameSnapshotSchema, type GameSnapshot } from '@memory-match/shared';
import { getPhase } from './engine.js';
import type { GameState } from './types.js';

const toCardSnapshots = (game: GameState) =>
  game.cards.map((card) => ({
    id: card.id,
    round: game.round,
    content: card.content,
    faceUp: card.faceUp,
    matched: card.matched
  }));

export const toSnapshot = (game: GameState): GameSnapshot => {
  return GameSnapshotSchema.parse({
    round: game.round,
    phase: getPhase(game),
    cards: toCardSnapshots(game),
    pendingCardId: game.pendingCardId,
    awaitingResolution: game.awaitingResolution,
    elapsedSeconds: game.elapsedSeconds,
    score: game.score,
    finished: game.finished
  });
};

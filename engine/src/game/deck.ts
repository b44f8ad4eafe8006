import type { Card, RandomSource } from './types.js';

export const PAIR_COUNT = 8;
export const DECK_SIZE = PAIR_COUNT * 2;
export const GRID_COLUMNS = 4;

const pairLabels = (): string[] => Array.from({ length: PAIR_COUNT }, (_, index) => String(index + 1));

/** Fisher-Yates over a copy; `random` must return values in [0, 1). */
export const shuffle = <T>(items: readonly T[], random: RandomSource = Math.random): T[] => {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    const current = shuffled[i];
    const swap = shuffled[j];
    if (current === undefined || swap === undefined) {
      throw new Error(`Shuffle index out of range: ${j} (random returned outside [0, 1))`);
    }
    shuffled[i] = swap;
    shuffled[j] = current;
  }

  return shuffled;
};

export const generateDeck = (random: RandomSource = Math.random): Card[] => {
  let id = 0;
  const cards = pairLabels().flatMap((content) => [
    { id: id++, content, faceUp: false, matched: false },
    { id: id++, content, faceUp: false, matched: false }
  ]);

  return shuffle(cards, random);
};

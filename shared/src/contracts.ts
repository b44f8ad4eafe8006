import { z } from 'zod';

export const GamePhaseSchema = z.enum(['idle', 'awaiting-second', 'resolving', 'finished']);

export const CardRefSchema = z.object({
  id: z.number().int().nonnegative(),
  round: z.number().int().nonnegative()
});

export const CardSnapshotSchema = CardRefSchema.extend({
  content: z.string().min(1),
  faceUp: z.boolean(),
  matched: z.boolean()
});

export const GameSnapshotSchema = z
  .object({
    round: z.number().int().nonnegative(),
    phase: GamePhaseSchema,
    cards: z.array(CardSnapshotSchema),
    pendingCardId: z.number().int().nonnegative().nullable(),
    awaitingResolution: z.boolean(),
    elapsedSeconds: z.number().int().nonnegative(),
    score: z.number().int().nonnegative(),
    finished: z.boolean()
  })
  .superRefine((snapshot, ctx) => {
    const staleCard = snapshot.cards.find((card) => card.round !== snapshot.round);
    if (staleCard) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cards'],
        message: `Card ${staleCard.id} belongs to round ${staleCard.round}, not ${snapshot.round}`
      });
    }

    const counts = new Map<string, number>();
    snapshot.cards.forEach((card) => counts.set(card.content, (counts.get(card.content) ?? 0) + 1));
    for (const [content, count] of counts) {
      if (count !== 2) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['cards'],
          message: `Content ${content} is held by ${count} cards`
        });
      }
    }

    if (snapshot.finished && !snapshot.cards.every((card) => card.matched)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['finished'],
        message: 'finished requires every card to be matched'
      });
    }
  });

export type GamePhase = z.infer<typeof GamePhaseSchema>;
export type CardRef = z.infer<typeof CardRefSchema>;
export type CardSnapshot = z.infer<typeof CardSnapshotSchema>;
export type GameSnapshot = z.infer<typeof GameSnapshotSchema>;

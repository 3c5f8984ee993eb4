import { z } from 'zod';

export const EventChoiceBodySchema = z.object({
  choiceIndex: z.number().int().min(0),
});

export type EventChoiceBody = z.infer<typeof EventChoiceBodySchema>;

/** actionIndex null = 현상 유지 */
export const ActionBodySchema = z.object({
  actionIndex: z.number().int().min(0).nullable(),
});

export type ActionBody = z.infer<typeof ActionBodySchema>;

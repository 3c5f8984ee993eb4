import { z } from 'zod';

export const CreateSessionBodySchema = z.object({
  seed: z.string().min(1).max(80).optional(),
});

export type CreateSessionBody = z.infer<typeof CreateSessionBodySchema>;

import { z } from 'zod';

export const CreateSessionBodySchema = z
  .object({
    name: z.string().trim().min(1).max(40).optional(),
    characterClass: z.string().trim().min(1).max(40).optional(),
    /** start from a save instead of the seed world */
    fromSaveId: z.string().uuid().optional(),
  })
  .strict();

export type CreateSessionBody = z.infer<typeof CreateSessionBodySchema>;

import { z } from 'zod';

export const LoadSaveBodySchema = z
  .object({
    force: z.boolean().default(false),
  })
  .default({});

export type LoadSaveBody = z.infer<typeof LoadSaveBodySchema>;

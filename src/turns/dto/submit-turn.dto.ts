import { z } from 'zod';

export const SubmitTurnBodySchema = z.object({
  text: z.string().max(400),
});

export type SubmitTurnBody = z.infer<typeof SubmitTurnBodySchema>;

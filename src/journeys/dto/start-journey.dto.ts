import { z } from 'zod';

export const StartJourneyBodySchema = z.object({
  region: z.string().min(1).max(50),
  season: z.string().min(1).max(20),
  stageDays: z.number().int().min(1).optional(),
});

export type StartJourneyBody = z.infer<typeof StartJourneyBodySchema>;

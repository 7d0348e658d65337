import { z } from 'zod';

export const OverrideDayBodySchema = z.object({
  day: z.number().int().min(1).optional(),
  region: z.string().min(1).max(50),
  season: z.string().min(1).max(20),
});

export type OverrideDayBody = z.infer<typeof OverrideDayBodySchema>;

export const DayParamSchema = z.coerce.number().int().min(1);

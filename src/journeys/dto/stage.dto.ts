import { z } from 'zod';

export const ConfigureStageBodySchema = z.object({
  stageDays: z.number().int().min(1),
});

export type ConfigureStageBody = z.infer<typeof ConfigureStageBodySchema>;

// 생략 시 여정의 stageDays
export const GenerateStageBodySchema = z
  .object({
    days: z.number().int().min(1).optional(),
  })
  .default({});

export type GenerateStageBody = z.infer<typeof GenerateStageBodySchema>;

// packages/docket-cli/src/types.ts
import { z } from 'zod';
import { StageRuleSchema } from 'docket-core';

export const OutputFormatSchema = z.enum(['json', 'md']);

export const GlobalOptionsSchema = z
  .object({
    db: z.string().optional(),
    format: OutputFormatSchema.default('md'),
  })
  .transform((value) => ({
    db: value.db,
    format: value.format,
    json: value.format === 'json',
  }));

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export const ConfigFileSchema = z
  .object({
    dbPath: z.string().min(1),
    micro: z
      .object({
        thresholdSecs: z.number().int().positive(),
        purgeTrigger: z.enum(['duration-and-gap', 'duration']),
      })
      .partial(),
    stages: z.array(StageRuleSchema),
  })
  .partial();

export type Config = z.infer<typeof ConfigFileSchema>;

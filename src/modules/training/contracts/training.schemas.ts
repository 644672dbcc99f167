import { z } from 'zod';
import type { TrainingConfig } from './training.types.js';

export const DEFAULT_TRAINING_CONFIG: TrainingConfig = {
  loraRank: 16,
  loraAlpha: 32,
  loraDropout: 0.05,
  sequenceLength: 1024,
  perDeviceBatchSize: 1,
  gradientAccumulationSteps: 8,
  precision: 'bf16',
  epochs: 2,
  maxSteps: 0,
  saveEverySteps: 100,
  use4bit: true,
};

export const TrainingConfigSchema = z
  .object({
    loraRank: z.number().int().min(1).max(256),
    loraAlpha: z.number().int().min(1).max(512),
    loraDropout: z.number().min(0).max(0.5),
    sequenceLength: z.number().int().min(128).max(32768),
    perDeviceBatchSize: z.number().int().min(1).max(64),
    gradientAccumulationSteps: z.number().int().min(1).max(256),
    precision: z.enum(['fp32', 'fp16', 'bf16']),
    epochs: z.number().int().min(1).max(50),
    maxSteps: z.number().int().min(0),
    saveEverySteps: z.number().int().min(1),
    use4bit: z.boolean(),
  })
  .strict();

export type ConfigResolution =
  | { ok: true; config: TrainingConfig }
  | { ok: false; issues: string[] };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
}

/** Missing keys fall back to DEFAULT_TRAINING_CONFIG. */
export function resolveTrainingConfig(input: unknown): ConfigResolution {
  const partial = TrainingConfigSchema.partial().safeParse(input ?? {});
  if (!partial.success) return { ok: false, issues: formatIssues(partial.error) };

  const full = TrainingConfigSchema.safeParse({ ...DEFAULT_TRAINING_CONFIG, ...partial.data });
  if (!full.success) return { ok: false, issues: formatIssues(full.error) };
  return { ok: true, config: full.data };
}

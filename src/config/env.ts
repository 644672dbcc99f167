/**
 * Environment Configuration
 *
 * Parsed once from process.env. Invalid values fail the boot,
 * never a request.
 */

import { z } from 'zod';

const bool = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1');

const ratio = z.coerce.number().gt(0).lte(1);

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(8001),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    CORS_ORIGINS: z.string().default('*'),

    STORAGE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
    MONGO_URL: z.string().default('mongodb://localhost:27017'),
    MONGO_DB: z.string().default('adapter_pipeline'),
    ARTIFACTS_PATH: z.string().default('data/artifacts'),
    DATASET_SEED_FILE: z.string().optional(),

    MAX_GPU_VRAM_GB: z.coerce.number().positive().default(8),
    VRAM_SAFETY_FACTOR: ratio.default(0.85),

    TRAINER_BACKEND: z.enum(['simulator', 'command']).default('simulator'),
    TRAINER_COMMAND_TEMPLATE: z.string().optional(),
    TRAINER_TIMEOUT_MS: z.coerce.number().int().positive().default(3_600_000),
    TRAINER_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
    TRAINER_RETRY_BASE_MS: z.coerce.number().int().min(0).default(1000),
    SIMULATOR_STEPS: z.coerce.number().int().positive().default(100),

    INFERENCE_BACKEND: z.enum(['mock', 'ollama']).default('mock'),
    OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
    OLLAMA_CHAT_MODEL: z.string().default('llama3.1:8b'),
    INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),
    REQUIRE_GROUNDING: bool(true),
    GROUNDING_TOP_K: z.coerce.number().int().positive().default(3),

    WORKER_ENABLED: bool(true),
    WORKER_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
    WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),

    EVAL_MIN_SEMANTIC: ratio.default(0.72),
    EVAL_MAX_UNSUPPORTED: ratio.default(0.12),
    EVAL_MIN_REFUSAL: ratio.default(0.8),
    EVAL_REGRESSION_TOLERANCE: z.coerce.number().min(0).max(1).default(0.05),
    EVAL_FUZZY_THRESHOLD: ratio.default(0.85),
    EVAL_MAX_FAILURES: z.coerce.number().int().min(0).default(20),
    EVAL_PREDICTOR: z.enum(['simulator', 'inference']).default('simulator'),
  })
  .superRefine((value, ctx) => {
    if (value.TRAINER_BACKEND === 'command' && !value.TRAINER_COMMAND_TEMPLATE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TRAINER_COMMAND_TEMPLATE'],
        message: 'TRAINER_BACKEND=command requires TRAINER_COMMAND_TEMPLATE',
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  return Object.freeze(EnvSchema.parse(source));
}

export const env: Env = loadEnv();

/**
 * VRAM PREFLIGHT
 *
 * Pure estimate of accelerator memory for a LoRA run. Calibrated on a
 * 7B model at rank 16, sequence 1024 and an effective batch of 8.
 */

import type { TrainingConfig } from '../contracts/training.types.js';

export interface CapacityConfig {
  maxGpuVramGb: number;
  vramSafetyFactor: number;
}

export interface VramEstimate {
  baseModelId: string;
  estimatedGb: number;
  safeLimitGb: number;
  willFit: boolean;
  recommendation: string;
}

const BASE_GB_AT_7B = 4.2;
const REFERENCE_PARAMS_B = 7;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function estimateVram(
  config: TrainingConfig,
  baseModelId: string,
  paramsBillions: number,
  capacity: CapacityConfig
): VramEstimate {
  const modelFactor = paramsBillions / REFERENCE_PARAMS_B;
  const seqFactor = config.sequenceLength / 1024;
  const rankFactor = config.loraRank / 16;
  const batchFactor = (config.perDeviceBatchSize * Math.max(config.gradientAccumulationSteps, 1)) / 8;
  const precisionFactor = config.precision === 'bf16' || config.precision === 'fp16' ? 0.78 : 1.0;
  const quantFactor = config.use4bit ? 0.7 : 1.0;

  const estimate =
    BASE_GB_AT_7B *
    modelFactor *
    seqFactor *
    (0.7 + 0.3 * rankFactor) *
    (0.6 + 0.4 * batchFactor) *
    precisionFactor *
    quantFactor;

  const safeLimit = capacity.maxGpuVramGb * capacity.vramSafetyFactor;
  const willFit = estimate <= safeLimit;

  return {
    baseModelId,
    estimatedGb: round2(estimate),
    safeLimitGb: round2(safeLimit),
    willFit,
    recommendation: willFit
      ? 'config_safe'
      : 'Reduce sequence length, enable 4-bit, or lower the effective batch size.',
  };
}

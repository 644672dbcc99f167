/**
 * GO / NO-GO POLICY
 *
 * GO requires every condition; each failed condition is reported as a
 * blocker string.
 */

import type {
  EvaluationMetrics,
  EvaluationReport,
  EvaluationThresholds,
} from '../contracts/evaluation.types.js';
import { round4 } from './text.metrics.js';

export interface RegressionCheck {
  delta: number | null;
  flagged: boolean;
}

export function checkRegression(
  semanticSimilarity: number,
  prior: EvaluationReport | null,
  tolerance: number
): RegressionCheck {
  if (!prior) return { delta: null, flagged: false };
  const delta = round4(semanticSimilarity - prior.metrics.semanticSimilarity);
  return { delta, flagged: delta < -tolerance };
}

export function decideGoNoGo(
  metrics: EvaluationMetrics,
  thresholds: EvaluationThresholds
): { goNoGo: boolean; blockers: string[] } {
  const blockers: string[] = [];

  if (metrics.semanticSimilarity < thresholds.minSemanticSimilarity) {
    blockers.push(
      `semantic_similarity ${metrics.semanticSimilarity} < ${thresholds.minSemanticSimilarity}`
    );
  }
  if (metrics.unsupportedClaimRate > thresholds.maxUnsupportedClaimRate) {
    blockers.push(
      `unsupported_claim_rate ${metrics.unsupportedClaimRate} > ${thresholds.maxUnsupportedClaimRate}`
    );
  }
  if (metrics.refusalAccuracy < thresholds.minRefusalAccuracy) {
    blockers.push(`refusal_accuracy ${metrics.refusalAccuracy} < ${thresholds.minRefusalAccuracy}`);
  }
  if (metrics.regressionFlagged) {
    blockers.push(
      `regression_delta ${metrics.regressionDelta} beyond tolerance -${thresholds.regressionTolerance}`
    );
  }

  return { goNoGo: blockers.length === 0, blockers };
}

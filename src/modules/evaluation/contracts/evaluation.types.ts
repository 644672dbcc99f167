/**
 * EVALUATION CONTRACTS
 *
 * A report is written once per completed training run and never
 * updated. The orchestrator reads only reportId and goNoGo.
 */

export interface HeldOutExample {
  id: string;
  prompt: string;
  reference: string;
  context: string[];           // source passages the answer may draw on
  expectRefusal: boolean;      // out-of-scope prompt, correct answer is to abstain
}

export interface EvaluationThresholds {
  minSemanticSimilarity: number;
  maxUnsupportedClaimRate: number;
  minRefusalAccuracy: number;
  regressionTolerance: number;
  fuzzyMatchThreshold: number;
  maxFailures: number;
}

export const DEFAULT_THRESHOLDS: EvaluationThresholds = {
  minSemanticSimilarity: 0.72,
  maxUnsupportedClaimRate: 0.12,
  minRefusalAccuracy: 0.8,
  regressionTolerance: 0.05,
  fuzzyMatchThreshold: 0.85,
  maxFailures: 20,
};

export interface EvaluationMetrics {
  exactMatch: number;
  fuzzyMatch: number;
  semanticSimilarity: number;
  refusalAccuracy: number;
  refusalPrecision: number;
  refusalRecall: number;
  unsupportedClaimRate: number;
  latencyMs: number;
  tokensPerSecond: number;
  regressionDelta: number | null;
  regressionFlagged: boolean;
  exampleCount: number;
}

export type FailureReason = 'low_similarity' | 'unsupported_claim' | 'refusal_mismatch';

export interface FailingExample {
  exampleId: string;
  prompt: string;
  expected: string;
  predicted: string;
  semanticSimilarity: number;
  reasons: FailureReason[];
}

export interface EvaluationReport {
  reportId: string;
  trainingRunId: string;
  tenantId: string;
  projectId: string;
  checkpointPath: string;
  metrics: EvaluationMetrics;
  goNoGo: boolean;
  blockers: string[];
  failures: FailingExample[];
  thresholds: EvaluationThresholds;
  priorReportId: string | null;
  createdAt: Date;
}

export interface EvaluateRequest {
  runId: string;
  tenantId: string;
  projectId: string;
  checkpointPath: string;
  heldOutExamples: HeldOutExample[];
  priorActiveReport: EvaluationReport | null;
}

/** Produces the adapter's answer to one held-out prompt. */
export interface CheckpointPredictor {
  readonly name: string;
  predict(checkpointPath: string, example: HeldOutExample): Promise<string>;
}

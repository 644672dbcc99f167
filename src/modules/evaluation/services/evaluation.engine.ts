/**
 * EVALUATION ENGINE
 *
 * Scores a checkpoint against the dataset's held-out split, compares
 * with the report of the version currently serving, and stores an
 * immutable report with the go/no-go decision.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Clock, Logger } from '../../../common/host.deps.js';
import { defaultClock, defaultLogger } from '../../../common/host.deps.js';
import type {
  CheckpointPredictor,
  EvaluateRequest,
  EvaluationMetrics,
  EvaluationReport,
  EvaluationThresholds,
  FailingExample,
  FailureReason,
  HeldOutExample,
} from '../contracts/evaluation.types.js';
import { DEFAULT_THRESHOLDS } from '../contracts/evaluation.types.js';
import { checkRegression, decideGoNoGo, type RegressionCheck } from '../runtime/go_no_go.policy.js';
import {
  contentTokens,
  editSimilarity,
  isClaimSupported,
  isRefusal,
  normalizeText,
  round4,
  splitClaims,
  termCosine,
  tokenize,
} from '../runtime/text.metrics.js';
import type { EvaluationReportRepository } from '../storage/report.repo.js';

// ═══════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════

const LOW_SIMILARITY = 0.65;

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

export interface ExampleScore {
  example: HeldOutExample;
  predicted: string;
  exact: boolean;
  fuzzy: boolean;
  semantic: number;
  predictedRefusal: boolean;
  claims: number;
  unsupportedClaims: number;
  tokens: number;
  latencyMs: number;
}

export function scoreExample(
  example: HeldOutExample,
  predicted: string,
  thresholds: EvaluationThresholds,
  latencyMs = 0
): ExampleScore {
  const predictedRefusal = isRefusal(predicted);
  const claims = predictedRefusal ? [] : splitClaims(predicted);
  const source = new Set([
    ...contentTokens(example.reference),
    ...example.context.flatMap((passage) => contentTokens(passage)),
  ]);

  return {
    example,
    predicted,
    exact: normalizeText(predicted) === normalizeText(example.reference),
    fuzzy: editSimilarity(predicted, example.reference) >= thresholds.fuzzyMatchThreshold,
    semantic: termCosine(predicted, example.reference),
    predictedRefusal,
    claims: claims.length,
    unsupportedClaims: claims.filter((c) => !isClaimSupported(c, source)).length,
    tokens: tokenize(predicted).length,
    latencyMs,
  };
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 1 : numerator / denominator;
}

export function aggregateScores(
  scores: ExampleScore[],
  regression: RegressionCheck
): EvaluationMetrics {
  const n = scores.length;
  const count = (pred: (s: ExampleScore) => boolean) => scores.filter(pred).length;

  const truePositive = count((s) => s.example.expectRefusal && s.predictedRefusal);
  const falsePositive = count((s) => !s.example.expectRefusal && s.predictedRefusal);
  const falseNegative = count((s) => s.example.expectRefusal && !s.predictedRefusal);

  const totalClaims = scores.reduce((sum, s) => sum + s.claims, 0);
  const unsupported = scores.reduce((sum, s) => sum + s.unsupportedClaims, 0);
  const totalLatency = scores.reduce((sum, s) => sum + s.latencyMs, 0);
  const totalTokens = scores.reduce((sum, s) => sum + s.tokens, 0);

  return {
    exactMatch: round4(count((s) => s.exact) / n),
    fuzzyMatch: round4(count((s) => s.fuzzy) / n),
    semanticSimilarity: round4(scores.reduce((sum, s) => sum + s.semantic, 0) / n),
    refusalAccuracy: round4(count((s) => s.example.expectRefusal === s.predictedRefusal) / n),
    refusalPrecision: round4(ratio(truePositive, truePositive + falsePositive)),
    refusalRecall: round4(ratio(truePositive, truePositive + falseNegative)),
    unsupportedClaimRate: totalClaims === 0 ? 0 : round4(unsupported / totalClaims),
    latencyMs: round4(totalLatency / n),
    tokensPerSecond: totalLatency > 0 ? round4(totalTokens / (totalLatency / 1000)) : 0,
    regressionDelta: regression.delta,
    regressionFlagged: regression.flagged,
    exampleCount: n,
  };
}

export function collectFailures(scores: ExampleScore[], maxFailures: number): FailingExample[] {
  const failures: FailingExample[] = [];
  for (const s of scores) {
    const reasons: FailureReason[] = [];
    if (!s.example.expectRefusal && !s.predictedRefusal && s.semantic < LOW_SIMILARITY) {
      reasons.push('low_similarity');
    }
    if (s.unsupportedClaims > 0) reasons.push('unsupported_claim');
    if (s.example.expectRefusal !== s.predictedRefusal) reasons.push('refusal_mismatch');
    if (reasons.length === 0) continue;

    failures.push({
      exampleId: s.example.id,
      prompt: s.example.prompt,
      expected: s.example.reference,
      predicted: s.predicted,
      semanticSimilarity: round4(s.semantic),
      reasons,
    });
  }
  return failures
    .sort((a, b) => a.semanticSimilarity - b.semanticSimilarity)
    .slice(0, maxFailures);
}

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

export interface EvaluationEngineDeps {
  reports: EvaluationReportRepository;
  predictor: CheckpointPredictor;
  thresholds?: Partial<EvaluationThresholds>;
  clock?: Clock;
  logger?: Logger;
}

export class EvaluationEngine {
  private readonly reports: EvaluationReportRepository;
  private readonly predictor: CheckpointPredictor;
  private readonly clock: Clock;
  private readonly logger: Logger;
  readonly thresholds: EvaluationThresholds;

  constructor(deps: EvaluationEngineDeps) {
    this.reports = deps.reports;
    this.predictor = deps.predictor;
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...deps.thresholds };
    this.clock = deps.clock ?? defaultClock;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * One report per run: a second call for the same run returns the
   * stored report unchanged.
   */
  async evaluate(request: EvaluateRequest): Promise<EvaluationReport> {
    if (request.heldOutExamples.length === 0) {
      throw new EvaluationError(`No held-out examples for run ${request.runId}`);
    }

    const existing = await this.reports.findByRunId(request.runId);
    if (existing) return existing;

    const scores: ExampleScore[] = [];
    for (const example of request.heldOutExamples) {
      const started = this.clock.now();
      const predicted = await this.predictor.predict(request.checkpointPath, example);
      scores.push(scoreExample(example, predicted, this.thresholds, this.clock.now() - started));
    }

    const semantic = round4(scores.reduce((sum, s) => sum + s.semantic, 0) / scores.length);
    const regression = checkRegression(
      semantic,
      request.priorActiveReport,
      this.thresholds.regressionTolerance
    );
    const metrics = aggregateScores(scores, regression);
    const { goNoGo, blockers } = decideGoNoGo(metrics, this.thresholds);

    const report: EvaluationReport = {
      reportId: `eval_${uuidv4()}`,
      trainingRunId: request.runId,
      tenantId: request.tenantId,
      projectId: request.projectId,
      checkpointPath: request.checkpointPath,
      metrics,
      goNoGo,
      blockers,
      failures: collectFailures(scores, this.thresholds.maxFailures),
      thresholds: { ...this.thresholds },
      priorReportId: request.priorActiveReport?.reportId ?? null,
      createdAt: this.clock.utcNow(),
    };

    if (!(await this.reports.insert(report))) {
      const stored = await this.reports.findByRunId(request.runId);
      if (stored) return stored;
      throw new EvaluationError(`Report for run ${request.runId} could not be stored`);
    }

    this.logger.info(
      {
        runId: request.runId,
        reportId: report.reportId,
        predictor: this.predictor.name,
        goNoGo,
        blockers,
        semanticSimilarity: metrics.semanticSimilarity,
      },
      '[Evaluation] Report created'
    );
    return report;
  }

  getReport(reportId: string): Promise<EvaluationReport | null> {
    return this.reports.findById(reportId);
  }

  getReportForRun(runId: string): Promise<EvaluationReport | null> {
    return this.reports.findByRunId(runId);
  }

  listReports(tenantId: string, projectId: string, limit?: number): Promise<EvaluationReport[]> {
    return this.reports.listByProject(tenantId, projectId, limit);
  }
}

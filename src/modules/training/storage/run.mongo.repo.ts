/**
 * Mongo run and event repositories.
 *
 * The claim and every transition are single findOneAndUpdate calls
 * filtered on the expected state, which MongoDB applies atomically per
 * document.
 */

import type { FilterQuery } from 'mongoose';
import type { RunEvent, RunPatch, RunState, TrainingRun } from '../contracts/training.types.js';
import { RunEventModel, TrainingRunModel } from './run.model.js';
import type {
  ClaimOptions,
  RunEventRepository,
  RunRepository,
  TransitionOptions,
} from './run.repo.js';

function toRun(doc: TrainingRun): TrainingRun {
  return {
    runId: doc.runId,
    tenantId: doc.tenantId,
    projectId: doc.projectId,
    datasetVersionId: doc.datasetVersionId,
    baseModelId: doc.baseModelId,
    requestedBy: doc.requestedBy,
    config: doc.config,
    state: doc.state,
    progress: doc.progress,
    vramEstimateGb: doc.vramEstimateGb ?? null,
    errorCode: doc.errorCode ?? null,
    errorMessage: doc.errorMessage ?? null,
    evalReportId: doc.evalReportId ?? null,
    goNoGo: doc.goNoGo ?? null,
    checkpointPath: doc.checkpointPath ?? null,
    packagePath: doc.packagePath ?? null,
    retryCount: doc.retryCount,
    eventSeq: doc.eventSeq,
    claimedBy: doc.claimedBy ?? null,
    resubmittedFrom: doc.resubmittedFrom ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
    startedAt: doc.startedAt ?? null,
    finishedAt: doc.finishedAt ?? null,
  };
}

export class MongoRunRepository implements RunRepository {
  async insert(run: TrainingRun): Promise<void> {
    await TrainingRunModel.create(run);
  }

  async findById(runId: string): Promise<TrainingRun | null> {
    const doc = await TrainingRunModel.findOne({ runId }).lean<TrainingRun>();
    return doc ? toRun(doc) : null;
  }

  async listByProject(tenantId: string, projectId: string, limit = 100): Promise<TrainingRun[]> {
    const docs = await TrainingRunModel.find({ tenantId, projectId })
      .sort({ createdAt: -1 })
      .limit(limit)
      .lean<TrainingRun[]>();
    return docs.map(toRun);
  }

  async countSubmittedSince(tenantId: string, since: Date): Promise<number> {
    return TrainingRunModel.countDocuments({ tenantId, createdAt: { $gte: since } });
  }

  async claimOldestQueued(options: ClaimOptions): Promise<TrainingRun | null> {
    const filter: FilterQuery<TrainingRun> = { state: 'QUEUED' };
    if (options.tenantId) filter.tenantId = options.tenantId;

    const doc = await TrainingRunModel.findOneAndUpdate(
      filter,
      {
        $set: {
          state: 'PREFLIGHT',
          claimedBy: options.workerId,
          startedAt: options.now,
          updatedAt: options.now,
        },
        $inc: { eventSeq: 1 },
      },
      { sort: { createdAt: 1, _id: 1 }, new: true }
    ).lean<TrainingRun>();

    return doc ? toRun(doc) : null;
  }

  async transition(
    runId: string,
    from: RunState,
    to: RunState,
    options: TransitionOptions
  ): Promise<TrainingRun | null> {
    const filter: FilterQuery<TrainingRun> = { runId, state: from };
    if (to === 'READY' && !options.patch?.evalReportId) {
      filter.evalReportId = { $ne: null };
    }

    const doc = await TrainingRunModel.findOneAndUpdate(
      filter,
      {
        $set: { ...(options.patch ?? {}), state: to, updatedAt: options.now },
        $inc: { eventSeq: 1 },
      },
      { new: true }
    ).lean<TrainingRun>();

    return doc ? toRun(doc) : null;
  }

  async patch(runId: string, state: RunState, patch: RunPatch, now: Date): Promise<TrainingRun | null> {
    const doc = await TrainingRunModel.findOneAndUpdate(
      { runId, state },
      { $set: { ...patch, updatedAt: now } },
      { new: true }
    ).lean<TrainingRun>();
    return doc ? toRun(doc) : null;
  }

  async raiseProgress(runId: string, value: number, now: Date): Promise<boolean> {
    const result = await TrainingRunModel.updateOne(
      { runId, state: 'TRAINING' },
      { $max: { progress: value }, $set: { updatedAt: now } }
    );
    return result.matchedCount === 1;
  }
}

export class MongoRunEventRepository implements RunEventRepository {
  async append(event: RunEvent): Promise<void> {
    await RunEventModel.create(event);
  }

  async listByRun(runId: string): Promise<RunEvent[]> {
    const docs = await RunEventModel.find({ runId }).sort({ seq: 1 }).lean<RunEvent[]>();
    return docs.map((doc) => ({
      runId: doc.runId,
      seq: doc.seq,
      fromState: doc.fromState ?? null,
      toState: doc.toState,
      timestamp: doc.timestamp,
      detail: doc.detail,
      ...(doc.meta ? { meta: doc.meta } : {}),
    }));
  }
}

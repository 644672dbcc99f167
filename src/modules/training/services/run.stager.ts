/**
 * STAGING
 *
 * Re-checks that the dataset and base model a queued run references are
 * still valid, then writes a config snapshot into the run directory.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { BaseModelRegistry } from '../config/base_models.registry.js';
import type { DatasetCatalog } from '../contracts/collaborators.js';
import { isUsableDataset } from '../contracts/collaborators.js';
import { resolveTrainingConfig } from '../contracts/training.schemas.js';
import type { TrainingRun } from '../contracts/training.types.js';

export const RUN_CONFIG_SNAPSHOT = 'run_config_snapshot.json';

export class StagingFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StagingFailure';
  }
}

export interface StagedRun {
  runDir: string;
  snapshotPath: string;
}

export function runDirectory(artifactsRoot: string, run: Pick<TrainingRun, 'tenantId' | 'projectId' | 'runId'>): string {
  return path.resolve(artifactsRoot, run.tenantId, run.projectId, run.runId);
}

export class RunStager {
  constructor(
    private readonly artifactsRoot: string,
    private readonly datasets: DatasetCatalog,
    private readonly models: BaseModelRegistry
  ) {}

  async stage(run: TrainingRun): Promise<StagedRun> {
    const dataset = await this.datasets.getVersion(run.datasetVersionId);
    if (!dataset || dataset.tenantId !== run.tenantId || dataset.projectId !== run.projectId) {
      throw new StagingFailure(`Dataset version ${run.datasetVersionId} is no longer available`);
    }
    if (!isUsableDataset(dataset)) {
      throw new StagingFailure(`Dataset version ${dataset.id} is ${dataset.status}`);
    }
    if (!this.models.isApproved(run.baseModelId)) {
      throw new StagingFailure(`Base model ${run.baseModelId} is no longer approved`);
    }
    const resolved = resolveTrainingConfig(run.config);
    if (!resolved.ok) {
      throw new StagingFailure(`Stored config is invalid: ${resolved.issues.join('; ')}`);
    }

    const runDir = runDirectory(this.artifactsRoot, run);
    await mkdir(runDir, { recursive: true });

    const snapshotPath = path.join(runDir, RUN_CONFIG_SNAPSHOT);
    const snapshot = {
      run_id: run.runId,
      dataset_version_id: dataset.id,
      dataset_stats: dataset.stats,
      base_model_id: run.baseModelId,
      config: resolved.config,
    };
    await writeFile(snapshotPath, JSON.stringify(snapshot, null, 2), 'utf8');

    return { runDir, snapshotPath };
  }
}

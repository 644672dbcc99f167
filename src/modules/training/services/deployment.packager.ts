/**
 * Builds <runDir>/package: the run manifest and the inference config the
 * serving side reads.
 */

import { access, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { EvaluationReport } from '../../evaluation/contracts/evaluation.types.js';
import type { TrainingRun } from '../contracts/training.types.js';

export const RUN_MANIFEST = 'run_manifest.json';
export const INFERENCE_CONFIG = 'inference_config.json';

export interface PackageInput {
  run: TrainingRun;
  runDir: string;
  checkpointPath: string;
  report: EvaluationReport;
}

export class DeploymentPackager {
  constructor(private readonly options: { requireGrounding: boolean }) {}

  async build(input: PackageInput): Promise<string> {
    const { run, report } = input;
    await access(input.checkpointPath);

    const packageDir = path.join(input.runDir, 'package');
    await mkdir(packageDir, { recursive: true });

    const manifest = {
      run_id: run.runId,
      tenant_id: run.tenantId,
      project_id: run.projectId,
      dataset_version_id: run.datasetVersionId,
      base_model_id: run.baseModelId,
      checkpoint_path: input.checkpointPath,
      eval_report_id: report.reportId,
      go_no_go: report.goNoGo,
      blockers: report.blockers,
      config: run.config,
    };
    const inferenceConfig = {
      base_model_id: run.baseModelId,
      adapter_path: input.checkpointPath,
      must_ground_facts: this.options.requireGrounding,
      refusal_on_missing_context: true,
      max_context_tokens: run.config.sequenceLength,
    };

    await writeFile(path.join(packageDir, RUN_MANIFEST), JSON.stringify(manifest, null, 2), 'utf8');
    await writeFile(path.join(packageDir, INFERENCE_CONFIG), JSON.stringify(inferenceConfig, null, 2), 'utf8');
    return packageDir;
  }
}

/**
 * Checkpoint predictors
 *
 * simulator: answers straight from the reference, so a well-formed
 *            dataset evaluates GO. Used without a GPU.
 * inference: asks the inference backend with the example's context as
 *            grounding.
 */

import type { InferenceBackend } from '../../deployment/contracts/deployment.types.js';
import type { CheckpointPredictor, HeldOutExample } from '../contracts/evaluation.types.js';

export const SIMULATED_REFUSAL =
  'I do not have enough grounded information to answer safely. Escalate to a manager.';

const SIMULATED_MAX_WORDS = 50;

export class SimulatedCheckpointPredictor implements CheckpointPredictor {
  readonly name = 'simulator';

  async predict(_checkpointPath: string, example: HeldOutExample): Promise<string> {
    if (example.expectRefusal) return SIMULATED_REFUSAL;
    return example.reference.split(/\s+/).filter(Boolean).slice(0, SIMULATED_MAX_WORDS).join(' ');
  }
}

export class InferenceCheckpointPredictor implements CheckpointPredictor {
  readonly name = 'inference';

  constructor(private readonly backend: InferenceBackend) {}

  async predict(checkpointPath: string, example: HeldOutExample): Promise<string> {
    const result = await this.backend.generate({
      prompt: example.prompt,
      snippets: example.context.map((text, i) => ({ sourceId: `${example.id}#${i}`, text, score: 1 })),
      artifactPath: checkpointPath,
      versionLabel: null,
    });
    return result.text;
  }
}

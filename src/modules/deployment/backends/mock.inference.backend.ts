import type { GenerateRequest, GenerateResult, InferenceBackend } from '../contracts/deployment.types.js';

/** Deterministic answer assembled from the evidence. */
export class MockInferenceBackend implements InferenceBackend {
  readonly name = 'mock';

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    if (request.snippets.length === 0) {
      return {
        text: `There are no explicit citations for: ${request.prompt}`,
        model: 'mock',
      };
    }
    const evidence = request.snippets.map((s, i) => `[${i + 1}] ${s.text}`).join(' ');
    return {
      text: `Based on grounded project documents: ${evidence}`,
      model: 'mock',
    };
  }
}

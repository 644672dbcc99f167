import type { InferenceBackend } from '../contracts/deployment.types.js';
import { MockInferenceBackend } from './mock.inference.backend.js';
import { OllamaInferenceBackend, type OllamaOptions } from './ollama.inference.backend.js';

export type InferenceBackendConfig = { kind: 'mock' } | ({ kind: 'ollama' } & OllamaOptions);

export function createInferenceBackend(config: InferenceBackendConfig): InferenceBackend {
  switch (config.kind) {
    case 'mock':
      return new MockInferenceBackend();
    case 'ollama':
      return new OllamaInferenceBackend(config);
  }
}

export { MockInferenceBackend, OllamaInferenceBackend };
export { InferenceBackendError } from './ollama.inference.backend.js';

import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { InferenceBackendError, OllamaInferenceBackend } from '../backends/ollama.inference.backend.js';
import type { GenerateRequest } from '../contracts/deployment.types.js';

const OPTIONS = { baseUrl: 'http://ollama.test', model: 'llama3.1:8b', timeoutMs: 1000 };

const REQUEST: GenerateRequest = {
  prompt: 'How long is the return window?',
  snippets: [{ sourceId: 'doc-1#0', text: 'Returns are accepted within 30 days.', score: 0.4 }],
  artifactPath: '/artifacts/package',
  versionLabel: 'v1',
};

function clientReturning(data: unknown, seen: InternalAxiosRequestConfig[] = []) {
  const adapter: AxiosAdapter = async (config) => {
    seen.push(config);
    return { data, status: 200, statusText: 'OK', headers: {}, config };
  };
  return axios.create({ baseURL: OPTIONS.baseUrl, adapter });
}

describe('OllamaInferenceBackend', () => {
  it('posts a non-streaming chat with the grounded prompt', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const backend = new OllamaInferenceBackend(
      OPTIONS,
      clientReturning({ model: 'llama3.1:8b', message: { role: 'assistant', content: '  Within 30 days.  ' } }, seen)
    );

    const result = await backend.generate(REQUEST);

    expect(result).toEqual({ text: 'Within 30 days.', model: 'llama3.1:8b' });
    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe('/api/chat');
    const payload = JSON.parse(String(seen[0].data));
    expect(payload.stream).toBe(false);
    expect(payload.messages[1].content).toBe(
      'Answer the question using only the provided evidence.\n' +
        'Evidence:\n[1] Returns are accepted within 30 days.\n' +
        'Question:\nHow long is the return window?'
    );
  });

  it('rejects an empty answer', async () => {
    const backend = new OllamaInferenceBackend(OPTIONS, clientReturning({ message: { content: '   ' } }));
    await expect(backend.generate(REQUEST)).rejects.toThrow('Ollama returned an empty answer');
  });

  it('wraps transport errors', async () => {
    const failing: AxiosAdapter = async () => {
      throw new Error('connect ECONNREFUSED');
    };
    const backend = new OllamaInferenceBackend(OPTIONS, axios.create({ adapter: failing }));

    const attempt = backend.generate(REQUEST);
    await expect(attempt).rejects.toBeInstanceOf(InferenceBackendError);
    await expect(attempt).rejects.toThrow('Ollama request failed: connect ECONNREFUSED');
  });
});

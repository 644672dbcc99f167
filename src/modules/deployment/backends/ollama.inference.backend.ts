/**
 * Ollama chat provider.
 *
 * Non-streaming POST /api/chat. The response body is validated before
 * use; an empty answer counts as a failure.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { AppError, errorMessage } from '../../../common/errors.js';
import type { GenerateRequest, GenerateResult, InferenceBackend } from '../contracts/deployment.types.js';
import { DEFAULT_SYSTEM_PROMPT, composePrompt } from './inference.prompt.js';

export class InferenceBackendError extends AppError {
  constructor(message: string) {
    super(502, 'INFERENCE_BACKEND_ERROR', message);
  }
}

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z
    .object({
      role: z.string().optional(),
      content: z.string(),
    })
    .optional(),
});

export interface OllamaOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  systemPrompt?: string;
}

export class OllamaInferenceBackend implements InferenceBackend {
  readonly name = 'ollama';
  private readonly client: AxiosInstance;

  constructor(private readonly options: OllamaOptions, client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        baseURL: options.baseUrl.replace(/\/+$/, ''),
        timeout: options.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    const payload = {
      model: this.options.model,
      stream: false,
      messages: [
        { role: 'system', content: this.options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT },
        { role: 'user', content: composePrompt(request.prompt, request.snippets) },
      ],
    };

    let body: unknown;
    try {
      const response = await this.client.post<unknown>('/api/chat', payload);
      body = response.data;
    } catch (err) {
      throw new InferenceBackendError(`Ollama request failed: ${errorMessage(err)}`);
    }

    const parsed = OllamaChatResponseSchema.safeParse(body);
    const content = parsed.success ? parsed.data.message?.content.trim() ?? '' : '';
    if (!content) {
      throw new InferenceBackendError('Ollama returned an empty answer');
    }
    return { text: content, model: parsed.success && parsed.data.model ? parsed.data.model : this.options.model };
  }
}

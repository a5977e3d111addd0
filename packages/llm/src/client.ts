/**
 * Ollama HTTP client for local LLM inference (non-streaming chat).
 */

import { z } from 'zod';
import {
  OLLAMA_BASE_URL,
  type ModelConfig,
  defaultModelConfigs,
  type OllamaModelType,
} from './models.js';

export interface OllamaChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaChatMessage[];
  stream?: boolean;
  format?: 'json';
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
    stop?: string[];
  };
}

const chatResponseSchema = z
  .object({
    model: z.string(),
    created_at: z.string().optional(),
    message: z.object({
      role: z.enum(['system', 'user', 'assistant']),
      content: z.string(),
    }),
    done: z.boolean(),
    total_duration: z.number().optional(),
    eval_count: z.number().optional(),
  })
  .passthrough();

export type OllamaChatResponse = z.infer<typeof chatResponseSchema>;

export class OllamaClient {
  private baseUrl: string;
  private defaultTimeout: number;

  constructor(baseUrl: string = OLLAMA_BASE_URL, defaultTimeout: number = 300000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.defaultTimeout = defaultTimeout;
  }

  /**
   * Chat completion using the /api/chat endpoint. Aborts on `timeout` or when
   * `signal` fires, whichever comes first.
   */
  async chat(
    request: OllamaChatRequest,
    timeout?: number,
    signal?: AbortSignal,
  ): Promise<OllamaChatResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout ?? this.defaultTimeout);
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...request, stream: false }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new Error(`Ollama chat failed: ${response.status} - ${error}`);
      }

      const parsed = chatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Ollama chat returned an unexpected body: ${parsed.error.message}`);
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

export type CompleteOptions = Partial<ModelConfig> & {
  system?: string;
  format?: 'json';
  signal?: AbortSignal;
};

/**
 * High-level completion function with model type selection.
 */
export async function complete(
  prompt: string,
  modelType: OllamaModelType = 'SCORING',
  options?: CompleteOptions,
): Promise<string> {
  const client = new OllamaClient();
  const config = { ...defaultModelConfigs[modelType], ...options };

  const messages: OllamaChatMessage[] = [];

  if (options?.system) {
    messages.push({ role: 'system', content: options.system });
  }

  messages.push({ role: 'user', content: prompt });

  const response = await client.chat(
    {
      model: config.model,
      messages,
      format: options?.format,
      options: {
        temperature: config.temperature,
        top_p: config.topP,
        num_predict: config.maxTokens,
      },
    },
    config.timeout,
    options?.signal,
  );

  return response.message.content;
}

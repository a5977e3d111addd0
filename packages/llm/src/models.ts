/**
 * Ollama model configuration loaded from environment variables.
 */

export const OllamaModels = {
  /** Per-job match scoring; runs once for every unscored job, so a small fast model. */
  SCORING: process.env.OLLAMA_MODEL_SCORING ?? 'llama3.1:8b-instruct-q4_K_M',

  /** On-demand deep analysis (gaps, cover letter points) with JSON output. */
  ANALYSIS: process.env.OLLAMA_MODEL_ANALYSIS ?? 'qwen2.5:14b-instruct-q4_K_M',
} as const;

export type OllamaModelType = keyof typeof OllamaModels;

export const OLLAMA_BASE_URL = process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434';

export interface ModelConfig {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  timeout?: number;
}

export const defaultModelConfigs: Record<OllamaModelType, ModelConfig> = {
  SCORING: {
    model: OllamaModels.SCORING,
    temperature: 0,
    maxTokens: 1024,
    timeout: 180000, // 3 minutes per job
  },
  ANALYSIS: {
    model: OllamaModels.ANALYSIS,
    temperature: 0.2,
    maxTokens: 4096,
    timeout: 300000,
  },
};

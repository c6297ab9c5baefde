/**
 * Review Model Configuration
 *
 * Picks the reasoning model that coaches the learner's sentences.
 * Both providers speak the OpenAI chat-completions protocol and stream
 * reasoning deltas alongside the answer.
 *
 * - Fast: Groq gpt-oss-120b (low latency)
 * - Slow: Deepinfra gpt-oss-120b (cost-optimized)
 */

import OpenAI from 'openai';
import { VocabError } from './errors';

export type ModelSpeed = 'fast' | 'slow';

export interface ModelConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  provider: 'groq' | 'deepinfra';
}

export interface GenerationDefaults {
  temperature: number;
  maxOutputTokens: number;
}

/**
 * Get the model configuration for a speed, honouring REVIEW_MODEL as a model-name override
 */
export function getModelConfig(speed: ModelSpeed): ModelConfig {
  const override = process.env.REVIEW_MODEL?.trim();

  if (speed === 'fast') {
    return {
      apiKey: process.env.GROQ_API_KEY || '',
      baseURL: 'https://api.groq.com/openai/v1',
      model: override || 'openai/gpt-oss-120b', // Groq uses openai/ prefix
      provider: 'groq'
    };
  }

  return {
    apiKey: process.env.DEEPINFRA_API_KEY || '',
    baseURL: 'https://api.deepinfra.com/v1/openai',
    model: override || 'openai/gpt-oss-120b', // Deepinfra uses openai/ prefix
    provider: 'deepinfra'
  };
}

export function getModelSpeed(): ModelSpeed {
  return process.env.REVIEW_MODEL_SPEED?.toLowerCase() === 'slow' ? 'slow' : 'fast';
}

export function getGenerationDefaults(): GenerationDefaults {
  const rawTemperature = Number(process.env.REVIEW_TEMPERATURE ?? '0.7');
  const temperature = Math.min(
    2,
    Math.max(0, Number.isFinite(rawTemperature) ? rawTemperature : 0.7),
  );
  const maxOutputTokens = Math.min(
    16384,
    Math.max(1024, Number(process.env.REVIEW_MAX_TOKENS ?? '16384') || 16384),
  );
  return { temperature, maxOutputTokens };
}

/**
 * Create an OpenAI-compatible client for the configured provider
 */
export function createModelClient(speed: ModelSpeed = getModelSpeed()) {
  const config = getModelConfig(speed);
  if (!config.apiKey) {
    const envName = config.provider === 'groq' ? 'GROQ_API_KEY' : 'DEEPINFRA_API_KEY';
    throw new VocabError('configuration', `${envName} is not set`, `Model API key required via ${envName} env var`);
  }

  return {
    client: new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    }),
    model: config.model,
    provider: config.provider,
    config
  };
}

import { afterEach, describe, expect, it, vi } from 'vitest';
import { createModelClient, getGenerationDefaults, getModelConfig, getModelSpeed } from '../model-config';

describe('model-config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('maps speeds to providers', () => {
    vi.stubEnv('REVIEW_MODEL', '');
    vi.stubEnv('GROQ_API_KEY', 'test-key');

    expect(getModelConfig('fast')).toEqual({
      apiKey: 'test-key',
      baseURL: 'https://api.groq.com/openai/v1',
      model: 'openai/gpt-oss-120b',
      provider: 'groq',
    });
    expect(getModelConfig('slow').provider).toBe('deepinfra');
  });

  it('lets REVIEW_MODEL override the model name', () => {
    vi.stubEnv('REVIEW_MODEL', 'openai/gpt-oss-20b');

    expect(getModelConfig('slow').model).toBe('openai/gpt-oss-20b');
  });

  it('reads the speed from the environment', () => {
    vi.stubEnv('REVIEW_MODEL_SPEED', 'SLOW');
    expect(getModelSpeed()).toBe('slow');
    vi.stubEnv('REVIEW_MODEL_SPEED', 'turbo');
    expect(getModelSpeed()).toBe('fast');
  });

  it('clamps generation settings', () => {
    vi.stubEnv('REVIEW_TEMPERATURE', '5');
    vi.stubEnv('REVIEW_MAX_TOKENS', '99999');
    expect(getGenerationDefaults()).toEqual({ temperature: 2, maxOutputTokens: 16384 });

    vi.stubEnv('REVIEW_TEMPERATURE', 'warm');
    vi.stubEnv('REVIEW_MAX_TOKENS', '10');
    expect(getGenerationDefaults()).toEqual({ temperature: 0.7, maxOutputTokens: 1024 });
  });

  it('refuses to build a client without a key', () => {
    vi.stubEnv('DEEPINFRA_API_KEY', '');

    let err: unknown;
    try {
      createModelClient('slow');
    } catch (e) {
      err = e;
    }

    expect(err).toMatchObject({ name: 'VocabError', kind: 'configuration', detail: 'DEEPINFRA_API_KEY is not set' });
  });

  it('builds a client for the configured provider', () => {
    vi.stubEnv('REVIEW_MODEL', '');
    vi.stubEnv('GROQ_API_KEY', 'test-key');

    const { model, provider, client } = createModelClient('fast');

    expect(provider).toBe('groq');
    expect(model).toBe('openai/gpt-oss-120b');
    expect(client.baseURL).toBe('https://api.groq.com/openai/v1');
  });
});

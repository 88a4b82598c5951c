import { describe, it, expect } from 'vitest';
import { createProviderFromConfig } from '../../../src/core/container.js';
import { DEFAULT_CONFIG } from '../../../src/config/index.js';

describe('createProviderFromConfig', () => {
  it('builds an OpenRouter provider that needs a key', () => {
    const config = structuredClone(DEFAULT_CONFIG);

    const withoutKey = createProviderFromConfig(config);
    config.llm.apiKey = 'test-secret';
    const withKey = createProviderFromConfig(config);

    expect(withoutKey.name).toBe('openrouter');
    expect(withoutKey.isAvailable()).toBe(false);
    expect(withKey.isAvailable()).toBe(true);
  });

  it('builds a provider for a local OpenAI-compatible server', () => {
    const config = structuredClone(DEFAULT_CONFIG);
    config.llm.provider = 'openai-compatible';
    config.llm.baseUrl = 'http://localhost:11434/v1';

    const provider = createProviderFromConfig(config);

    expect(provider.name).toBe('openai-compatible');
    expect(provider.isAvailable()).toBe(true);
  });
});

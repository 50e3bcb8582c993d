/**
 * Tests for embedding provider construction.
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, type EmbeddingConfig } from '../../src/config/workspace-config.js';
import { createEmbedder, embedderRegistry, HttpEmbedder } from '../../src/models/index.js';
import { ConfigError } from '../../src/utils/errors.js';

function embeddingConfig(overrides: Partial<EmbeddingConfig> = {}): EmbeddingConfig {
  return {
    enabled: true,
    provider: 'ollama',
    model: 'nomic-embed-text',
    baseUrl: 'http://localhost:11434',
    apiKey: '',
    timeoutMs: 1000,
    maxConcurrent: 2,
    ...overrides,
  };
}

describe('createEmbedder', () => {
  it('returns undefined when embedding is disabled', () => {
    expect(createEmbedder(embeddingConfig({ enabled: false }))).toBeUndefined();
  });

  it('builds the default provider', () => {
    const embedder = createEmbedder(DEFAULT_CONFIG.embedding);
    expect(embedder).toBeInstanceOf(HttpEmbedder);
    expect(embedder?.modelName).toBe('nomic-embed-text');
  });

  it('builds an openai-style embedder', () => {
    const embedder = createEmbedder(
      embeddingConfig({ provider: 'openai', model: 'text-embed', baseUrl: 'https://embed.test/v1' }),
    );
    expect(embedder).toBeInstanceOf(HttpEmbedder);
    expect(embedder?.modelName).toBe('text-embed');
  });

  it('requires a base URL for remote providers', () => {
    expect(() => createEmbedder(embeddingConfig({ provider: 'openai', baseUrl: '' }))).toThrow(ConfigError);
  });

  it('rejects unknown providers', () => {
    expect(() => embedderRegistry.create('cohere', embeddingConfig())).toThrow(
      'Unknown embedding provider: cohere. Available: ollama, openai',
    );
  });
});

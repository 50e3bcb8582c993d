/**
 * Remote embedding providers over HTTP.
 *
 * - `ollama`: `POST {baseUrl}/api/embed` with `{model, input}` → `{embeddings}`
 * - `openai`: `POST {baseUrl}/embeddings` with `{model, input}` → `{data: [{embedding}]}`
 *
 * Every call is bounded by `AbortSignal.timeout(timeoutMs)`.
 */

import type { EmbeddingProvider } from './embedding-provider.js';
import { ConfigError, EmbeddingError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http-embedder');

/** Texts per request. */
const MAX_BATCH_SIZE = 50;

export type HttpEmbeddingFlavor = 'ollama' | 'openai';

export interface HttpEmbedderOptions {
  flavor: HttpEmbeddingFlavor;
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === 'number');
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

/**
 * Pull the embedding list out of a provider response.
 * Undefined when the payload does not have the expected shape.
 */
export function parseEmbeddingResponse(flavor: HttpEmbeddingFlavor, body: unknown): number[][] | undefined {
  const list = flavor === 'ollama' ? field(body, 'embeddings') : field(body, 'data');
  if (!Array.isArray(list)) return undefined;

  const vectors = flavor === 'ollama' ? list : list.map((entry) => field(entry, 'embedding'));
  return vectors.every(isVector) ? vectors : undefined;
}

export class HttpEmbedder implements EmbeddingProvider {
  readonly modelName: string;
  private readonly url: string;

  /**
   * @throws ConfigError when no base URL is configured
   */
  constructor(private readonly options: HttpEmbedderOptions) {
    if (!options.baseUrl) {
      throw new ConfigError(`embedding.baseUrl is required for the ${options.flavor} provider`, 'MISSING_REQUIRED');
    }
    this.modelName = options.model;
    const base = options.baseUrl.replace(/\/+$/, '');
    this.url = options.flavor === 'ollama' ? `${base}/api/embed` : `${base}/embeddings`;
  }

  private async request(texts: string[]): Promise<number[][]> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const start = performance.now();
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ model: this.modelName, input: texts }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      log.error('Embedding request failed', { url: this.url, error: errorMessage(error) });
      throw new EmbeddingError(`Embedding request to ${this.url} failed`, 'EMBED_FAILED', error);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      log.error('Embedding request rejected', { url: this.url, status: response.status });
      throw new EmbeddingError(
        `Embedding request failed (${response.status}): ${body.slice(0, 200)}`,
        'EMBED_FAILED',
      );
    }

    const vectors = parseEmbeddingResponse(this.options.flavor, await response.json());
    if (!vectors || vectors.length !== texts.length) {
      throw new EmbeddingError(
        `Unexpected ${this.options.flavor} embedding response`,
        'EMBED_RESPONSE_INVALID',
      );
    }

    log.debug('Embedded batch', {
      provider: this.options.flavor,
      size: texts.length,
      durationMs: Math.round(performance.now() - start),
    });
    return vectors;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [embedding] = await this.request([text]);
    if (!embedding) {
      throw new EmbeddingError('Provider returned no embedding', 'EMBED_RESPONSE_INVALID');
    }
    return embedding;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      results.push(...(await this.request(texts.slice(i, i + MAX_BATCH_SIZE))));
    }
    return results;
  }
}

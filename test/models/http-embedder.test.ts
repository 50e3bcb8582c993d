/**
 * Tests for the HTTP embedding providers (fetch is stubbed).
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpEmbedder, parseEmbeddingResponse, type HttpEmbedderOptions } from '../../src/models/http-embedder.js';
import { ConfigError, EmbeddingError } from '../../src/utils/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestInput(init: RequestInit | undefined): string[] {
  const parsed: unknown = JSON.parse(String(init?.body));
  const input = typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'input') : undefined;
  return Array.isArray(input) ? input.map(String) : [];
}

const ollama: HttpEmbedderOptions = {
  flavor: 'ollama',
  baseUrl: 'http://localhost:11434/',
  model: 'nomic-embed-text',
  timeoutMs: 1000,
};

describe('HttpEmbedder', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts to the ollama embed endpoint', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ embeddings: [[0.1, 0.2]] }));
    const embedder = new HttpEmbedder(ollama);

    expect(await embedder.embedQuery('hello')).toEqual([0.1, 0.2]);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://localhost:11434/api/embed');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ model: 'nomic-embed-text', input: ['hello'] });
  });

  it('sends a bearer token to openai-compatible endpoints', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ data: [{ embedding: [1, 0] }, { embedding: [0, 1] }] }));
    const embedder = new HttpEmbedder({
      flavor: 'openai',
      baseUrl: 'https://embeddings.test/v1',
      model: 'text-embedding-3-small',
      apiKey: 'test-secret',
      timeoutMs: 1000,
    });

    expect(await embedder.embedDocuments(['a', 'b'])).toEqual([[1, 0], [0, 1]]);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://embeddings.test/v1/embeddings');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret');
  });

  it('splits documents into batches of 50', async () => {
    fetchMock.mockImplementation(async (_url, init) =>
      jsonResponse({ embeddings: requestInput(init).map((text) => [text.length]) }),
    );
    const embedder = new HttpEmbedder(ollama);
    const texts = Array.from({ length: 120 }, (_, i) => 'x'.repeat(i + 1));

    const vectors = await embedder.embedDocuments(texts);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(fetchMock.mock.calls.map(([, init]) => requestInput(init).length)).toEqual([50, 50, 20]);
    expect(vectors).toHaveLength(120);
    expect(vectors[119]).toEqual([120]);
  });

  it('throws EMBED_FAILED on a non-2xx status', async () => {
    fetchMock.mockResolvedValue(new Response('model not found', { status: 404 }));
    const embedder = new HttpEmbedder(ollama);

    await expect(embedder.embedQuery('hello')).rejects.toMatchObject({
      code: 'EMBED_FAILED',
      message: 'Embedding request failed (404): model not found',
    });
  });

  it('throws EMBED_FAILED when the request itself fails', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const embedder = new HttpEmbedder(ollama);

    await expect(embedder.embedQuery('hello')).rejects.toThrow(EmbeddingError);
  });

  it('rejects a response with the wrong number of vectors', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ embeddings: [[1]] }));
    const embedder = new HttpEmbedder(ollama);

    await expect(embedder.embedDocuments(['a', 'b'])).rejects.toMatchObject({ code: 'EMBED_RESPONSE_INVALID' });
  });

  it('requires a base URL', () => {
    expect(() => new HttpEmbedder({ ...ollama, baseUrl: '' })).toThrow(ConfigError);
  });
});

describe('parseEmbeddingResponse', () => {
  it('reads ollama and openai shapes', () => {
    expect(parseEmbeddingResponse('ollama', { embeddings: [[1, 2]] })).toEqual([[1, 2]]);
    expect(parseEmbeddingResponse('openai', { data: [{ embedding: [3] }] })).toEqual([[3]]);
  });

  it('returns undefined for malformed payloads', () => {
    expect(parseEmbeddingResponse('ollama', { data: [] })).toBeUndefined();
    expect(parseEmbeddingResponse('ollama', { embeddings: [[]] })).toBeUndefined();
    expect(parseEmbeddingResponse('openai', { data: [{ embedding: ['x'] }] })).toBeUndefined();
    expect(parseEmbeddingResponse('openai', null)).toBeUndefined();
  });
});

import { describe, expect, it } from 'vitest';
import { createEmbeddingProvider } from '../src/embeddings';
import { OllamaEmbeddingProvider } from '../src/embeddings/ollama';
import { OpenAIProvider } from '../src/embeddings/openai';
import { EmbeddingRequestError } from '../src/embeddings/provider';
import { jsonResponse, mockFetch, requestJson, requestUrl } from './support/stubs';

describe('OllamaEmbeddingProvider', () => {
  it('posts the batch to /api/embed and returns Float32 vectors', async () => {
    const fetchMock = mockFetch(async () => jsonResponse({ model: 'paraphrase-multilingual', embeddings: [[0.5, 0.25], [1, 0]] }));
    const provider = new OllamaEmbeddingProvider({ host: 'http://ollama.test:11434/', model: 'paraphrase-multilingual', fetch: fetchMock });

    const vectors = await provider.embed(['foo', 'bar']);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(requestUrl(fetchMock.mock.calls[0])).toBe('http://ollama.test:11434/api/embed');
    expect(requestJson(fetchMock.mock.calls[0])).toEqual({ model: 'paraphrase-multilingual', input: ['foo', 'bar'] });
    expect(vectors[0]).toBeInstanceOf(Float32Array);
    expect(Array.from(vectors[0])).toEqual([0.5, 0.25]);
    expect(Array.from(vectors[1])).toEqual([1, 0]);
    expect(provider.dim).toBe(2);
  });

  it('skips the request for an empty batch', async () => {
    const fetchMock = mockFetch(async () => jsonResponse({ embeddings: [] }));
    const provider = new OllamaEmbeddingProvider({ host: 'http://ollama.test:11434', model: 'm', fetch: fetchMock });

    await expect(provider.embed([])).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('propagates HTTP errors with the response body', async () => {
    const fetchMock = mockFetch(async () => new Response('model "nope" not found', { status: 404, statusText: 'Not Found' }));
    const provider = new OllamaEmbeddingProvider({ host: 'http://ollama.test:11434', model: 'nope', fetch: fetchMock });

    await expect(provider.embed(['foo'])).rejects.toThrow('Ollama embed error: 404 Not Found - model "nope" not found');
  });

  it('rejects a response with the wrong number of embeddings', async () => {
    const fetchMock = mockFetch(async () => jsonResponse({ embeddings: [[1, 2]] }));
    const provider = new OllamaEmbeddingProvider({ host: 'http://ollama.test:11434', model: 'm', fetch: fetchMock });

    await expect(provider.embed(['a', 'b'])).rejects.toBeInstanceOf(EmbeddingRequestError);
  });

  it('wraps network failures', async () => {
    const fetchMock = mockFetch(async () => {
      throw new TypeError('fetch failed');
    });
    const provider = new OllamaEmbeddingProvider({ host: 'http://ollama.test:11434', model: 'm', fetch: fetchMock });

    await expect(provider.embed(['a'])).rejects.toThrow('Ollama embed request to http://ollama.test:11434/api/embed failed');
  });
});

describe('createEmbeddingProvider', () => {
  const base = { model: 'm', maxTokens: 512, ollama: { host: 'http://ollama.test:11434' }, openai: { apiKey: 'test-key' } };

  it('builds the configured backend', () => {
    expect(createEmbeddingProvider({ ...base, provider: 'ollama' })).toBeInstanceOf(OllamaEmbeddingProvider);
    expect(createEmbeddingProvider({ ...base, provider: 'openai' })).toBeInstanceOf(OpenAIProvider);
  });
});

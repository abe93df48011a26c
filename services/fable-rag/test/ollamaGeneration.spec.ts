import { describe, expect, it } from 'vitest';
import { GenerationCancelled, ProviderOutputError, ProviderTimeout, ProviderUnavailable } from '../src/errors';
import { OllamaGenerationProvider } from '../src/generation/ollama';
import { silentLogger } from '../src/logger';
import { jsonResponse, mockFetch, requestJson, requestUrl } from './support/stubs';

function makeProvider(fetchImpl: ReturnType<typeof mockFetch>) {
  return new OllamaGenerationProvider({ name: 'ollama', host: 'http://ollama.test:11434/', logger: silentLogger, fetch: fetchImpl });
}

/** A fetch that never answers and rejects once its signal aborts. */
function hangingFetch() {
  return mockFetch(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
      }),
  );
}

describe('OllamaGenerationProvider', () => {
  it('posts a non-streaming generate request and returns the response text', async () => {
    const fetchMock = mockFetch(async () => jsonResponse({ model: 'llama3.2', response: '  The heron lied.\n', done: true }));
    const provider = makeProvider(fetchMock);

    await expect(provider.generate('the prompt', 'llama3.2', { timeoutMs: 5_000 })).resolves.toBe('The heron lied.');
    expect(requestUrl(fetchMock.mock.calls[0])).toBe('http://ollama.test:11434/api/generate');
    expect(requestJson(fetchMock.mock.calls[0])).toEqual({ model: 'llama3.2', prompt: 'the prompt', stream: false });
  });

  it('drops a leading think block', async () => {
    const provider = makeProvider(mockFetch(async () => jsonResponse({ response: '<think>\nweighing fables\n</think>\n\nFable 1 fits.' })));
    await expect(provider.generate('p', 'qwen3', { timeoutMs: 5_000 })).resolves.toBe('Fable 1 fits.');
  });

  it('maps HTTP errors to ProviderUnavailable', async () => {
    const provider = makeProvider(mockFetch(async () => new Response('model "llama9" not found', { status: 404, statusText: 'Not Found' })));

    const err = await provider.generate('p', 'llama9', { timeoutMs: 5_000 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderUnavailable);
    expect(err).toMatchObject({ status: 502, message: 'ollama unavailable: HTTP 404 Not Found - model "llama9" not found' });
  });

  it('maps network failures to ProviderUnavailable', async () => {
    const provider = makeProvider(
      mockFetch(async () => {
        throw new TypeError('fetch failed');
      }),
    );
    await expect(provider.generate('p', 'llama3.2', { timeoutMs: 5_000 })).rejects.toThrow(
      'ollama unavailable: request to http://ollama.test:11434/api/generate failed: fetch failed',
    );
  });

  it('aborts the request at the deadline', async () => {
    const provider = makeProvider(hangingFetch());
    await expect(provider.generate('p', 'llama3.2', { timeoutMs: 50 })).rejects.toBeInstanceOf(ProviderTimeout);
  });

  it('aborts the request when the caller cancels', async () => {
    const fetchMock = hangingFetch();
    const provider = makeProvider(fetchMock);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(provider.generate('p', 'llama3.2', { timeoutMs: 5_000, signal: controller.signal })).rejects.toBeInstanceOf(
      GenerationCancelled,
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not call the daemon for an already aborted request', async () => {
    const fetchMock = hangingFetch();
    const controller = new AbortController();
    controller.abort();

    await expect(makeProvider(fetchMock).generate('p', 'm', { timeoutMs: 5_000, signal: controller.signal })).rejects.toBeInstanceOf(
      GenerationCancelled,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports a successful status with a non-JSON body as unusable output', async () => {
    const provider = makeProvider(
      mockFetch(async () => new Response('<html>proxy</html>', { status: 200, headers: { 'Content-Type': 'text/html' } })),
    );

    const err = await provider.generate('p', 'llama3.2', { timeoutMs: 5_000 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderOutputError);
    expect(err).toMatchObject({ code: 'provider_output_error', status: 502 });
  });

  it('rejects a body without a response', async () => {
    const provider = makeProvider(mockFetch(async () => jsonResponse({ error: 'unexpected' })));
    await expect(provider.generate('p', 'm', { timeoutMs: 5_000 })).rejects.toBeInstanceOf(ProviderOutputError);
  });

  it('rejects an empty response', async () => {
    const provider = makeProvider(mockFetch(async () => jsonResponse({ response: '   ' })));
    await expect(provider.generate('p', 'm', { timeoutMs: 5_000 })).rejects.toThrow('ollama returned unusable output: empty response');
  });
});

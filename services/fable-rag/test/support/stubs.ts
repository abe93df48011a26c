import { vi } from 'vitest';
import type { EmbeddingProvider, FetchLike } from '../../src/embeddings/provider';
import type { Fable } from '../../src/types';

// each axis is one theme; a text scores on an axis once per keyword it contains
const AXES: string[][] = [
  ['lie', 'liar', 'lying', 'truth', 'honest'],
  ['race', 'slow', 'speed', 'steady', 'fast'],
  ['work', 'prepare', 'winter', 'summer', 'idle'],
  ['unity', 'together', 'quarrel'],
  ['kindness', 'mercy', 'spare', 'grateful', 'free'],
];

export const KEYWORD_DIM = AXES.length + 1;

/** Deterministic, unit-length vector from keyword counts, plus a small bias so no vector is zero. */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  const raw = AXES.map((words) => words.filter((word) => lower.includes(word)).length);
  raw.push(0.1);
  const norm = Math.sqrt(raw.reduce((sum, v) => sum + v * v, 0));
  return raw.map((v) => v / norm);
}

export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'stub';
  readonly model = 'keyword-axes';
  dim = 0;
  readonly calls: string[][] = [];
  failures = 0;

  async embed(texts: string[]): Promise<Float32Array[]> {
    this.calls.push(texts);
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('connect ECONNREFUSED 127.0.0.1:11434');
    }
    return texts.map((text) => Float32Array.from(keywordVector(text)));
  }
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

export function mockFetch(handler: (...args: Parameters<FetchLike>) => Promise<Response>) {
  return vi.fn(handler);
}

export function requestUrl(call: Parameters<FetchLike>): string {
  const [input] = call;
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

export function requestJson(call: Parameters<FetchLike>): unknown {
  const body = call[1]?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

/**
 * Ollama stand-in: `/api/embed` answers with keyword vectors and
 * `/api/generate` with `answer`.
 */
export function fakeOllama(answer = 'The heron lied until nobody believed it.') {
  return mockFetch(async (...call) => {
    const url = requestUrl(call);
    const body = requestJson(call);
    if (url.endsWith('/api/embed') && isRecord(body) && Array.isArray(body.input)) {
      return jsonResponse({ model: body.model, embeddings: body.input.map((text) => keywordVector(String(text))) });
    }
    if (url.endsWith('/api/generate')) {
      return jsonResponse({ model: isRecord(body) ? body.model : undefined, response: answer, done: true });
    }
    return new Response('not found', { status: 404, statusText: 'Not Found' });
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function makeFable(id: number, overrides: Partial<Fable> = {}): Fable {
  return {
    id,
    title: `Fable ${id}`,
    content: `Content of fable ${id}.`,
    moral: `Moral ${id}.`,
    language: 'en',
    word_count: 4,
    ...overrides,
  };
}

/** Story data in the raw corpus format. */
export const SAMPLE_CORPUS = {
  stories: [
    {
      number: '01',
      title: 'The Heron Who Cried Flood',
      story: ['A heron shrieked that the river was rising when it was not.', 'When the flood truly came, no bird believed the liar.'],
      moral: 'A liar is not believed even when telling the truth.',
      characters: ['Heron'],
    },
    {
      number: '02',
      title: 'The Snail and the Jackrabbit',
      story: ['A fast jackrabbit raced a slow snail and fell asleep.', 'The steady snail won the race.'],
      moral: 'Steady effort beats careless speed.',
    },
    {
      number: '03',
      title: 'The Beaver and the Otter',
      story: ['The beaver worked all summer to prepare its lodge.', 'The idle otter shivered in winter.'],
      moral: 'Prepare today for tomorrow.',
    },
  ],
};

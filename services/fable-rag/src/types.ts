export type FableId = number;

/** A single story record. Created once at corpus load and never mutated. */
export interface Fable {
  id: FableId;
  title: string;
  content: string;
  moral: string;
  language: string;
  word_count: number;
}

export type Vector = Float32Array;

export interface SearchResult {
  fable: Fable;
  /** Similarity, higher is closer. */
  score: number;
}

export interface GenerationRequest {
  query: string;
  limit: number;
  provider?: string;
  model?: string;
}

export interface GenerationResponse {
  answer: string;
  /** Ids of the fables that made it into the prompt, in rank order. */
  sources: FableId[];
  provider_used: string;
  model_used: string;
}

/** Text that represents a fable in embedding space. */
export function fableEmbeddingText(fable: Pick<Fable, 'title' | 'content' | 'moral'>): string {
  return `${fable.title}. ${fable.content} Moral: ${fable.moral}`;
}

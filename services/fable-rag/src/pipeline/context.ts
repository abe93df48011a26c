import type { Fable, FableId, SearchResult } from '../types';

export const NO_CONTEXT_NOTICE = '(no matching fables found)';

const BLOCK_SEPARATOR = '\n\n';

export interface AssembledContext {
  text: string;
  /** Ids of the fables whose blocks made it into `text`, in rank order. */
  sources: FableId[];
}

export function renderFable(fable: Fable, position: number): string {
  return `Fable ${position}: ${fable.title}\nContent: ${fable.content}\nMoral: ${fable.moral}`;
}

/**
 * Renders ranked results into one context block of at most `budget` characters.
 * Lower-ranked fables are dropped first; a top fable that alone exceeds the
 * budget is cut short and ends with an ellipsis.
 */
export function assembleContext(results: SearchResult[], budget: number): AssembledContext {
  const blocks: string[] = [];
  const sources: FableId[] = [];
  let used = 0;

  for (const [i, { fable }] of results.entries()) {
    const block = renderFable(fable, i + 1);
    const cost = block.length + (blocks.length > 0 ? BLOCK_SEPARATOR.length : 0);
    if (used + cost > budget) {
      if (blocks.length === 0 && budget > 1) {
        let cut = block.slice(0, budget - 1);
        // never end on the first half of a surrogate pair
        if (/[\uD800-\uDBFF]$/.test(cut)) cut = cut.slice(0, -1);
        blocks.push(`${cut.trimEnd()}…`);
        sources.push(fable.id);
      }
      break;
    }
    blocks.push(block);
    sources.push(fable.id);
    used += cost;
  }

  return { text: blocks.join(BLOCK_SEPARATOR), sources };
}

export function buildPrompt(context: string, query: string): string {
  return `Based on the following fables, answer the user's question.

${context || NO_CONTEXT_NOTICE}

User's question: ${query}

Please provide a helpful answer based on the fables above. Reference specific fables when relevant.`;
}

// src/routes/search.ts
import type { FastifyInstance } from 'fastify';
import type { RetrievalPipeline } from '../pipeline/pipeline';
import { badRequest, searchSchema } from './schemas';

export async function registerSearchRoutes(app: FastifyInstance, deps: { pipeline: Pick<RetrievalPipeline, 'search'> }) {
  app.post('/search', async (req, reply) => {
    const parsed = searchSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const { query, limit, score_threshold } = parsed.data;
    const results = await deps.pipeline.search(query, limit, score_threshold);

    return reply.send({
      query,
      results: results.map(({ fable, score }) => ({
        id: fable.id,
        title: fable.title,
        content: fable.content,
        moral: fable.moral,
        score,
        language: fable.language,
        word_count: fable.word_count,
      })),
      total_results: results.length,
    });
  });
}

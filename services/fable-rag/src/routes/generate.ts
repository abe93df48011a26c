// src/routes/generate.ts
import type { FastifyInstance } from 'fastify';
import type { ProviderRegistry } from '../generation/registry';
import type { RetrievalPipeline } from '../pipeline/pipeline';
import { badRequest, generateSchema } from './schemas';

export interface GenerateRouteDeps {
  pipeline: Pick<RetrievalPipeline, 'generate'>;
  registry: Pick<ProviderRegistry, 'describe'>;
}

export async function registerGenerateRoutes(app: FastifyInstance, deps: GenerateRouteDeps) {
  app.get('/models', async () => deps.registry.describe());

  app.post('/generate', async (req, reply) => {
    const parsed = generateSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    // a client that hangs up before the answer is ready cancels the provider call
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        req.log.info('Client disconnected, cancelling generation');
        controller.abort();
      }
    };
    reply.raw.on('close', onClose);

    try {
      const response = await deps.pipeline.generate(parsed.data, controller.signal);
      return reply.send(response);
    } finally {
      reply.raw.off('close', onClose);
    }
  });
}

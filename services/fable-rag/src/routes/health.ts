// src/routes/health.ts
import type { FastifyInstance } from 'fastify';
import type { VectorIndex } from '../contracts/vectorIndex';
import { ConnectionError } from '../errors';

export async function registerHealthRoutes(app: FastifyInstance, deps: { index: Pick<VectorIndex, 'describeCollection'> }) {
  app.get('/', async () => ({
    message: 'Fable retrieval and generation service',
    health: '/health',
  }));

  app.get('/health', async (req, reply) => {
    try {
      const info = await deps.index.describeCollection();
      return reply.send({
        status: info ? 'ok' : 'degraded',
        collection_exists: info !== null,
        fable_count: info?.count ?? 0,
      });
    } catch (err) {
      if (!(err instanceof ConnectionError)) throw err;
      req.log.error({ err }, 'Index store health check failed');
      return reply.code(503).send({ status: 'unavailable', collection_exists: false, fable_count: 0 });
    }
  });
}

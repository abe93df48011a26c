import cors from '@fastify/cors';
import Fastify, { type FastifyBaseLogger } from 'fastify';
import type { VectorIndex } from './contracts/vectorIndex';
import { FableRagError } from './errors';
import type { ProviderRegistry } from './generation/registry';
import type { Logger } from './logger';
import type { RetrievalPipeline } from './pipeline/pipeline';
import { registerFableRoutes } from './routes/fables';
import { registerGenerateRoutes } from './routes/generate';
import { registerHealthRoutes } from './routes/health';
import { registerSearchRoutes } from './routes/search';

export interface AppDeps {
  pipeline: Pick<RetrievalPipeline, 'search' | 'generate'>;
  index: Pick<VectorIndex, 'describeCollection' | 'getById'>;
  registry: Pick<ProviderRegistry, 'describe'>;
  logger: Logger;
  corsOrigins: string[];
}

export async function buildApp(deps: AppDeps) {
  const logger: FastifyBaseLogger = deps.logger;
  const app = Fastify({ logger });

  await app.register(cors, { origin: deps.corsOrigins });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof FableRagError) {
      if (err.status >= 500) {
        req.log.error({ err }, 'Request failed');
      } else {
        req.log.info({ code: err.code }, err.message);
      }
      return reply.code(err.status).send({ error: err.code, detail: err.message });
    }

    // fastify's own client errors: unparsable JSON, wrong content type, oversized body
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      req.log.info({ err: err.message }, 'Rejected request');
      return reply.code(err.statusCode).send({ error: 'bad_request', detail: err.message });
    }

    req.log.error({ err }, 'Unhandled error');
    return reply.code(500).send({ error: 'internal_error', detail: 'Internal server error' });
  });

  await registerHealthRoutes(app, deps);
  await registerSearchRoutes(app, deps);
  await registerGenerateRoutes(app, deps);
  await registerFableRoutes(app, deps);
  return app;
}

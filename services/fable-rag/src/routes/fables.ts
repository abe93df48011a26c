import type { FastifyInstance } from 'fastify';
import type { VectorIndex } from '../contracts/vectorIndex';
import { FableNotFoundError } from '../errors';
import { badRequest, fableParamsSchema } from './schemas';

export async function registerFableRoutes(app: FastifyInstance, deps: { index: Pick<VectorIndex, 'getById'> }) {
  app.get('/fables/:id', async (req, reply) => {
    const parsed = fableParamsSchema.safeParse(req.params);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const fable = await deps.index.getById(parsed.data.id);
    if (!fable) throw new FableNotFoundError(parsed.data.id);
    return reply.send(fable);
  });
}

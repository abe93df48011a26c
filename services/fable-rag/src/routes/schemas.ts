import type { FastifyReply } from 'fastify';
import { z } from 'zod';

export const searchSchema = z.object({
  query: z.string().trim().min(1, 'query required'),
  limit: z.number().int().min(1).max(20).default(5),
  score_threshold: z.number().min(0).max(1).optional(),
});

export const generateSchema = z.object({
  query: z.string().trim().min(1, 'query required'),
  limit: z.number().int().min(1).max(10).default(3),
  provider: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export const fableParamsSchema = z.object({
  id: z
    .string()
    .regex(/^-?\d+$/, 'id must be an integer')
    .transform((v) => Number(v)),
});

export function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: error.flatten() });
}

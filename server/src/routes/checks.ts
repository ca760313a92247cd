import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ResultStore } from '../store/types';

const listQuery = z.object({
  target: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100)
});

export async function registerCheckRoutes(app: FastifyInstance, store: ResultStore) {
  app.get('/api/checks', async (req) => {
    const query = listQuery.parse(req.query);
    const checks = await store.listChecks(query);
    return { checks };
  });
}

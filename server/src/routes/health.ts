import { FastifyInstance } from 'fastify';
import type { ResultStore } from '../store/types';

export async function registerHealthRoutes(app: FastifyInstance, store: ResultStore) {
  app.get('/api/health', async () => {
    await store.health();
    return { ok: true };
  });
}

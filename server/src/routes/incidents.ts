import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ResultStore } from '../store/types';

const listQuery = z.object({
  status: z.enum(['open', 'acknowledged', 'resolved']).optional(),
  target: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

const idParams = z.object({ id: z.coerce.number().int().positive() });

const ackBody = z.object({
  acknowledged: z.boolean().default(true),
  by: z.string().trim().min(1)
});

export async function registerIncidentRoutes(app: FastifyInstance, store: ResultStore) {
  app.get('/api/incidents', async (req) => {
    const query = listQuery.parse(req.query);
    const incidents = await store.listIncidents(query);
    return { incidents };
  });

  app.patch('/api/incidents/:id/ack', async (req, reply) => {
    const { id } = idParams.parse(req.params);
    const body = ackBody.parse(req.body);
    const incident = await store.acknowledgeIncident(id, body.acknowledged ? body.by : null);
    if (!incident) {
      return reply.code(404).send({ error: 'incident not found or already resolved' });
    }
    req.log.info(
      { incidentId: id, by: body.by, acknowledged: body.acknowledged },
      body.acknowledged ? 'incident acknowledged' : 'incident acknowledgement cleared'
    );
    return reply.send({ incident });
  });
}

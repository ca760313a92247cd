import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import type { Env } from './env';
import { registerCheckRoutes } from './routes/checks';
import { registerHealthRoutes } from './routes/health';
import { registerIncidentRoutes } from './routes/incidents';
import { registerTargetRoutes } from './routes/targets';
import type { ResultStore } from './store/types';
import type { MonitorConfig } from './targets';

export type ServerDeps = {
  env: Pick<Env, 'CORS_ORIGIN' | 'STATS_WINDOW_HOURS'>;
  store: ResultStore;
  loadConfig: () => Promise<MonitorConfig>;
  logger?: FastifyServerOptions['logger'];
};

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({ logger: deps.logger ?? true });

  await app.register(cors, {
    origin:
      deps.env.CORS_ORIGIN === '*' ? true : deps.env.CORS_ORIGIN.split(',').map((o) => o.trim())
  });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      return reply.code(400).send({
        error: 'invalid request',
        issues: err.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
      });
    }
    req.log.error({ err }, 'request failed');
    const statusCode = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    return reply.code(statusCode).send({ error: statusCode === 500 ? 'internal error' : err.message });
  });

  await registerHealthRoutes(app, deps.store);
  await registerTargetRoutes(app, deps);
  await registerIncidentRoutes(app, deps.store);
  await registerCheckRoutes(app, deps.store);

  return app;
}

import { FastifyInstance } from 'fastify';
import type { ServerDeps } from '../server';

const HOUR_MS = 60 * 60 * 1000;

export async function registerTargetRoutes(
  app: FastifyInstance,
  deps: Pick<ServerDeps, 'env' | 'store' | 'loadConfig'>
) {
  app.get('/api/targets', async () => {
    const config = await deps.loadConfig();
    const windowMs = deps.env.STATS_WINDOW_HOURS * HOUR_MS;
    const targets = await Promise.all(
      config.targets.map(async (target) => {
        const [stats, incident] = await Promise.all([
          deps.store.recentStats(target.name, windowMs),
          deps.store.openIncident(target.name)
        ]);
        return { ...target, stats, incident };
      })
    );
    return { targets };
  });
}

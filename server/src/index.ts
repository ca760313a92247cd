#!/usr/bin/env node
import type { ChannelRegistry } from './alerts/channels';
import { createPool, migrate } from './db';
import { loadEnv, type Env } from './env';
import { ConfigError, toErrorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import { runCycle } from './monitor/cycle';
import { formatChecks, formatCycleReport, formatIncidents, formatStats } from './report';
import { runConfiguredCycle, startScheduler } from './scheduler';
import { buildServer } from './server';
import { MemoryResultStore } from './store/memory';
import { PgResultStore } from './store/postgres';
import type { ResultStore } from './store/types';
import { loadMonitorConfig } from './targets';

const USAGE = 'Usage: watchpost [init|check [--dry-run]|serve|status [all|incidents|checks|stats] [limit]]';
const HOUR_MS = 60 * 60 * 1000;

const noChannels: ChannelRegistry = new Map();

class UsageError extends Error {}

function print(text: string) {
  process.stdout.write(`${text}\n`);
}

function openStore(env: Env): { store: ResultStore; migrate: () => Promise<void> } {
  const pool = createPool(env);
  return { store: new PgResultStore(pool), migrate: () => migrate(pool) };
}

async function init(env: Env, logger: Logger) {
  const { config, issues } = await loadMonitorConfig(env.TARGETS_FILE);
  issues.forEach((issue) => logger.warn({ index: issue.index }, issue.error.message));
  const { store, migrate: applySchema } = openStore(env);
  try {
    await applySchema();
    await store.syncTargets(config.targets);
    print(`Initialized: ${config.targets.length} target(s) synced from ${env.TARGETS_FILE}`);
  } finally {
    await store.close();
  }
}

async function check(env: Env, logger: Logger, dryRun: boolean) {
  if (dryRun) {
    const { config, issues } = await loadMonitorConfig(env.TARGETS_FILE);
    issues.forEach((issue) => logger.warn({ index: issue.index }, issue.error.message));
    const store = new MemoryResultStore();
    await store.syncTargets(config.targets);
    // Nothing is persisted and no notification leaves the process.
    const report = await runCycle(config, {
      store,
      channels: noChannels,
      logger,
      concurrency: env.CHECK_CONCURRENCY
    });
    print(formatCycleReport(report));
    return;
  }

  const { store } = openStore(env);
  try {
    const report = await runConfiguredCycle({ env, store, logger });
    print(formatCycleReport(report));
  } finally {
    await store.close();
  }
}

async function serve(env: Env, logger: Logger) {
  const { store } = openStore(env);
  const app = await buildServer({
    env,
    store,
    loadConfig: async () => (await loadMonitorConfig(env.TARGETS_FILE)).config,
    logger: { level: env.LOG_LEVEL }
  });
  await store.health();
  // A broken config file stops startup instead of failing every tick.
  await loadMonitorConfig(env.TARGETS_FILE);

  await app.listen({ host: env.HOST, port: env.PORT });
  const scheduler = startScheduler({ env, store, logger: app.log });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting down');
    scheduler.stop();
    await app.close();
    await store.close();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err: toErrorMessage(err) }, 'shutdown failed');
        process.exitCode = 1;
      });
    });
  }
}

async function status(env: Env, view: string, limitArg: string | undefined) {
  const limit = limitArg ? Number.parseInt(limitArg, 10) : NaN;
  const { store } = openStore(env);
  try {
    const sections: string[] = [];
    if (view === 'incidents' || view === 'all') {
      const open = await store.listIncidents({ status: 'open', limit: 100 });
      const acked = await store.listIncidents({ status: 'acknowledged', limit: 100 });
      sections.push(`== Open incidents ==\n${formatIncidents([...open, ...acked])}`);
    }
    if (view === 'stats' || view === 'all') {
      const { config } = await loadMonitorConfig(env.TARGETS_FILE);
      const windowMs = env.STATS_WINDOW_HOURS * HOUR_MS;
      const stats = await Promise.all(
        config.targets.map((target) => store.recentStats(target.name, windowMs))
      );
      sections.push(`== Uptime ==\n${formatStats(stats, env.STATS_WINDOW_HOURS)}`);
    }
    if (view === 'checks' || view === 'all') {
      const fallback = view === 'all' ? 10 : 20;
      const checks = await store.listChecks({
        limit: Number.isInteger(limit) && limit > 0 ? limit : fallback
      });
      sections.push(`== Recent checks ==\n${formatChecks(checks)}`);
    }
    print(sections.join('\n\n'));
  } finally {
    await store.close();
  }
}

async function main(argv: string[]) {
  const [command = 'check', ...rest] = argv;
  const env = loadEnv();
  const logger = createLogger(env);

  switch (command) {
    case 'init':
      return init(env, logger);
    case 'check':
      return check(env, logger, rest.includes('--dry-run'));
    case 'serve':
      return serve(env, logger);
    case 'status': {
      const view = rest[0] ?? 'all';
      if (!['all', 'incidents', 'checks', 'stats'].includes(view)) {
        throw new UsageError(`unknown status view '${view}'`);
      }
      return status(env, view, rest[1]);
    }
    default:
      throw new UsageError(`unknown command '${command}'`);
  }
}

main(process.argv.slice(2)).catch((err) => {
  if (err instanceof UsageError) {
    console.error(`${err.message}\n${USAGE}`);
  } else if (err instanceof ConfigError) {
    console.error(`configuration error: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});

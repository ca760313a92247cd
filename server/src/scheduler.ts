import { buildChannelRegistry } from './alerts/channels';
import type { Env } from './env';
import { toErrorMessage } from './errors';
import type { Logger } from './logger';
import { KeyedLock } from './monitor/concurrency';
import { runCycle, type CycleReport } from './monitor/cycle';
import type { ResultStore } from './store/types';
import { loadMonitorConfig, type LoadedConfig } from './targets';

const DAY_MS = 24 * 60 * 60 * 1000;

export type Scheduler = {
  stop: () => void;
};

export type ConfigLoader = (path: string) => Promise<LoadedConfig>;

export type CycleSummary = {
  targets: number;
  up: number;
  down: number;
  errors: number;
  alertsSent: number;
};

export function summarizeCycle(report: CycleReport): CycleSummary {
  let up = 0;
  let down = 0;
  let errors = 0;
  let alertsSent = 0;
  for (const target of report.targets) {
    if (target.error) {
      errors += 1;
    } else if (target.outcome?.status === 'success') {
      up += 1;
    } else {
      down += 1;
    }
    alertsSent += target.alerts.filter((alert) => alert.status === 'sent').length;
  }
  return { targets: report.targets.length, up, down, errors, alertsSent };
}

/**
 * Loads the monitor config, syncs its targets into the store and runs one cycle.
 * Per-target config issues are logged; a config that yields no targets throws.
 */
export async function runConfiguredCycle(params: {
  env: Env;
  store: ResultStore;
  logger: Logger;
  locks?: KeyedLock;
  load?: ConfigLoader;
}): Promise<CycleReport> {
  const { env, store, logger } = params;
  const load = params.load ?? loadMonitorConfig;
  const { config, issues } = await load(env.TARGETS_FILE);
  for (const issue of issues) {
    logger.warn({ index: issue.index, name: issue.name }, issue.error.message);
  }

  await store.syncTargets(config.targets);
  const channels = buildChannelRegistry(env, config.alerts);
  return runCycle(config, {
    store,
    channels,
    logger,
    concurrency: env.CHECK_CONCURRENCY,
    locks: params.locks
  });
}

/**
 * Runs a cycle now and then every CHECK_INTERVAL_SEC, measured from the start of
 * the previous cycle. The next cycle is only scheduled once the current one
 * finishes, so cycles never overlap. Retention cleanup runs at start and daily.
 */
export function startScheduler(params: {
  env: Env;
  store: ResultStore;
  logger: Logger;
  load?: ConfigLoader;
}): Scheduler {
  const { env, store, logger, load } = params;
  const locks = new KeyedLock();
  let timer: NodeJS.Timeout | null = null;
  let cleanupTimer: NodeJS.Timeout | null = null;
  let stopped = false;
  let running = false;

  const scheduleNext = (delayMs: number) => {
    if (stopped) {
      return;
    }
    timer = setTimeout(() => {
      void tick();
    }, delayMs);
  };

  const tick = async () => {
    if (running || stopped) {
      return;
    }
    running = true;
    const started = Date.now();
    try {
      const report = await runConfiguredCycle({ env, store, logger, locks, load });
      logger.info({ ...summarizeCycle(report), durationMs: Date.now() - started }, 'cycle complete');
    } catch (err) {
      logger.error({ err: toErrorMessage(err) }, 'cycle failed');
    } finally {
      running = false;
      scheduleNext(Math.max(0, env.CHECK_INTERVAL_SEC * 1000 - (Date.now() - started)));
    }
  };

  const cleanup = async () => {
    try {
      const removed = await store.cleanup(env.RETENTION_DAYS);
      logger.info(removed, 'retention cleanup completed');
    } catch (err) {
      logger.error({ err: toErrorMessage(err) }, 'retention cleanup failed');
    }
  };

  scheduleNext(0);
  void cleanup();
  cleanupTimer = setInterval(() => {
    void cleanup();
  }, DAY_MS);

  return {
    stop() {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      if (cleanupTimer) {
        clearInterval(cleanupTimer);
        cleanupTimer = null;
      }
    }
  };
}

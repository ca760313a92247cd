import { AlertDispatcher, type DispatchResult } from '../alerts/dispatcher';
import type { ChannelRegistry } from '../alerts/channels';
import { resolvePolicy } from '../alerts/policy';
import { checkTarget, type ProbeFn } from '../checker';
import { toErrorMessage } from '../errors';
import { IncidentEngine, type Transition } from '../incidents/engine';
import type { Logger } from '../logger';
import type { ResultStore } from '../store/types';
import { enabledTargets, type MonitorConfig } from '../targets';
import type { CheckOutcome, Target } from '../types';
import { KeyedLock, runWithConcurrency } from './concurrency';

export type TargetReport = {
  target: string;
  outcome: CheckOutcome | null;
  transitions: Transition[];
  alerts: DispatchResult[];
  error: string | null;
};

export type CycleReport = {
  startedAt: Date;
  finishedAt: Date;
  targets: TargetReport[];
  skipped: string[];
};

export type CycleDeps = {
  store: ResultStore;
  channels: ChannelRegistry;
  logger: Logger;
  concurrency: number;
  probe?: ProbeFn;
  locks?: KeyedLock;
  now?: () => Date;
};

const sharedLocks = new KeyedLock();

async function runTarget(
  target: Target,
  config: MonitorConfig,
  deps: {
    store: ResultStore;
    engine: IncidentEngine;
    dispatcher: AlertDispatcher;
    probe: ProbeFn;
    logger: Logger;
  }
): Promise<TargetReport> {
  const { store, engine, dispatcher, probe } = deps;
  const logger = deps.logger.child({ target: target.name });
  const report: TargetReport = {
    target: target.name,
    outcome: null,
    transitions: [],
    alerts: [],
    error: null
  };

  try {
    const result = await probe(target);
    const recorded = await store.append(result);
    report.outcome = recorded;
    logger.debug(
      { checkId: recorded.id, status: recorded.status, latencyMs: recorded.latencyMs },
      'check recorded'
    );

    // Earlier outcomes left unapplied by a crash or a store failure are replayed first.
    const pending = await store.pendingOutcomes(target.name);
    const policy = resolvePolicy(target, config.alerts);
    for (const outcome of pending) {
      const transition = await engine.apply(outcome);
      report.transitions.push(transition);
      if (transition.signal && transition.incident) {
        const sent = await dispatcher.dispatch(transition.signal, {
          target,
          incident: transition.incident,
          outcome,
          policy
        });
        report.alerts.push(...sent);
      }
    }
  } catch (err) {
    report.error = toErrorMessage(err);
    logger.error({ err: report.error }, 'target step aborted');
  }

  return report;
}

/**
 * One pass over every enabled target. Targets are probed concurrently up to
 * `deps.concurrency`; everything for a single target runs under its lock, so
 * outcomes are applied in the order they were appended. Disabled targets are
 * left untouched, including any incident they still have open.
 */
export async function runCycle(config: MonitorConfig, deps: CycleDeps): Promise<CycleReport> {
  const now = deps.now ?? (() => new Date());
  const locks = deps.locks ?? sharedLocks;
  const probe: ProbeFn = deps.probe ?? ((target) => checkTarget(target, now));
  const engine = new IncidentEngine(deps.store, deps.logger);
  const dispatcher = new AlertDispatcher({
    store: deps.store,
    channels: deps.channels,
    logger: deps.logger
  });

  const startedAt = now();
  const targets = enabledTargets(config);
  const skipped = config.targets.filter((target) => !target.enabled).map((target) => target.name);

  const reports = await runWithConcurrency(targets, deps.concurrency, (target) =>
    locks.run(target.name, () =>
      runTarget(target, config, {
        store: deps.store,
        engine,
        dispatcher,
        probe,
        logger: deps.logger
      })
    )
  );

  return { startedAt, finishedAt: now(), targets: reports, skipped };
}

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { PersistenceError } from '../src/errors';
import { silentLogger } from '../src/logger';
import { KeyedLock } from '../src/monitor/concurrency';
import { runCycle, type CycleDeps, type CycleReport } from '../src/monitor/cycle';
import { MemoryResultStore } from '../src/store/memory';
import type { MonitorConfig } from '../src/targets';
import type { CheckStatus, Target } from '../src/types';
import {
  makeConfig,
  makeTarget,
  recordingChannels,
  scriptedProbe
} from './helpers/data-builders';

describe('monitor/cycle', () => {
  let store: MemoryResultStore;
  let channels: ReturnType<typeof recordingChannels>;

  beforeEach(() => {
    store = new MemoryResultStore();
    channels = recordingChannels();
  });

  async function setup(targets: Target[]) {
    const config = makeConfig(targets);
    await store.syncTargets(config.targets);
    return config;
  }

  function deps(script: Record<string, CheckStatus[]>, overrides: Partial<CycleDeps> = {}): CycleDeps {
    return {
      store,
      channels: channels.registry,
      logger: silentLogger(),
      concurrency: 4,
      probe: scriptedProbe(script),
      locks: new KeyedLock(),
      ...overrides
    };
  }

  async function runCycles(config: MonitorConfig, cycleDeps: CycleDeps, count: number) {
    const reports: CycleReport[] = [];
    for (let i = 0; i < count; i++) {
      reports.push(await runCycle(config, cycleDeps));
    }
    return reports;
  }

  it('escalates svc-a across chat, email and sms, then recovers on chat', async () => {
    const config = await setup([makeTarget({ escalateAfter: { email: 3, sms: 5 } })]);
    const cycleDeps = deps({
      'svc-a': ['failure', 'failure', 'failure', 'failure', 'failure', 'success']
    });

    const reports = await runCycles(config, cycleDeps, 6);

    const sentPerCycle = reports.map((report) =>
      report.targets[0]?.alerts.filter((alert) => alert.status === 'sent').map((alert) => alert.channel)
    );
    expect(sentPerCycle).toEqual([['chat'], [], ['email'], [], ['sms'], ['chat']]);

    const counts = reports.map((report) => report.targets[0]?.transitions[0]?.incident?.failureCount);
    expect(counts).toEqual([1, 2, 3, 4, 5, 5]);
    expect(reports[5]?.targets[0]?.transitions[0]?.incident?.status).toBe('resolved');

    expect(channels.sent.map((item) => [item.channel, item.message.kind])).toEqual([
      ['chat', 'down'],
      ['email', 'escalation'],
      ['sms', 'escalation'],
      ['chat', 'recovered']
    ]);
    expect(channels.sent[3]?.message.durationMs).toBe(5 * 60_000);
    expect(await store.openIncident('svc-a')).toBeNull();
  });

  it('keeps escalating an acknowledged incident and announces its recovery', async () => {
    const config = await setup([makeTarget({ escalateAfter: { email: 3, sms: 5 } })]);
    const cycleDeps = deps({ 'svc-a': ['failure', 'failure', 'failure', 'success'] });

    const [opened] = await runCycles(config, cycleDeps, 1);
    const incidentId = opened?.targets[0]?.transitions[0]?.incident?.id;
    if (incidentId === undefined) throw new Error('expected an incident');
    await store.acknowledgeIncident(incidentId, 'oncall');

    const reports = await runCycles(config, cycleDeps, 3);

    expect(reports.map((report) => report.targets[0]?.transitions[0]?.incident?.status)).toEqual([
      'acknowledged',
      'acknowledged',
      'resolved'
    ]);
    expect(channels.sent.map((item) => [item.channel, item.message.kind])).toEqual([
      ['chat', 'down'],
      ['email', 'escalation'],
      ['chat', 'recovered']
    ]);
  });

  it('keeps concurrently failing targets independent', async () => {
    const config = await setup([
      makeTarget({ escalateAfter: { email: 3, sms: 5 } }),
      makeTarget({ name: 'svc-b', alertChannels: ['chat', 'email'], escalateAfter: { email: 2 } })
    ]);
    const cycleDeps = deps({
      'svc-a': ['failure', 'failure', 'failure'],
      'svc-b': ['failure', 'failure', 'failure']
    });

    await runCycles(config, cycleDeps, 3);

    const a = await store.openIncident('svc-a');
    const b = await store.openIncident('svc-b');
    expect(a?.failureCount).toBe(3);
    expect(b?.failureCount).toBe(3);
    expect(a?.id).not.toBe(b?.id);
    expect(a?.alerted).toEqual({ chat: true, email: true });
    expect(b?.alerted).toEqual({ chat: true, email: true });

    const bySend = channels.sent.map((item) => [item.message.target, item.channel, item.message.failureCount]);
    expect(bySend.filter(([target]) => target === 'svc-a')).toEqual([
      ['svc-a', 'chat', 1],
      ['svc-a', 'email', 3]
    ]);
    expect(bySend.filter(([target]) => target === 'svc-b')).toEqual([
      ['svc-b', 'chat', 1],
      ['svc-b', 'email', 2]
    ]);
  });

  it('never notifies for a target without alert channels', async () => {
    const config = await setup([makeTarget({ alertChannels: [] })]);
    const cycleDeps = deps({ 'svc-a': Array.from({ length: 10 }, (): CheckStatus => 'failure') });

    await runCycles(config, cycleDeps, 10);

    expect(channels.sent).toEqual([]);
    expect((await store.openIncident('svc-a'))?.failureCount).toBe(10);
  });

  it('retries a failed send on the next cycle', async () => {
    const config = await setup([makeTarget()]);
    const cycleDeps = deps({ 'svc-a': ['failure', 'failure'] });
    channels.failNext('chat');

    const [first, second] = await runCycles(config, cycleDeps, 2);

    expect(first?.targets[0]?.alerts).toEqual([
      { channel: 'chat', status: 'failed', error: 'chat transport unavailable' }
    ]);
    expect(second?.targets[0]?.alerts).toEqual([{ channel: 'chat', status: 'sent' }]);
    expect(channels.sent.map((item) => item.message.kind)).toEqual(['escalation']);
  });

  it('isolates a persistence failure to its target', async () => {
    const config = await setup([makeTarget(), makeTarget({ name: 'svc-b' })]);
    const append = store.append.bind(store);
    vi.spyOn(store, 'append').mockImplementation(async (result) => {
      if (result.target === 'svc-a') {
        throw new PersistenceError('disk full');
      }
      return append(result);
    });

    const report = await runCycle(config, deps({ 'svc-a': ['failure'], 'svc-b': ['failure'] }));

    expect(report.targets.map((target) => [target.target, target.error])).toEqual([
      ['svc-a', 'disk full'],
      ['svc-b', null]
    ]);
    expect(report.targets[0]?.outcome).toBeNull();
    expect(await store.openIncident('svc-a')).toBeNull();
    expect((await store.openIncident('svc-b'))?.failureCount).toBe(1);
  });

  it('applies outcomes left pending by an earlier failure in order', async () => {
    const config = await setup([makeTarget()]);
    const cycleDeps = deps({ 'svc-a': ['failure', 'failure'] });
    vi.spyOn(store, 'openIncident').mockRejectedValueOnce(new Error('connection reset'));

    const [first, second] = await runCycles(config, cycleDeps, 2);

    expect(first?.targets[0]?.error).toBe('apply check 1 for svc-a: connection reset');
    expect(second?.targets[0]?.transitions.map((t) => [t.outcome.id, t.action])).toEqual([
      [1, 'open'],
      [2, 'update']
    ]);
    expect(second?.targets[0]?.alerts).toEqual([{ channel: 'chat', status: 'sent' }]);
    expect((await store.openIncident('svc-a'))?.failureCount).toBe(2);
  });

  it('serializes overlapping cycles for the same target', async () => {
    const config = await setup([makeTarget()]);
    const cycleDeps = deps({ 'svc-a': ['failure', 'failure'] });

    const [first, second] = await Promise.all([
      runCycle(config, cycleDeps),
      runCycle(config, cycleDeps)
    ]);

    expect(first.targets[0]?.transitions.map((t) => t.action)).toEqual(['open']);
    expect(second.targets[0]?.transitions.map((t) => t.action)).toEqual(['update']);
  });

  it('applies each outcome once when cycles with separate locks overlap', async () => {
    const config = await setup([makeTarget()]);
    const probe = scriptedProbe({ 'svc-a': ['failure', 'failure', 'failure'] });
    await runCycle(config, deps({}, { probe }));

    const reports = await Promise.all([
      runCycle(config, deps({}, { probe, locks: new KeyedLock() })),
      runCycle(config, deps({}, { probe, locks: new KeyedLock() }))
    ]);

    expect(reports.map((report) => report.targets[0]?.error)).toEqual([null, null]);
    const applied = reports
      .flatMap((report) => report.targets[0]?.transitions ?? [])
      .filter((transition) => transition.action !== 'replay')
      .map((transition) => transition.outcome.id)
      .sort((a, b) => a - b);
    expect(applied).toEqual([2, 3]);
    expect((await store.openIncident('svc-a'))?.failureCount).toBe(3);
    expect(await store.appliedCursor('svc-a')).toBe(3);
  });

  it('leaves disabled targets and their incidents untouched', async () => {
    const config = await setup([makeTarget({ enabled: false }), makeTarget({ name: 'svc-b' })]);
    const probe = vi.fn(scriptedProbe({}));

    const report = await runCycle(config, deps({}, { probe }));

    expect(report.skipped).toEqual(['svc-a']);
    expect(report.targets.map((target) => target.target)).toEqual(['svc-b']);
    expect(probe).toHaveBeenCalledTimes(1);
  });
});

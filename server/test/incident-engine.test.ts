import { beforeEach, describe, expect, it, vi } from 'vitest';

import { PersistenceError } from '../src/errors';
import { decideAction, IncidentEngine, signalFor } from '../src/incidents/engine';
import { silentLogger } from '../src/logger';
import { MemoryResultStore } from '../src/store/memory';
import type { CheckStatus, Incident } from '../src/types';
import { makeResult, makeTarget } from './helpers/data-builders';

const OPEN_INCIDENT: Incident = {
  id: 1,
  target: 'svc-a',
  startedAt: new Date('2026-03-01T12:00:00.000Z'),
  resolvedAt: null,
  status: 'open',
  failureCount: 2,
  lastCheckId: 2,
  alerted: { chat: true },
  acknowledgedBy: null,
  acknowledgedAt: null
};

describe('incidents/engine', () => {
  describe('decideAction', () => {
    it.each<[CheckStatus, Incident | null, string]>([
      ['failure', null, 'open'],
      ['timeout', null, 'open'],
      ['error', null, 'open'],
      ['success', null, 'none'],
      ['failure', OPEN_INCIDENT, 'update'],
      ['timeout', OPEN_INCIDENT, 'update'],
      ['success', OPEN_INCIDENT, 'resolve'],
      ['success', { ...OPEN_INCIDENT, status: 'acknowledged' }, 'resolve'],
      ['error', { ...OPEN_INCIDENT, status: 'acknowledged' }, 'update']
    ])('decides transition case %#', (status, open, expected) => {
      const outcome = { ...makeResult('svc-a', status), id: 10 };
      expect(decideAction(open, outcome)).toBe(expected);
    });

    it('maps actions to signals', () => {
      expect(signalFor('open', OPEN_INCIDENT)).toEqual({ kind: 'new' });
      expect(signalFor('update', OPEN_INCIDENT)).toEqual({ kind: 'updated', failureCount: 2 });
      expect(signalFor('resolve', OPEN_INCIDENT)).toEqual({ kind: 'resolved' });
      expect(signalFor('none', null)).toBeNull();
    });
  });

  describe('IncidentEngine', () => {
    let store: MemoryResultStore;
    let engine: IncidentEngine;

    beforeEach(async () => {
      store = new MemoryResultStore();
      await store.syncTargets([makeTarget(), makeTarget({ name: 'svc-b' })]);
      engine = new IncidentEngine(store, silentLogger());
    });

    async function record(status: CheckStatus, target = 'svc-a') {
      return store.append(makeResult(target, status));
    }

    it('opens, updates and resolves an incident', async () => {
      const first = await engine.apply(await record('failure'));
      expect(first.action).toBe('open');
      expect(first.signal).toEqual({ kind: 'new' });
      expect(first.incident).toMatchObject({ status: 'open', failureCount: 1, lastCheckId: 1 });

      const second = await engine.apply(await record('timeout'));
      expect(second.action).toBe('update');
      expect(second.signal).toEqual({ kind: 'updated', failureCount: 2 });
      expect(second.incident?.id).toBe(first.incident?.id);

      const third = await engine.apply(await record('success'));
      expect(third.action).toBe('resolve');
      expect(third.signal).toEqual({ kind: 'resolved' });
      expect(third.incident).toMatchObject({ status: 'resolved', failureCount: 2 });
      expect(third.incident?.resolvedAt).toEqual(third.outcome.checkedAt);

      const fourth = await engine.apply(await record('success'));
      expect(fourth).toMatchObject({ action: 'none', incident: null, signal: null });
      expect(await store.appliedCursor('svc-a')).toBe(4);
    });

    it('ignores replayed outcomes', async () => {
      const outcome = await record('failure');
      await engine.apply(outcome);

      const replay = await engine.apply(outcome);

      expect(replay).toMatchObject({ action: 'replay', incident: null, signal: null });
      const open = await store.openIncident('svc-a');
      expect(open?.failureCount).toBe(1);
    });

    it('treats an outcome applied by another writer after the cursor read as a replay', async () => {
      const first = await record('failure');
      await engine.apply(first);
      const second = await record('failure');
      await engine.apply(second);
      vi.spyOn(store, 'appliedCursor').mockResolvedValueOnce(1);

      const stale = await engine.apply(second);

      expect(stale).toMatchObject({ action: 'replay', incident: null, signal: null });
      expect((await store.openIncident('svc-a'))?.failureCount).toBe(2);
      expect(await store.appliedCursor('svc-a')).toBe(2);
    });

    it('reports a replay for a healthy outcome another writer already applied', async () => {
      const outcome = await record('success');
      await engine.apply(outcome);
      vi.spyOn(store, 'appliedCursor').mockResolvedValueOnce(null);

      const stale = await engine.apply(outcome);

      expect(stale).toMatchObject({ action: 'replay', incident: null, signal: null });
    });

    it('starts a fresh incident after a resolution', async () => {
      const first = await engine.apply(await record('failure'));
      await engine.apply(await record('success'));
      const next = await engine.apply(await record('error'));

      expect(next.action).toBe('open');
      expect(next.incident?.id).not.toBe(first.incident?.id);
      expect(next.incident?.failureCount).toBe(1);
    });

    it('keeps at most one unresolved incident per target', async () => {
      const sequence: CheckStatus[] = [
        'failure',
        'failure',
        'success',
        'timeout',
        'error',
        'success',
        'success',
        'failure'
      ];
      for (const status of sequence) {
        await engine.apply(await record(status));
        const unresolved = (await store.listIncidents({ target: 'svc-a', limit: 100 })).filter(
          (incident) => incident.status !== 'resolved'
        );
        expect(unresolved.length).toBeLessThanOrEqual(1);
      }
      const all = await store.listIncidents({ target: 'svc-a', limit: 100 });
      expect(all.map((incident) => [incident.status, incident.failureCount])).toEqual([
        ['open', 1],
        ['resolved', 2],
        ['resolved', 2]
      ]);
    });

    it('tracks targets independently', async () => {
      await engine.apply(await record('failure', 'svc-a'));
      await engine.apply(await record('failure', 'svc-b'));
      await engine.apply(await record('failure', 'svc-b'));

      expect((await store.openIncident('svc-a'))?.failureCount).toBe(1);
      expect((await store.openIncident('svc-b'))?.failureCount).toBe(2);
    });

    it('surfaces store failures as PersistenceError and leaves the outcome pending', async () => {
      const outcome = await record('failure');
      vi.spyOn(store, 'openIncident').mockRejectedValueOnce(new Error('connection reset'));

      await expect(engine.apply(outcome)).rejects.toThrow(
        new PersistenceError('apply check 1 for svc-a: connection reset')
      );
      expect(await store.pendingOutcomes('svc-a')).toEqual([outcome]);

      const retry = await engine.apply(outcome);
      expect(retry.action).toBe('open');
      expect(await store.pendingOutcomes('svc-a')).toEqual([]);
    });
  });
});

import type { Pool, PoolClient } from 'pg';
import { asPersistenceError, PersistenceError } from '../errors';
import {
  isChannelKind,
  type AlertedFlags,
  type ChannelKind,
  type CheckOutcome,
  type CheckStatus,
  type Incident,
  type IncidentStatus,
  type ProbeResult,
  type Target,
  type TargetStats
} from '../types';
import {
  statsFromCounts,
  type CheckQuery,
  type CleanupResult,
  type IncidentQuery,
  type ResultStore
} from './types';

type CheckRow = {
  id: string | number;
  target: string;
  checked_at: Date;
  status: CheckStatus;
  status_code: number | null;
  latency_ms: number;
  error: string | null;
};

type IncidentRow = {
  id: number;
  target: string;
  started_at: Date;
  resolved_at: Date | null;
  status: IncidentStatus;
  failure_count: number;
  last_check_id: string | number | null;
  alerted: unknown;
  ack_by: string | null;
  ack_at: Date | null;
};

type LockedTarget = {
  id: number;
  appliedCheckId: number | null;
};

const CHECK_SELECT = `
  SELECT c.id, t.name AS target, c.checked_at, c.status, c.status_code, c.latency_ms, c.error
    FROM checks c
    JOIN targets t ON t.id = c.target_id
`;

const INCIDENT_SELECT = `
  SELECT i.id, t.name AS target, i.started_at, i.resolved_at, i.status, i.failure_count,
         i.last_check_id, i.alerted, i.ack_by, i.ack_at
    FROM incidents i
    JOIN targets t ON t.id = i.target_id
`;

function mapAlerted(value: unknown): AlertedFlags {
  const flags: AlertedFlags = {};
  if (value && typeof value === 'object') {
    for (const [key, flag] of Object.entries(value)) {
      if (isChannelKind(key) && flag === true) {
        flags[key] = true;
      }
    }
  }
  return flags;
}

function mapCheck(row: CheckRow): CheckOutcome {
  return {
    id: Number(row.id),
    target: row.target,
    checkedAt: row.checked_at,
    status: row.status,
    statusCode: row.status_code,
    latencyMs: Number(row.latency_ms),
    error: row.error
  };
}

function mapIncident(row: IncidentRow): Incident {
  return {
    id: row.id,
    target: row.target,
    startedAt: row.started_at,
    resolvedAt: row.resolved_at,
    status: row.status,
    failureCount: row.failure_count,
    lastCheckId: row.last_check_id === null ? null : Number(row.last_check_id),
    alerted: mapAlerted(row.alerted),
    acknowledgedBy: row.ack_by,
    acknowledgedAt: row.ack_at
  };
}

export class PgResultStore implements ResultStore {
  constructor(private readonly pool: Pool) {}

  async health() {
    await this.pool.query('select 1 as ok');
  }

  async syncTargets(targets: readonly Target[]) {
    await this.transaction('sync targets', async (client) => {
      for (const target of targets) {
        await client.query(
          `
          INSERT INTO targets (name, url, method, expected_status, timeout_ms, contains, enabled,
                               alert_channels, escalate_after)
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::jsonb)
          ON CONFLICT (name) DO UPDATE
             SET url = EXCLUDED.url,
                 method = EXCLUDED.method,
                 expected_status = EXCLUDED.expected_status,
                 timeout_ms = EXCLUDED.timeout_ms,
                 contains = EXCLUDED.contains,
                 enabled = EXCLUDED.enabled,
                 alert_channels = EXCLUDED.alert_channels,
                 escalate_after = EXCLUDED.escalate_after,
                 updated_at = now()
          `,
          [
            target.name,
            target.url,
            target.method,
            target.expectedStatus,
            target.timeoutMs,
            target.contains,
            target.enabled,
            JSON.stringify(target.alertChannels),
            JSON.stringify(target.escalateAfter)
          ]
        );
      }
      await client.query(
        `
        UPDATE targets
           SET enabled = FALSE,
               updated_at = now()
         WHERE enabled AND NOT (name = ANY($1::text[]))
        `,
        [targets.map((target) => target.name)]
      );
    });
  }

  async append(result: ProbeResult): Promise<CheckOutcome> {
    const res = await this.run('append check', () =>
      this.pool.query<{ id: string | number }>(
        `
        INSERT INTO checks (target_id, checked_at, status, status_code, latency_ms, error)
        SELECT id, $2, $3, $4, $5, $6
          FROM targets
         WHERE name = $1
        RETURNING id
        `,
        [
          result.target,
          result.checkedAt,
          result.status,
          result.statusCode,
          result.latencyMs,
          result.error
        ]
      )
    );
    const row = res.rows[0];
    if (!row) {
      throw new PersistenceError(`unknown target '${result.target}'`);
    }
    return { ...result, id: Number(row.id) };
  }

  async latestOutcome(target: string): Promise<CheckOutcome | null> {
    const res = await this.run('latest outcome', () =>
      this.pool.query<CheckRow>(`${CHECK_SELECT} WHERE t.name = $1 ORDER BY c.id DESC LIMIT 1`, [
        target
      ])
    );
    const row = res.rows[0];
    return row ? mapCheck(row) : null;
  }

  async pendingOutcomes(target: string): Promise<CheckOutcome[]> {
    const res = await this.run('pending outcomes', () =>
      this.pool.query<CheckRow>(
        `${CHECK_SELECT}
          WHERE t.name = $1 AND c.id > COALESCE(t.applied_check_id, 0)
          ORDER BY c.id ASC`,
        [target]
      )
    );
    return res.rows.map(mapCheck);
  }

  async appliedCursor(target: string): Promise<number | null> {
    const res = await this.run('applied cursor', () =>
      this.pool.query<{ applied_check_id: string | number | null }>(
        'SELECT applied_check_id FROM targets WHERE name = $1',
        [target]
      )
    );
    const value = res.rows[0]?.applied_check_id ?? null;
    return value === null ? null : Number(value);
  }

  async markApplied(outcome: CheckOutcome) {
    const res = await this.run('mark applied', () =>
      this.pool.query(
        `
        UPDATE targets
           SET applied_check_id = $2
         WHERE name = $1 AND COALESCE(applied_check_id, 0) < $2
        `,
        [outcome.target, outcome.id]
      )
    );
    return Boolean(res.rowCount);
  }

  async openIncident(target: string): Promise<Incident | null> {
    const res = await this.run('open incident', () =>
      this.pool.query<IncidentRow>(
        `${INCIDENT_SELECT}
          WHERE t.name = $1 AND i.status <> 'resolved'
          ORDER BY i.started_at DESC
          LIMIT 1`,
        [target]
      )
    );
    const row = res.rows[0];
    return row ? mapIncident(row) : null;
  }

  async createIncident(outcome: CheckOutcome): Promise<Incident | null> {
    return this.withOutcome(outcome, 'create incident', async (client, locked) => {
      const existing = await client.query(
        "SELECT id FROM incidents WHERE target_id = $1 AND status <> 'resolved' LIMIT 1",
        [locked.id]
      );
      if (existing.rows.length) {
        throw new PersistenceError(`target '${outcome.target}' already has an open incident`);
      }
      const res = await client.query<{ id: number }>(
        `
        INSERT INTO incidents (target_id, started_at, status, failure_count, last_check_id)
        VALUES ($1, $2, 'open', 1, $3)
        RETURNING id
        `,
        [locked.id, outcome.checkedAt, outcome.id]
      );
      const row = res.rows[0];
      if (!row) {
        throw new PersistenceError('incident insert returned no row');
      }
      await this.advance(client, locked, outcome);
      return this.readIncident(client, row.id);
    });
  }

  async updateIncident(incidentId: number, outcome: CheckOutcome): Promise<Incident | null> {
    return this.withOutcome(outcome, 'update incident', async (client, locked) => {
      const res = await client.query(
        `
        UPDATE incidents
           SET failure_count = failure_count + 1,
               last_check_id = $3
         WHERE id = $1 AND target_id = $2 AND status <> 'resolved'
        `,
        [incidentId, locked.id, outcome.id]
      );
      if (!res.rowCount) {
        throw new PersistenceError(`incident ${incidentId} is not open`);
      }
      await this.advance(client, locked, outcome);
      return this.readIncident(client, incidentId);
    });
  }

  async resolveIncident(incidentId: number, outcome: CheckOutcome): Promise<Incident | null> {
    return this.withOutcome(outcome, 'resolve incident', async (client, locked) => {
      const res = await client.query(
        `
        UPDATE incidents
           SET status = 'resolved',
               resolved_at = $3
         WHERE id = $1 AND target_id = $2 AND status <> 'resolved'
        `,
        [incidentId, locked.id, outcome.checkedAt]
      );
      if (!res.rowCount) {
        throw new PersistenceError(`incident ${incidentId} is not open`);
      }
      await this.advance(client, locked, outcome);
      return this.readIncident(client, incidentId);
    });
  }

  async setAlerted(incidentId: number, channel: ChannelKind) {
    const res = await this.run('set alerted', () =>
      this.pool.query(
        'UPDATE incidents SET alerted = alerted || jsonb_build_object($2::text, true) WHERE id = $1',
        [incidentId, channel]
      )
    );
    if (!res.rowCount) {
      throw new PersistenceError(`incident ${incidentId} not found`);
    }
  }

  async acknowledgeIncident(incidentId: number, by: string | null): Promise<Incident | null> {
    const res = await this.run('acknowledge incident', () =>
      by === null
        ? this.pool.query(
            `
            UPDATE incidents
               SET status = 'open', ack_by = NULL, ack_at = NULL
             WHERE id = $1 AND status <> 'resolved'
            `,
            [incidentId]
          )
        : this.pool.query(
            `
            UPDATE incidents
               SET status = 'acknowledged', ack_by = $2, ack_at = now()
             WHERE id = $1 AND status <> 'resolved'
            `,
            [incidentId, by]
          )
    );
    if (!res.rowCount) {
      return null;
    }
    const read = await this.run('read incident', () =>
      this.pool.query<IncidentRow>(`${INCIDENT_SELECT} WHERE i.id = $1`, [incidentId])
    );
    const row = read.rows[0];
    return row ? mapIncident(row) : null;
  }

  async recentStats(target: string, windowMs: number, now = new Date()): Promise<TargetStats> {
    const since = new Date(now.getTime() - windowMs);
    const res = await this.run('recent stats', () =>
      this.pool.query<{ count: number; success_count: number; avg_latency_ms: string | null }>(
        `
        SELECT COUNT(*)::int AS count,
               COUNT(*) FILTER (WHERE c.status = 'success')::int AS success_count,
               AVG(c.latency_ms) FILTER (WHERE c.status = 'success') AS avg_latency_ms
          FROM checks c
          JOIN targets t ON t.id = c.target_id
         WHERE t.name = $1
           AND c.checked_at > $2
        `,
        [target, since]
      )
    );
    const row = res.rows[0];
    if (!row) {
      return statsFromCounts(target, 0, 0, null);
    }
    return statsFromCounts(
      target,
      row.count,
      row.success_count,
      row.avg_latency_ms === null ? null : Number(row.avg_latency_ms)
    );
  }

  async listIncidents(query: IncidentQuery): Promise<Incident[]> {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (query.status) {
      params.push(query.status);
      clauses.push(`i.status = $${params.length}`);
    }
    if (query.target) {
      params.push(query.target);
      clauses.push(`t.name = $${params.length}`);
    }
    params.push(query.limit);
    const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
    const res = await this.run('list incidents', () =>
      this.pool.query<IncidentRow>(
        `${INCIDENT_SELECT} ${where} ORDER BY i.started_at DESC, i.id DESC LIMIT $${params.length}`,
        params
      )
    );
    return res.rows.map(mapIncident);
  }

  async listChecks(query: CheckQuery): Promise<CheckOutcome[]> {
    const params: unknown[] = [];
    let where = '';
    if (query.target) {
      params.push(query.target);
      where = 'WHERE t.name = $1';
    }
    params.push(query.limit);
    const res = await this.run('list checks', () =>
      this.pool.query<CheckRow>(
        `${CHECK_SELECT} ${where} ORDER BY c.id DESC LIMIT $${params.length}`,
        params
      )
    );
    return res.rows.map(mapCheck);
  }

  async cleanup(retentionDays: number, now = new Date()): Promise<CleanupResult> {
    const cutoff = new Date(now.getTime() - retentionDays * 24 * 60 * 60 * 1000);
    return this.transaction('cleanup', async (client) => {
      const incidents = await client.query(
        "DELETE FROM incidents WHERE status = 'resolved' AND resolved_at < $1",
        [cutoff]
      );
      const checks = await client.query('DELETE FROM checks WHERE checked_at < $1', [cutoff]);
      return { checks: checks.rowCount ?? 0, incidents: incidents.rowCount ?? 0 };
    });
  }

  async close() {
    await this.pool.end();
  }

  private async run<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw asPersistenceError(err, context);
    }
  }

  private async transaction<T>(context: string, fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.run(context, () => this.pool.connect());
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw asPersistenceError(err, context);
    } finally {
      client.release();
    }
  }

  // Locks the target row, then runs `fn` unless the outcome was already applied
  // by another writer; a replay resolves to null without touching any row.
  private async withOutcome<T>(
    outcome: CheckOutcome,
    context: string,
    fn: (client: PoolClient, locked: LockedTarget) => Promise<T>
  ): Promise<T | null> {
    return this.transaction(context, async (client) => {
      const res = await client.query<{ id: number; applied_check_id: string | number | null }>(
        'SELECT id, applied_check_id FROM targets WHERE name = $1 FOR UPDATE',
        [outcome.target]
      );
      const row = res.rows[0];
      if (!row) {
        throw new PersistenceError(`unknown target '${outcome.target}'`);
      }
      const locked: LockedTarget = {
        id: row.id,
        appliedCheckId: row.applied_check_id === null ? null : Number(row.applied_check_id)
      };
      if (locked.appliedCheckId !== null && outcome.id <= locked.appliedCheckId) {
        return null;
      }
      return fn(client, locked);
    });
  }

  private async advance(client: PoolClient, locked: LockedTarget, outcome: CheckOutcome) {
    await client.query('UPDATE targets SET applied_check_id = $2 WHERE id = $1', [
      locked.id,
      outcome.id
    ]);
  }

  private async readIncident(client: PoolClient, incidentId: number): Promise<Incident> {
    const res = await client.query<IncidentRow>(`${INCIDENT_SELECT} WHERE i.id = $1`, [incidentId]);
    const row = res.rows[0];
    if (!row) {
      throw new PersistenceError(`incident ${incidentId} not found`);
    }
    return mapIncident(row);
  }
}

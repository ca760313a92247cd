import type {
  ChannelKind,
  CheckOutcome,
  Incident,
  IncidentStatus,
  ProbeResult,
  Target,
  TargetStats
} from '../types';

export type IncidentQuery = {
  status?: IncidentStatus;
  target?: string;
  limit: number;
};

export type CheckQuery = {
  target?: string;
  limit: number;
};

export type CleanupResult = {
  checks: number;
  incidents: number;
};

// Every mutation is atomic per target; incident mutations also advance the
// target's applied cursor to the outcome they consumed. An outcome at or below
// the cursor is a replay: incident mutations return null and change nothing.
export type ResultStore = {
  health(): Promise<void>;
  syncTargets(targets: readonly Target[]): Promise<void>;

  append(result: ProbeResult): Promise<CheckOutcome>;
  latestOutcome(target: string): Promise<CheckOutcome | null>;
  pendingOutcomes(target: string): Promise<CheckOutcome[]>;
  appliedCursor(target: string): Promise<number | null>;
  markApplied(outcome: CheckOutcome): Promise<boolean>;

  openIncident(target: string): Promise<Incident | null>;
  createIncident(outcome: CheckOutcome): Promise<Incident | null>;
  updateIncident(incidentId: number, outcome: CheckOutcome): Promise<Incident | null>;
  resolveIncident(incidentId: number, outcome: CheckOutcome): Promise<Incident | null>;
  setAlerted(incidentId: number, channel: ChannelKind): Promise<void>;
  acknowledgeIncident(incidentId: number, by: string | null): Promise<Incident | null>;

  recentStats(target: string, windowMs: number, now?: Date): Promise<TargetStats>;
  listIncidents(query: IncidentQuery): Promise<Incident[]>;
  listChecks(query: CheckQuery): Promise<CheckOutcome[]>;
  cleanup(retentionDays: number, now?: Date): Promise<CleanupResult>;
  close(): Promise<void>;
};

export function statsFromCounts(
  target: string,
  count: number,
  successCount: number,
  avgLatencyMs: number | null
): TargetStats {
  return {
    target,
    count,
    successCount,
    uptimePct: count ? Math.round((successCount / count) * 1000) / 10 : null,
    avgLatencyMs: avgLatencyMs === null ? null : Math.round(avgLatencyMs)
  };
}

export function computeStats(
  target: string,
  rows: Array<Pick<CheckOutcome, 'status' | 'latencyMs'>>
): TargetStats {
  const successes = rows.filter((row) => row.status === 'success');
  const avgLatencyMs = successes.length
    ? successes.reduce((sum, row) => sum + row.latencyMs, 0) / successes.length
    : null;
  return statsFromCounts(target, rows.length, successes.length, avgLatencyMs);
}

import { PersistenceError } from '../errors';
import type { ChannelKind, CheckOutcome, Incident, ProbeResult, Target, TargetStats } from '../types';
import {
  computeStats,
  type CheckQuery,
  type CleanupResult,
  type IncidentQuery,
  type ResultStore
} from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

function copyIncident(incident: Incident): Incident {
  return { ...incident, alerted: { ...incident.alerted } };
}

export class MemoryResultStore implements ResultStore {
  private targets = new Map<string, Target>();
  private checks: CheckOutcome[] = [];
  private incidents: Incident[] = [];
  private cursors = new Map<string, number>();
  private nextCheckId = 1;
  private nextIncidentId = 1;

  async health() {}

  async syncTargets(targets: readonly Target[]) {
    const names = new Set(targets.map((target) => target.name));
    for (const [name, known] of this.targets) {
      if (known.enabled && !names.has(name)) {
        this.targets.set(name, { ...known, enabled: false });
      }
    }
    for (const target of targets) {
      this.targets.set(target.name, target);
    }
  }

  async knownTargets(): Promise<Target[]> {
    return Array.from(this.targets.values());
  }

  async append(result: ProbeResult): Promise<CheckOutcome> {
    if (!this.targets.has(result.target)) {
      throw new PersistenceError(`unknown target '${result.target}'`);
    }
    const outcome: CheckOutcome = { ...result, id: this.nextCheckId++ };
    this.checks.push(outcome);
    return outcome;
  }

  async latestOutcome(target: string): Promise<CheckOutcome | null> {
    for (let i = this.checks.length - 1; i >= 0; i--) {
      const check = this.checks[i];
      if (check && check.target === target) return check;
    }
    return null;
  }

  async pendingOutcomes(target: string): Promise<CheckOutcome[]> {
    const cursor = this.cursors.get(target) ?? 0;
    return this.checks.filter((check) => check.target === target && check.id > cursor);
  }

  async appliedCursor(target: string): Promise<number | null> {
    return this.cursors.get(target) ?? null;
  }

  async markApplied(outcome: CheckOutcome) {
    return this.advance(outcome);
  }

  async openIncident(target: string): Promise<Incident | null> {
    const open = this.findOpen(target);
    return open ? copyIncident(open) : null;
  }

  async createIncident(outcome: CheckOutcome): Promise<Incident | null> {
    if (this.isApplied(outcome)) {
      return null;
    }
    if (this.findOpen(outcome.target)) {
      throw new PersistenceError(`target '${outcome.target}' already has an open incident`);
    }
    const incident: Incident = {
      id: this.nextIncidentId++,
      target: outcome.target,
      startedAt: outcome.checkedAt,
      resolvedAt: null,
      status: 'open',
      failureCount: 1,
      lastCheckId: outcome.id,
      alerted: {},
      acknowledgedBy: null,
      acknowledgedAt: null
    };
    this.incidents.push(incident);
    this.advance(outcome);
    return copyIncident(incident);
  }

  async updateIncident(incidentId: number, outcome: CheckOutcome): Promise<Incident | null> {
    if (this.isApplied(outcome)) {
      return null;
    }
    const incident = this.requireUnresolved(incidentId);
    incident.failureCount += 1;
    incident.lastCheckId = outcome.id;
    this.advance(outcome);
    return copyIncident(incident);
  }

  async resolveIncident(incidentId: number, outcome: CheckOutcome): Promise<Incident | null> {
    if (this.isApplied(outcome)) {
      return null;
    }
    const incident = this.requireUnresolved(incidentId);
    incident.status = 'resolved';
    incident.resolvedAt = outcome.checkedAt;
    this.advance(outcome);
    return copyIncident(incident);
  }

  async setAlerted(incidentId: number, channel: ChannelKind) {
    const incident = this.incidents.find((item) => item.id === incidentId);
    if (!incident) {
      throw new PersistenceError(`incident ${incidentId} not found`);
    }
    incident.alerted = { ...incident.alerted, [channel]: true };
  }

  async acknowledgeIncident(incidentId: number, by: string | null): Promise<Incident | null> {
    const incident = this.incidents.find(
      (item) => item.id === incidentId && item.status !== 'resolved'
    );
    if (!incident) return null;
    incident.status = by === null ? 'open' : 'acknowledged';
    incident.acknowledgedBy = by;
    incident.acknowledgedAt = by === null ? null : new Date();
    return copyIncident(incident);
  }

  async recentStats(target: string, windowMs: number, now = new Date()): Promise<TargetStats> {
    const since = now.getTime() - windowMs;
    const rows = this.checks.filter(
      (check) => check.target === target && check.checkedAt.getTime() > since
    );
    return computeStats(target, rows);
  }

  async listIncidents(query: IncidentQuery): Promise<Incident[]> {
    return this.incidents
      .filter((item) => (query.status ? item.status === query.status : true))
      .filter((item) => (query.target ? item.target === query.target : true))
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime() || b.id - a.id)
      .slice(0, query.limit)
      .map(copyIncident);
  }

  async listChecks(query: CheckQuery): Promise<CheckOutcome[]> {
    return this.checks
      .filter((check) => (query.target ? check.target === query.target : true))
      .sort((a, b) => b.id - a.id)
      .slice(0, query.limit);
  }

  async cleanup(retentionDays: number, now = new Date()): Promise<CleanupResult> {
    const cutoff = now.getTime() - retentionDays * DAY_MS;
    const checksBefore = this.checks.length;
    const incidentsBefore = this.incidents.length;
    this.checks = this.checks.filter((check) => check.checkedAt.getTime() >= cutoff);
    this.incidents = this.incidents.filter(
      (item) => item.resolvedAt === null || item.resolvedAt.getTime() >= cutoff
    );
    const kept = new Set(this.checks.map((check) => check.id));
    for (const incident of this.incidents) {
      if (incident.lastCheckId !== null && !kept.has(incident.lastCheckId)) {
        incident.lastCheckId = null;
      }
    }
    return {
      checks: checksBefore - this.checks.length,
      incidents: incidentsBefore - this.incidents.length
    };
  }

  async close() {}

  private findOpen(target: string): Incident | undefined {
    return this.incidents.find((item) => item.target === target && item.status !== 'resolved');
  }

  private requireUnresolved(incidentId: number): Incident {
    const incident = this.incidents.find((item) => item.id === incidentId);
    if (!incident || incident.status === 'resolved') {
      throw new PersistenceError(`incident ${incidentId} is not open`);
    }
    return incident;
  }

  private isApplied(outcome: CheckOutcome): boolean {
    return outcome.id <= (this.cursors.get(outcome.target) ?? 0);
  }

  private advance(outcome: CheckOutcome): boolean {
    if (this.isApplied(outcome)) {
      return false;
    }
    this.cursors.set(outcome.target, outcome.id);
    return true;
  }
}

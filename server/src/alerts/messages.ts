import type { IncidentSignal } from '../incidents/engine';
import type { CheckOutcome, Incident, Target } from '../types';

export type AlertKind = 'down' | 'escalation' | 'recovered';

export type AlertMessage = {
  kind: AlertKind;
  incidentId: number;
  target: string;
  url: string;
  status: string;
  failureCount: number;
  startedAt: Date;
  resolvedAt: Date | null;
  durationMs: number | null;
  statusCode: number | null;
  error: string | null;
  latencyMs: number;
  title: string;
  text: string;
};

export const SMS_MAX_LENGTH = 160;

export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const days = Math.floor(total / 86400);
  const hours = Math.floor((total % 86400) / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;

  const parts: string[] = [];
  if (days) parts.push(`${days}d`);
  if (hours) parts.push(`${hours}h`);
  if (minutes) parts.push(`${minutes}m`);
  if (seconds || !parts.length) parts.push(`${seconds}s`);
  return parts.join(' ');
}

function kindFor(signal: IncidentSignal): AlertKind {
  switch (signal.kind) {
    case 'new':
      return 'down';
    case 'updated':
      return 'escalation';
    case 'resolved':
      return 'recovered';
  }
}

function titleFor(kind: AlertKind, target: string, failureCount: number): string {
  if (kind === 'down') {
    return `ALERT: ${target} is DOWN`;
  }
  if (kind === 'escalation') {
    return `ESCALATION: ${target} down for ${failureCount} checks`;
  }
  return `RECOVERED: ${target}`;
}

export function buildAlertMessage(
  signal: IncidentSignal,
  params: { target: Target; incident: Incident; outcome: CheckOutcome }
): AlertMessage {
  const { target, incident, outcome } = params;
  const kind = kindFor(signal);
  const durationMs =
    incident.resolvedAt === null
      ? null
      : incident.resolvedAt.getTime() - incident.startedAt.getTime();
  const status = kind === 'recovered' ? 'RECOVERED' : outcome.status.toUpperCase();

  const rows: Array<[string, string]> = [
    ['Target', `${target.name} (${target.url})`],
    ['Status', status]
  ];
  if (kind === 'recovered') {
    rows.push(['Failed Checks', String(incident.failureCount)]);
    rows.push(['First Failure', incident.startedAt.toISOString()]);
    if (incident.resolvedAt) {
      rows.push(['Resolved At', incident.resolvedAt.toISOString()]);
    }
    if (durationMs !== null) {
      rows.push(['Duration', formatDuration(durationMs)]);
    }
    rows.push(['Response Time', `${outcome.latencyMs}ms`]);
  } else {
    if (outcome.statusCode !== null) {
      rows.push(['HTTP Status', String(outcome.statusCode)]);
    }
    if (outcome.error) {
      rows.push(['Error', outcome.error]);
    }
    rows.push(['Consecutive Failures', String(incident.failureCount)]);
    rows.push(['First Failure', incident.startedAt.toISOString()]);
  }

  return {
    kind,
    incidentId: incident.id,
    target: target.name,
    url: target.url,
    status,
    failureCount: incident.failureCount,
    startedAt: incident.startedAt,
    resolvedAt: incident.resolvedAt,
    durationMs,
    statusCode: outcome.statusCode,
    error: outcome.error,
    latencyMs: outcome.latencyMs,
    title: titleFor(kind, target.name, incident.failureCount),
    text: rows.map(([label, value]) => `${label}: ${value}`).join('\n')
  };
}

export function shortText(message: AlertMessage): string {
  let text: string;
  if (message.kind === 'recovered') {
    text = `RECOVERED: ${message.target} after ${formatDuration(message.durationMs ?? 0)}`;
  } else if (message.kind === 'escalation') {
    text =
      `CRITICAL: ${message.target} has been down for ${message.failureCount} consecutive checks. ` +
      (message.error ?? 'Unknown error');
  } else {
    text = `DOWN: ${message.target}. ${message.error ?? message.status}`;
  }
  return text.length > SMS_MAX_LENGTH ? text.slice(0, SMS_MAX_LENGTH) : text;
}

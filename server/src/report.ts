import type { CycleReport } from './monitor/cycle';
import { CHANNEL_KINDS, type CheckOutcome, type Incident, type TargetStats } from './types';

function pad(value: string, width: number) {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

function table(header: string[], rows: string[][]): string {
  const widths = header.map((cell, i) =>
    Math.max(cell.length, ...rows.map((row) => (row[i] ?? '').length))
  );
  const line = (row: string[]) =>
    row
      .map((cell, i) => pad(cell, widths[i] ?? 0))
      .join('  ')
      .trimEnd();
  return [line(header), line(widths.map((w) => '-'.repeat(w))), ...rows.map(line)].join('\n');
}

export function formatCycleReport(report: CycleReport): string {
  const lines = report.targets.map((target) => {
    if (target.error) {
      return `  [ERR ] ${target.target}: ${target.error}`;
    }
    const outcome = target.outcome;
    const mark = outcome?.status === 'success' ? 'OK  ' : 'FAIL';
    const detail = outcome
      ? outcome.error
        ? `${outcome.latencyMs}ms ${outcome.error}`
        : `${outcome.latencyMs}ms HTTP ${outcome.statusCode ?? '-'}`
      : 'no outcome';
    const sent = target.alerts
      .filter((alert) => alert.status === 'sent')
      .map((alert) => alert.channel);
    const alerts = sent.length ? ` -> alerted ${sent.join(', ')}` : '';
    return `  [${mark}] ${target.target}: ${detail}${alerts}`;
  });
  for (const name of report.skipped) {
    lines.push(`  [SKIP] ${name}: disabled`);
  }
  const seconds = ((report.finishedAt.getTime() - report.startedAt.getTime()) / 1000).toFixed(1);
  return [`Check cycle at ${report.startedAt.toISOString()} (${seconds}s)`, ...lines].join('\n');
}

export function formatIncidents(incidents: Incident[]): string {
  if (!incidents.length) {
    return 'No open incidents.';
  }
  return table(
    ['ID', 'TARGET', 'STATUS', 'FAILURES', 'STARTED', 'ALERTED', 'ACK BY'],
    incidents.map((incident) => [
      String(incident.id),
      incident.target,
      incident.status,
      String(incident.failureCount),
      incident.startedAt.toISOString(),
      CHANNEL_KINDS.filter((channel) => incident.alerted[channel]).join(',') || '-',
      incident.acknowledgedBy ?? '-'
    ])
  );
}

export function formatChecks(checks: CheckOutcome[]): string {
  if (!checks.length) {
    return 'No checks recorded.';
  }
  return table(
    ['ID', 'TARGET', 'CHECKED', 'STATUS', 'HTTP', 'LATENCY', 'ERROR'],
    checks.map((check) => [
      String(check.id),
      check.target,
      check.checkedAt.toISOString(),
      check.status,
      check.statusCode === null ? '-' : String(check.statusCode),
      `${check.latencyMs}ms`,
      check.error ?? ''
    ])
  );
}

export function formatStats(stats: TargetStats[], windowHours: number): string {
  if (!stats.length) {
    return 'No targets configured.';
  }
  return table(
    ['TARGET', `UPTIME ${windowHours}H`, 'CHECKS', 'AVG LATENCY'],
    stats.map((row) => [
      row.target,
      row.uptimePct === null ? '-' : `${row.uptimePct.toFixed(1)}%`,
      String(row.count),
      row.avgLatencyMs === null ? '-' : `${row.avgLatencyMs}ms`
    ])
  );
}

export const CHANNEL_KINDS = ['chat', 'email', 'sms'] as const;
export type ChannelKind = (typeof CHANNEL_KINDS)[number];

export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export type Target = {
  name: string;
  url: string;
  method: HttpMethod;
  expectedStatus: number;
  timeoutMs: number;
  contains: string | null;
  enabled: boolean;
  alertChannels: ChannelKind[];
  escalateAfter: Partial<Record<ChannelKind, number>>;
};

export type CheckStatus = 'success' | 'failure' | 'timeout' | 'error';

export type ProbeResult = {
  target: string;
  checkedAt: Date;
  status: CheckStatus;
  statusCode: number | null;
  latencyMs: number;
  error: string | null;
};

export type CheckOutcome = ProbeResult & {
  id: number;
};

export type IncidentStatus = 'open' | 'acknowledged' | 'resolved';

export type AlertedFlags = Partial<Record<ChannelKind, boolean>>;

export type Incident = {
  id: number;
  target: string;
  startedAt: Date;
  resolvedAt: Date | null;
  status: IncidentStatus;
  failureCount: number;
  lastCheckId: number | null;
  alerted: AlertedFlags;
  acknowledgedBy: string | null;
  acknowledgedAt: Date | null;
};

export type TargetStats = {
  target: string;
  count: number;
  successCount: number;
  uptimePct: number | null;
  avgLatencyMs: number | null;
};

export function isChannelKind(value: string): value is ChannelKind {
  return CHANNEL_KINDS.some((kind) => kind === value);
}

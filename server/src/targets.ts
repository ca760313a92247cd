import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError, toErrorMessage } from './errors';
import { CHANNEL_KINDS, HTTP_METHODS, type ChannelKind, type Target } from './types';

const channelKindSchema = z.enum(CHANNEL_KINDS);
const thresholdSchema = z.coerce.number().int().min(1).max(10000);

const targetSchema = z.object({
  name: z.string().trim().min(1).max(128),
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'url protocol must be http or https'),
  method: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(HTTP_METHODS))
    .default('GET'),
  expected_status: z.coerce.number().int().min(100).max(599).default(200),
  timeout_ms: z.coerce.number().int().min(100).max(120000).default(10000),
  contains: z.string().min(1).nullable().optional().default(null),
  enabled: z.boolean().default(true),
  alert_channels: z.array(channelKindSchema).default(['chat']),
  escalate_after: z.record(channelKindSchema, thresholdSchema).default({})
});

const alertsSchema = z.object({
  first_alert_channel: channelKindSchema.default('chat'),
  chat: z
    .object({
      enabled: z.boolean().default(true),
      escalate_after: thresholdSchema.default(1)
    })
    .default({}),
  email: z
    .object({
      enabled: z.boolean().default(true),
      escalate_after: thresholdSchema.default(3),
      recipients: z.array(z.string().email()).default([])
    })
    .default({}),
  sms: z
    .object({
      enabled: z.boolean().default(false),
      escalate_after: thresholdSchema.default(5),
      method: z.enum(['email_gateway', 'http']).default('email_gateway'),
      gateway: z.string().email().nullable().optional().default(null),
      recipients: z.array(z.string().min(1)).default([])
    })
    .default({})
});

const fileSchema = z.object({
  alerts: alertsSchema.default({}),
  targets: z.array(z.unknown())
});

export type SmsMethod = 'email_gateway' | 'http';

export type AlertsConfig = {
  firstAlertChannel: ChannelKind;
  chat: { enabled: boolean; escalateAfter: number };
  email: { enabled: boolean; escalateAfter: number; recipients: string[] };
  sms: {
    enabled: boolean;
    escalateAfter: number;
    method: SmsMethod;
    gateway: string | null;
    recipients: string[];
  };
};

export type MonitorConfig = {
  alerts: AlertsConfig;
  targets: Target[];
};

export type ConfigIssue = {
  index: number;
  name: string | null;
  error: ConfigError;
};

export type LoadedConfig = {
  config: MonitorConfig;
  issues: ConfigIssue[];
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
  }
  return value;
}

function rawName(raw: unknown): string | null {
  if (raw && typeof raw === 'object' && 'name' in raw) {
    const name = raw.name;
    return typeof name === 'string' && name.trim().length ? name.trim() : null;
  }
  return null;
}

function toTarget(parsed: z.infer<typeof targetSchema>): Target {
  return {
    name: parsed.name,
    url: parsed.url,
    method: parsed.method,
    expectedStatus: parsed.expected_status,
    timeoutMs: parsed.timeout_ms,
    contains: parsed.contains,
    enabled: parsed.enabled,
    alertChannels: Array.from(new Set(parsed.alert_channels)),
    escalateAfter: parsed.escalate_after
  };
}

function toAlerts(parsed: z.infer<typeof alertsSchema>): AlertsConfig {
  return {
    firstAlertChannel: parsed.first_alert_channel,
    chat: { enabled: parsed.chat.enabled, escalateAfter: parsed.chat.escalate_after },
    email: {
      enabled: parsed.email.enabled,
      escalateAfter: parsed.email.escalate_after,
      recipients: parsed.email.recipients
    },
    sms: {
      enabled: parsed.sms.enabled,
      escalateAfter: parsed.sms.escalate_after,
      method: parsed.sms.method,
      gateway: parsed.sms.gateway,
      recipients: parsed.sms.recipients
    }
  };
}

export function parseMonitorConfig(raw: unknown): LoadedConfig {
  const file = fileSchema.safeParse(raw);
  if (!file.success) {
    throw new ConfigError(`invalid monitor config: ${file.error.message}`);
  }

  const targets: Target[] = [];
  const issues: ConfigIssue[] = [];
  const seen = new Set<string>();

  file.data.targets.forEach((entry, index) => {
    const name = rawName(entry);
    const parsed = targetSchema.safeParse(entry);
    if (!parsed.success) {
      const fields = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'target'}: ${issue.message}`)
        .join('; ');
      issues.push({ index, name, error: new ConfigError(`target #${index} skipped (${fields})`) });
      return;
    }
    const target = toTarget(parsed.data);
    if (seen.has(target.name)) {
      issues.push({
        index,
        name: target.name,
        error: new ConfigError(`target #${index} skipped (duplicate name '${target.name}')`)
      });
      return;
    }
    seen.add(target.name);
    targets.push(target);
  });

  if (!targets.length) {
    throw new ConfigError('no loadable targets in monitor config');
  }

  return {
    config: deepFreeze({ alerts: toAlerts(file.data.alerts), targets }),
    issues
  };
}

export async function loadMonitorConfig(path: string): Promise<LoadedConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`cannot read monitor config ${path}: ${toErrorMessage(err)}`, {
      cause: err
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`invalid JSON in ${path}: ${toErrorMessage(err)}`, { cause: err });
  }

  return parseMonitorConfig(raw);
}

export function enabledTargets(config: MonitorConfig): Target[] {
  return config.targets.filter((target) => target.enabled);
}

export function findTarget(config: MonitorConfig, name: string): Target | null {
  return config.targets.find((target) => target.name === name) ?? null;
}

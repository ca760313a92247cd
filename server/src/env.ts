import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length ? value.trim() : null));

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const schema = z.object({
  NODE_ENV: z.string().default('development'),
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().default(4000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  PGHOST: z.string(),
  PGPORT: z.coerce.number().default(5432),
  PGDATABASE: z.string(),
  PGUSER: z.string(),
  PGPASSWORD: z.string(),

  TARGETS_FILE: z.string().default('config/targets.json'),
  CHECK_INTERVAL_SEC: z.coerce.number().int().min(5).max(86400).default(60),
  CHECK_CONCURRENCY: z.coerce.number().int().min(1).max(100).default(5),
  RETENTION_DAYS: z.coerce.number().int().min(1).max(3650).default(90),
  STATS_WINDOW_HOURS: z.coerce.number().int().min(1).max(8760).default(24),

  CORS_ORIGIN: z.string().default('*'),

  CHAT_WEBHOOK_URL: optionalString,

  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().default(587),
  SMTP_SECURE: booleanString,
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  SMTP_FROM: optionalString,

  SMS_HTTP_URL: optionalString,
  SMS_HTTP_TOKEN: optionalString
});

export type Env = Readonly<z.infer<typeof schema>>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = schema.safeParse(source);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigError(`invalid environment: ${fields}`);
  }
  return Object.freeze(result.data);
}

export function loadEnv(): Env {
  dotenv.config();
  return parseEnv(process.env);
}

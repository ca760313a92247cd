import pino from 'pino';
import type { Env } from './env';

type LogFn = {
  (obj: object, msg?: string): void;
  (msg: string): void;
};

export type Logger = {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child: (bindings: Record<string, unknown>) => Logger;
};

export function createLogger(env: Pick<Env, 'LOG_LEVEL'>): Logger {
  return pino({
    level: env.LOG_LEVEL,
    base: { service: 'watchpost' },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

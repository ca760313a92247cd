export type ErrorCode =
  | 'PROBE_TIMEOUT'
  | 'PROBE_TRANSPORT'
  | 'PROBE_STATUS_MISMATCH'
  | 'PROBE_CONTENT_MISMATCH'
  | 'BODY_READ'
  | 'PERSISTENCE'
  | 'NOTIFICATION_SEND'
  | 'CONFIG';

export abstract class MonitorError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProbeTimeout extends MonitorError {
  readonly code = 'PROBE_TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
  }
}

export class ProbeTransportError extends MonitorError {
  readonly code = 'PROBE_TRANSPORT';
}

export class ProbeStatusMismatch extends MonitorError {
  readonly code = 'PROBE_STATUS_MISMATCH';

  constructor(
    readonly expected: number,
    readonly actual: number
  ) {
    super(`Expected ${expected}, got ${actual}`);
  }
}

export class ProbeContentMismatch extends MonitorError {
  readonly code = 'PROBE_CONTENT_MISMATCH';

  constructor(
    readonly expectedContent: string,
    readonly statusCode: number
  ) {
    super(`Expected content '${expectedContent}' not found`);
  }
}

// The server answered with `statusCode` but the body could not be read in full.
export class BodyReadError extends MonitorError {
  readonly code = 'BODY_READ';

  constructor(
    message: string,
    readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PersistenceError extends MonitorError {
  readonly code = 'PERSISTENCE';
}

export class NotificationSendError extends MonitorError {
  readonly code = 'NOTIFICATION_SEND';

  constructor(
    readonly channel: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${channel}: ${message}`, options);
  }
}

export class ConfigError extends MonitorError {
  readonly code = 'CONFIG';
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function asPersistenceError(err: unknown, context: string): PersistenceError {
  if (err instanceof PersistenceError) return err;
  return new PersistenceError(`${context}: ${toErrorMessage(err)}`, { cause: err });
}

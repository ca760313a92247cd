import {
  BodyReadError,
  ProbeContentMismatch,
  ProbeStatusMismatch,
  ProbeTimeout,
  ProbeTransportError,
  toErrorMessage
} from './errors';
import type { CheckStatus, ProbeResult, Target } from './types';

const USER_AGENT = 'watchpost/0.1';

export type ProbeFn = (target: Target) => Promise<ProbeResult>;

type ProbeResponse = {
  statusCode: number;
};

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

function describeTransportError(err: unknown): string {
  const message = toErrorMessage(err);
  // undici reports DNS / connection failures as "fetch failed" with the real reason as cause.
  if (err instanceof Error && err.cause instanceof Error && err.cause.message) {
    return `${message}: ${err.cause.message}`;
  }
  return message;
}

async function readBody(res: Response, timeoutMs: number): Promise<string> {
  try {
    return await res.text();
  } catch (err) {
    const message = isAbortError(err)
      ? `Response body not received within ${timeoutMs}ms`
      : `Response body read failed: ${describeTransportError(err)}`;
    throw new BodyReadError(message, res.status, { cause: err });
  }
}

async function probe(target: Target): Promise<ProbeResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), target.timeoutMs);

  try {
    const res = await fetch(target.url, {
      method: target.method,
      headers: { 'User-Agent': USER_AGENT },
      redirect: 'follow',
      signal: controller.signal
    });

    if (res.status !== target.expectedStatus) {
      await res.body?.cancel();
      throw new ProbeStatusMismatch(target.expectedStatus, res.status);
    }

    if (target.contains !== null) {
      const text = await readBody(res, target.timeoutMs);
      if (!text.includes(target.contains)) {
        throw new ProbeContentMismatch(target.contains, res.status);
      }
    } else {
      await res.body?.cancel();
    }

    return { statusCode: res.status };
  } catch (err) {
    if (
      err instanceof ProbeStatusMismatch ||
      err instanceof ProbeContentMismatch ||
      err instanceof BodyReadError
    ) {
      throw err;
    }
    if (isAbortError(err)) {
      throw new ProbeTimeout(target.timeoutMs);
    }
    throw new ProbeTransportError(describeTransportError(err), { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

function observedStatusCode(err: unknown): number | null {
  if (err instanceof ProbeStatusMismatch) return err.actual;
  if (err instanceof ProbeContentMismatch || err instanceof BodyReadError) return err.statusCode;
  return null;
}

function statusFor(err: unknown): CheckStatus {
  if (
    err instanceof ProbeStatusMismatch ||
    err instanceof ProbeContentMismatch ||
    err instanceof BodyReadError
  ) {
    return 'failure';
  }
  if (err instanceof ProbeTimeout) {
    return 'timeout';
  }
  return 'error';
}

function validateUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return 'target must be a valid URL';
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return 'target protocol must be http or https';
  }
  return null;
}

export async function checkTarget(
  target: Target,
  now: () => Date = () => new Date()
): Promise<ProbeResult> {
  const checkedAt = now();
  const urlError = validateUrl(target.url);
  if (urlError) {
    return {
      target: target.name,
      checkedAt,
      status: 'error',
      statusCode: null,
      latencyMs: 0,
      error: urlError
    };
  }

  const started = performance.now();
  try {
    const { statusCode } = await probe(target);
    return {
      target: target.name,
      checkedAt,
      status: 'success',
      statusCode,
      latencyMs: Math.round(performance.now() - started),
      error: null
    };
  } catch (err) {
    return {
      target: target.name,
      checkedAt,
      status: statusFor(err),
      statusCode: observedStatusCode(err),
      latencyMs: Math.round(performance.now() - started),
      error: toErrorMessage(err)
    };
  }
}

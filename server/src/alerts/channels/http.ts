import { NotificationSendError, toErrorMessage } from '../../errors';
import type { ChannelKind } from '../../types';

export const SEND_TIMEOUT_MS = 10_000;

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

// POSTs a JSON body; the whole exchange, response body included, must finish within SEND_TIMEOUT_MS.
export async function postJson(
  channel: ChannelKind,
  url: string,
  body: unknown,
  headers: Record<string, string> = {}
): Promise<void> {
  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(SEND_TIMEOUT_MS)
    });
    if (!res.ok) {
      const text = await res.text();
      throw new NotificationSendError(channel, text || `endpoint responded ${res.status}`);
    }
    await res.body?.cancel();
  } catch (err) {
    if (err instanceof NotificationSendError) {
      throw err;
    }
    const reason = isTimeout(err) ? `no response within ${SEND_TIMEOUT_MS}ms` : toErrorMessage(err);
    throw new NotificationSendError(channel, reason, { cause: err });
  }
}

import { NotificationSendError, toErrorMessage } from '../../errors';
import { shortText } from '../messages';
import { postJson } from './http';
import type { MailTransport, NotificationChannel } from './types';

// Email-to-SMS gateway: the carrier turns a plain-text mail into a text message.
export function createSmsGatewayChannel(params: {
  transport: MailTransport;
  from: string;
  gateway: string;
}): NotificationChannel {
  const { transport, from, gateway } = params;
  return {
    kind: 'sms',
    async send(message) {
      try {
        await transport.sendMail({
          from,
          to: gateway,
          subject: 'watchpost alert',
          text: shortText(message)
        });
      } catch (err) {
        throw new NotificationSendError('sms', toErrorMessage(err), { cause: err });
      }
    }
  };
}

export function createSmsHttpChannel(params: {
  url: string;
  token: string | null;
  recipients: string[];
}): NotificationChannel {
  const { url, token, recipients } = params;
  return {
    kind: 'sms',
    async send(message) {
      const headers: Record<string, string> = token ? { Authorization: `Bearer ${token}` } : {};
      await postJson('sms', url, { to: recipients, message: shortText(message) }, headers);
    }
  };
}

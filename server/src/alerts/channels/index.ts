import nodemailer from 'nodemailer';
import type { Env } from '../../env';
import type { AlertsConfig } from '../../targets';
import type { ChannelKind } from '../../types';
import { createChatChannel } from './chat';
import { createEmailChannel } from './email';
import { createSmsGatewayChannel, createSmsHttpChannel } from './sms';
import type { ChannelRegistry, MailTransport, NotificationChannel } from './types';

export type { ChannelRegistry, MailTransport, NotificationChannel } from './types';

export function createMailTransport(env: Env): MailTransport | null {
  if (!env.SMTP_HOST) {
    return null;
  }
  return nodemailer.createTransport({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    auth: env.SMTP_USER && env.SMTP_PASS ? { user: env.SMTP_USER, pass: env.SMTP_PASS } : undefined
  });
}

/**
 * Builds the channel set for one cycle. A channel is registered only when it is
 * enabled in the alert policy and its credentials are present.
 */
export function buildChannelRegistry(
  env: Env,
  alerts: AlertsConfig,
  transport: MailTransport | null = createMailTransport(env)
): ChannelRegistry {
  const channels = new Map<ChannelKind, NotificationChannel>();
  const from = env.SMTP_FROM ?? env.SMTP_USER;

  if (alerts.chat.enabled && env.CHAT_WEBHOOK_URL) {
    channels.set('chat', createChatChannel(env.CHAT_WEBHOOK_URL));
  }

  if (alerts.email.enabled && transport && from && alerts.email.recipients.length) {
    channels.set(
      'email',
      createEmailChannel({ transport, from, recipients: alerts.email.recipients })
    );
  }

  if (alerts.sms.enabled) {
    if (alerts.sms.method === 'http') {
      if (env.SMS_HTTP_URL && alerts.sms.recipients.length) {
        channels.set(
          'sms',
          createSmsHttpChannel({
            url: env.SMS_HTTP_URL,
            token: env.SMS_HTTP_TOKEN,
            recipients: alerts.sms.recipients
          })
        );
      }
    } else if (transport && from && alerts.sms.gateway) {
      channels.set('sms', createSmsGatewayChannel({ transport, from, gateway: alerts.sms.gateway }));
    }
  }

  return channels;
}

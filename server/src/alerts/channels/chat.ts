import type { AlertMessage } from '../messages';
import { postJson } from './http';
import type { NotificationChannel } from './types';

const COLORS = {
  down: '#ef4444',
  escalation: '#f59e0b',
  recovered: '#16a34a'
} as const;

const EMOJI = {
  down: ':red_circle:',
  escalation: ':rotating_light:',
  recovered: ':large_green_circle:'
} as const;

export function buildChatPayload(message: AlertMessage) {
  return {
    text: `${EMOJI[message.kind]} ${message.title}`,
    attachments: [
      {
        color: COLORS[message.kind],
        text: message.text,
        footer: `watchpost | incident #${message.incidentId}`
      }
    ]
  };
}

// Slack-compatible incoming webhook.
export function createChatChannel(webhookUrl: string): NotificationChannel {
  return {
    kind: 'chat',
    async send(message) {
      await postJson('chat', webhookUrl, buildChatPayload(message));
    }
  };
}

import { NotificationSendError, toErrorMessage } from '../../errors';
import type { AlertMessage } from '../messages';
import type { MailTransport, NotificationChannel } from './types';

const STATUS_COLORS = {
  down: '#ef4444',
  escalation: '#f59e0b',
  recovered: '#16a34a'
} as const;

function escapeHtml(value: string) {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function renderRows(rows: Array<[string, string]>) {
  return rows
    .map(
      ([label, value]) =>
        '<tr>' +
        `<td style="padding: 6px 10px; font-weight: 600; color: #0f172a;">${escapeHtml(label)}</td>` +
        `<td style="padding: 6px 10px; color: #0f172a;">${escapeHtml(value)}</td>` +
        '</tr>'
    )
    .join('');
}

function wrapCard(title: string, statusLabel: string, statusColor: string, bodyHtml: string) {
  return (
    '<div style="background:#f8fafc;padding:24px;font-family:Verdana,sans-serif;">' +
    '<div style="max-width:640px;margin:0 auto;background:#ffffff;border:1px solid #e2e8f0;border-radius:12px;overflow:hidden;">' +
    `<div style="padding:16px 20px;border-bottom:1px solid #e2e8f0;display:flex;align-items:center;justify-content:space-between;">` +
    `<div style="font-size:16px;font-weight:700;color:#0f172a;">${escapeHtml(title)}</div>` +
    `<div style="padding:6px 10px;border-radius:999px;background:${statusColor};color:#ffffff;font-size:12px;letter-spacing:0.08em;text-transform:uppercase;">${escapeHtml(statusLabel)}</div>` +
    `</div>` +
    `<div style="padding:18px 20px;">${bodyHtml}</div>` +
    '</div>' +
    '<p style="margin:12px auto 0;max-width:640px;color:#64748b;font-size:12px;text-align:center;">watchpost automated monitoring</p>' +
    '</div>'
  );
}

export function buildEmailHtml(message: AlertMessage) {
  const rows = message.text.split('\n').map((line): [string, string] => {
    const idx = line.indexOf(': ');
    return idx === -1 ? [line, ''] : [line.slice(0, idx), line.slice(idx + 2)];
  });
  const body = `<table style="width:100%;border-collapse:collapse;">${renderRows(rows)}</table>`;
  return wrapCard(message.title, message.status, STATUS_COLORS[message.kind], body);
}

export function createEmailChannel(params: {
  transport: MailTransport;
  from: string;
  recipients: string[];
}): NotificationChannel {
  const { transport, from, recipients } = params;
  return {
    kind: 'email',
    async send(message) {
      try {
        await transport.sendMail({
          from,
          to: recipients.join(','),
          subject: message.title,
          text: message.text,
          html: buildEmailHtml(message)
        });
      } catch (err) {
        throw new NotificationSendError('email', toErrorMessage(err), { cause: err });
      }
    }
  };
}

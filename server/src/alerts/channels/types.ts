import type { SendMailOptions } from 'nodemailer';
import type { ChannelKind } from '../../types';
import type { AlertMessage } from '../messages';

export type NotificationChannel = {
  readonly kind: ChannelKind;
  send(message: AlertMessage): Promise<void>;
};

export type MailTransport = {
  sendMail(options: SendMailOptions): Promise<unknown>;
};

export type ChannelRegistry = ReadonlyMap<ChannelKind, NotificationChannel>;

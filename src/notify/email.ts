import nodemailer, { type SendMailOptions } from 'nodemailer';
import type { Logger } from 'pino';
import type { EmailConfig } from '../config.js';
import { NotificationFailure, describeError } from '../errors.js';
import { formatTimestamp, type NotificationChannel, type StockAlert } from './types.js';

export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
}

export type TransportFactory = (settings: SmtpSettings) => MailTransport;

/** STARTTLS on submission ports, implicit TLS on 465. */
export const createSmtpTransport: TransportFactory = (settings) =>
  nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.port === 465,
    requireTLS: settings.port !== 465,
    auth: { user: settings.user, pass: settings.pass },
    connectionTimeout: 10_000,
  });

export function composeEmail(alert: StockAlert, from: string, to: string): SendMailOptions {
  return {
    from: { name: 'Stock Bot', address: from },
    to,
    subject: `STOCK ALERT: ${alert.productName} is available!`,
    text:
      `The product '${alert.productName}' is now available!\n\n` +
      `Product URL: ${alert.url}\n` +
      `Status: ${alert.reason}\n` +
      `Checked at: ${formatTimestamp(alert.checkedAt)}\n\n` +
      'Visit the URL to buy it now.\n',
    encoding: 'utf-8',
  };
}

export class EmailChannel implements NotificationChannel {
  readonly name = 'email';

  constructor(
    private readonly config: EmailConfig,
    private readonly log: Logger,
    private readonly createTransport: TransportFactory = createSmtpTransport,
  ) {}

  async send(alert: StockAlert): Promise<boolean> {
    const { senderEmail, senderPassword, recipientEmail } = this.config;

    try {
      if (!senderEmail || !senderPassword || !recipientEmail) {
        throw new NotificationFailure(this.name, 'sender email, sender password and recipient email are required');
      }

      const transport = this.createTransport({
        host: this.config.smtpServer,
        port: this.config.smtpPort,
        user: senderEmail,
        pass: senderPassword,
      });

      try {
        await transport.sendMail(composeEmail(alert, senderEmail, recipientEmail));
      } catch (err) {
        throw new NotificationFailure(this.name, describeError(err), { cause: err });
      }

      this.log.info({ product: alert.productName }, 'Email notification sent');
      return true;
    } catch (err) {
      this.log.error({ product: alert.productName, err: describeError(err) }, 'Failed to send email notification');
      return false;
    }
  }
}

import type { Logger } from 'pino';
import { describeError } from '../errors.js';
import type { NotificationChannel, StockAlert } from './types.js';

export type DeliveryReport = Record<string, boolean>;

/** Sends an alert to every channel in turn. One channel failing never stops the others. */
export class Notifier {
  constructor(
    private readonly channels: readonly NotificationChannel[],
    private readonly log: Logger,
  ) {}

  async notify(alert: StockAlert): Promise<DeliveryReport> {
    const report: DeliveryReport = {};

    for (const channel of this.channels) {
      try {
        report[channel.name] = await channel.send(alert);
      } catch (err) {
        this.log.error({ channel: channel.name, product: alert.productName, err: describeError(err) }, 'Notification channel threw');
        report[channel.name] = false;
      }
    }

    return report;
  }
}

import type { Logger } from 'pino';
import { describeError } from '../errors.js';
import { formatTimestamp, type NotificationChannel, type StockAlert } from './types.js';

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

interface TelegramResult {
  ok: boolean;
  error?: string;
}

const TELEGRAM_TIMEOUT_MS = 10_000;

function describeApiReply(body: unknown, status: number): { ok: boolean; description: string } {
  if (typeof body === 'object' && body !== null && 'ok' in body) {
    const description = 'description' in body && typeof body.description === 'string' ? body.description : `HTTP ${status}`;
    return { ok: body.ok === true, description };
  }
  return { ok: false, description: `HTTP ${status}` };
}

export async function sendTelegramMessage(
  config: TelegramConfig,
  text: string,
  parseMode: 'HTML' | 'Markdown' = 'HTML',
): Promise<TelegramResult> {
  const url = `https://api.telegram.org/bot${config.botToken}/sendMessage`;

  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: config.chatId,
        text,
        parse_mode: parseMode,
        disable_web_page_preview: false,
      }),
      signal: AbortSignal.timeout(TELEGRAM_TIMEOUT_MS),
    });

    const body: unknown = await res.json().catch(() => null);
    const reply = describeApiReply(body, res.status);

    if (!res.ok || !reply.ok) {
      return { ok: false, error: reply.description };
    }

    return { ok: true };
  } catch (err) {
    return { ok: false, error: describeError(err) };
  }
}

export function formatStockAlert(alert: StockAlert): string {
  return [
    `<b>STOCK ALERT</b>`,
    ``,
    `<b>${escapeHtml(alert.productName)}</b> is now available!`,
    ``,
    `<a href="${escapeHtml(alert.url)}">Buy now</a>`,
    `Status: ${escapeHtml(alert.reason)}`,
    `Checked at: ${formatTimestamp(alert.checkedAt)}`,
  ].join('\n');
}

export class TelegramChannel implements NotificationChannel {
  readonly name = 'telegram';

  constructor(
    private readonly config: TelegramConfig | null,
    private readonly log: Logger,
  ) {}

  get enabled(): boolean {
    return this.config !== null;
  }

  async send(alert: StockAlert): Promise<boolean> {
    if (!this.config) {
      this.log.debug({ product: alert.productName }, 'Telegram not configured, skipping');
      return false;
    }

    const result = await sendTelegramMessage(this.config, formatStockAlert(alert));
    if (!result.ok) {
      this.log.error({ product: alert.productName, err: result.error }, 'Failed to send Telegram notification');
      return false;
    }

    this.log.info({ product: alert.productName }, 'Telegram notification sent');
    return true;
  }
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

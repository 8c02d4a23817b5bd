import { describe, it, expect, vi } from 'vitest';
import { TelegramChannel, formatStockAlert, sendTelegramMessage } from './telegram.js';
import { quietLogger } from '../test/fakes.js';
import type { StockAlert } from './types.js';

const config = { botToken: 'test-token', chatId: 'test-chat' };

const alert: StockAlert = {
  productName: 'Widget',
  url: 'https://shop.example.com/products/widget',
  reason: 'no sold-out alert, assuming available',
  checkedAt: new Date(2024, 0, 2, 3, 4, 5),
};

function stubFetch(response: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('formatStockAlert', () => {
  it('renders the product, link, reason and time as HTML', () => {
    expect(formatStockAlert(alert)).toBe(
      [
        '<b>STOCK ALERT</b>',
        '',
        '<b>Widget</b> is now available!',
        '',
        '<a href="https://shop.example.com/products/widget">Buy now</a>',
        'Status: no sold-out alert, assuming available',
        'Checked at: 2024-01-02 03:04:05',
      ].join('\n'),
    );
  });

  it('escapes markup in product names and URLs', () => {
    const text = formatStockAlert({ ...alert, productName: 'Tea & <Milk>', url: 'https://shop.example.com/p?a=1&b="2"' });
    expect(text).toContain('<b>Tea &amp; &lt;Milk&gt;</b> is now available!');
    expect(text).toContain('<a href="https://shop.example.com/p?a=1&amp;b=&quot;2&quot;">Buy now</a>');
  });
});

describe('sendTelegramMessage', () => {
  it('posts the message to the bot API', async () => {
    const fetchMock = stubFetch(() => Response.json({ ok: true }));

    await expect(sendTelegramMessage(config, 'hello')).resolves.toEqual({ ok: true });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: 'test-chat',
      text: 'hello',
      parse_mode: 'HTML',
      disable_web_page_preview: false,
    });
  });

  it('returns the API description when Telegram rejects the message', async () => {
    stubFetch(() => Response.json({ ok: false, description: 'Bad Request: chat not found' }, { status: 400 }));

    await expect(sendTelegramMessage(config, 'hello')).resolves.toEqual({
      ok: false,
      error: 'Bad Request: chat not found',
    });
  });

  it('returns the error when the request fails', async () => {
    stubFetch(() => Promise.reject(new Error('network down')));

    await expect(sendTelegramMessage(config, 'hello')).resolves.toEqual({ ok: false, error: 'network down' });
  });
});

describe('TelegramChannel', () => {
  it('skips without any HTTP call when not configured', async () => {
    const fetchMock = stubFetch(() => Response.json({ ok: true }));
    const channel = new TelegramChannel(null, quietLogger());

    expect(channel.enabled).toBe(false);
    await expect(channel.send(alert)).resolves.toBe(false);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends the formatted alert', async () => {
    const fetchMock = stubFetch(() => Response.json({ ok: true }));
    const channel = new TelegramChannel(config, quietLogger());

    await expect(channel.send(alert)).resolves.toBe(true);
    const body = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body.text).toBe(formatStockAlert(alert));
  });

  it('reports a failed delivery as false', async () => {
    stubFetch(() => Response.json({ ok: false, description: 'Unauthorized' }, { status: 401 }));
    const channel = new TelegramChannel(config, quietLogger());

    await expect(channel.send(alert)).resolves.toBe(false);
  });
});

import { describe, it, expect, vi } from 'vitest';
import { BrowserSession } from './session.js';
import type { LaunchedBrowser } from './launcher.js';
import { SetupFailure } from '../errors.js';
import { FakeBrowser, quietLogger } from '../test/fakes.js';

const log = quietLogger();
const options = { executablePath: null, userAgent: 'test-agent' };

function sessionWith(...browsers: FakeBrowser[]) {
  const launch = vi.fn(async (): Promise<LaunchedBrowser> => {
    const next = browsers.shift();
    if (!next) throw new Error('no more browsers');
    return next;
  });
  return { session: new BrowserSession(options, log, launch), launch };
}

describe('BrowserSession', () => {
  it('turns a failed launch into a setup failure and launches again on the next acquire', async () => {
    const browser = new FakeBrowser();
    const launch = vi
      .fn<() => Promise<LaunchedBrowser>>()
      .mockRejectedValueOnce(new Error('chromium not found'))
      .mockResolvedValueOnce(browser);
    const session = new BrowserSession(options, log, launch);

    const failed = session.acquire();
    await expect(failed).rejects.toBeInstanceOf(SetupFailure);
    await expect(failed).rejects.toThrow('Browser setup failed: chromium not found');

    await expect(session.acquire()).resolves.toBe(browser.drivers[0]);
    expect(launch).toHaveBeenCalledTimes(2);
  });

  it('reuses one driver across acquires', async () => {
    const browser = new FakeBrowser();
    const { session, launch } = sessionWith(browser);

    const first = await session.acquire();
    const second = await session.acquire();

    expect(second).toBe(first);
    expect(launch).toHaveBeenCalledTimes(1);
    expect(browser.drivers).toHaveLength(1);
  });

  it('relaunches after the browser disconnects', async () => {
    const crashed = new FakeBrowser();
    const fresh = new FakeBrowser();
    const { session, launch } = sessionWith(crashed, fresh);

    const before = await session.acquire();
    crashed.disconnect();
    const after = await session.acquire();

    expect(after).not.toBe(before);
    expect(after).toBe(fresh.drivers[0]);
    expect(launch).toHaveBeenCalledTimes(2);
  });

  it.each(['crash', 'close'] as const)('reopens the page on the same browser after a page %s', async (reason) => {
    const browser = new FakeBrowser();
    const { session, launch } = sessionWith(browser);

    const before = await session.acquire();
    browser.losePage(reason);
    const after = await session.acquire();

    expect(after).not.toBe(before);
    expect(after).toBe(browser.drivers[1]);
    expect(launch).toHaveBeenCalledTimes(1);
  });

  it('closes the browser once and is a no-op the second time', async () => {
    const browser = new FakeBrowser();
    const { session } = sessionWith(browser);
    await session.acquire();

    await session.close();
    await session.close();

    expect(browser.closeCount).toBe(1);
  });

  it('does not launch anything when closed before first use', async () => {
    const { session, launch } = sessionWith();

    await session.close();

    expect(launch).not.toHaveBeenCalled();
  });

  it('closes the browser and reports a setup failure when no page can be opened', async () => {
    const browser = new FakeBrowser();
    browser.newPageError = new Error('context refused');
    const { session } = sessionWith(browser);

    await expect(session.acquire()).rejects.toThrow('Browser setup failed: context refused');
    expect(browser.closeCount).toBe(1);
  });
});

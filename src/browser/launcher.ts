import { chromium } from 'rebrowser-playwright-core';
import { PlaywrightDriver, type PageDriver } from './driver.js';

export interface LaunchOptions {
  /** Chromium binary to use; `null` lets the driver find one. */
  executablePath: string | null;
  headless?: boolean;
}

/** An open tab and the driver over it. */
export interface BrowserPage {
  driver: PageDriver;
  /** Called once if the tab crashes or is closed. */
  onGone(listener: (reason: 'crash' | 'close') => void): void;
}

/** A running browser, reduced to what a session needs from it. */
export interface LaunchedBrowser {
  newPage(userAgent: string): Promise<BrowserPage>;
  onDisconnected(listener: () => void): void;
  close(): Promise<void>;
}

export type Launcher = (options: LaunchOptions) => Promise<LaunchedBrowser>;

export const launchBrowser: Launcher = async (options) => {
  const browser = await chromium.launch({
    headless: options.headless ?? true,
    executablePath: options.executablePath ?? undefined,
    args: [
      '--no-sandbox',
      '--disable-dev-shm-usage',
      '--disable-gpu',
      '--disable-extensions',
      '--disable-plugins',
      '--disable-blink-features=AutomationControlled',
      '--no-first-run',
      '--window-size=1920,1080',
    ],
  });

  return {
    async newPage(userAgent) {
      const context = await browser.newContext({ userAgent, viewport: { width: 1920, height: 1080 } });
      const page = await context.newPage();
      return {
        driver: new PlaywrightDriver(page),
        onGone(listener) {
          page.once('crash', () => listener('crash'));
          page.once('close', () => listener('close'));
        },
      };
    },
    onDisconnected(listener) {
      browser.on('disconnected', listener);
    },
    async close() {
      await browser.close();
    },
  };
};

import type { Logger } from 'pino';
import { SetupFailure, describeError } from '../errors.js';
import type { DriverProvider, PageDriver } from './driver.js';
import { launchBrowser, type LaunchOptions, type LaunchedBrowser, type Launcher } from './launcher.js';

export interface SessionOptions extends LaunchOptions {
  userAgent: string;
}

/**
 * Owns the one headless browser (and page) shared by every browser check in the process.
 * Started on first use. A failed start or a browser crash relaunches on the next use;
 * a crashed or closed page is reopened on the same browser.
 */
export class BrowserSession implements DriverProvider {
  private browser: LaunchedBrowser | null = null;
  private driver: PageDriver | null = null;

  constructor(
    private readonly options: SessionOptions,
    private readonly log: Logger,
    private readonly launch: Launcher = launchBrowser,
  ) {}

  async acquire(): Promise<PageDriver> {
    if (this.driver) return this.driver;

    const browser = this.browser ?? (await this.start());

    try {
      const page = await browser.newPage(this.options.userAgent);
      const driver = page.driver;
      page.onGone((reason) => {
        if (this.driver === driver) {
          this.log.warn({ reason }, 'Browser page lost, will reopen on next check');
          this.driver = null;
        }
      });
      this.driver = driver;
      return driver;
    } catch (err) {
      this.log.error({ err }, 'Failed to open browser page');
      await this.close();
      throw new SetupFailure(`Browser setup failed: ${describeError(err)}`, { cause: err });
    }
  }

  private async start(): Promise<LaunchedBrowser> {
    let browser: LaunchedBrowser;
    try {
      browser = await this.launch(this.options);
    } catch (err) {
      this.log.error({ err }, 'Failed to launch browser');
      throw new SetupFailure(`Browser setup failed: ${describeError(err)}`, { cause: err });
    }

    browser.onDisconnected(() => {
      if (this.browser === browser) {
        this.log.warn('Browser disconnected, will relaunch on next check');
        this.browser = null;
        this.driver = null;
      }
    });
    this.browser = browser;
    this.log.info({ executablePath: this.options.executablePath ?? 'bundled' }, 'Browser session started');
    return browser;
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.driver = null;
    if (!browser) return;

    try {
      await browser.close();
      this.log.info('Browser closed');
    } catch (err) {
      this.log.warn({ err }, 'Browser did not close cleanly');
    }
  }
}

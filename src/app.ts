import type { Logger } from 'pino';
import type { AppConfig } from './config.js';
import { BrowserSession } from './browser/session.js';
import { launchBrowser, type Launcher } from './browser/launcher.js';
import { runContinuous, runSingleCheck } from './monitor/poller.js';
import { Notifier } from './notify/index.js';
import { EmailChannel } from './notify/email.js';
import { TelegramChannel } from './notify/telegram.js';
import { StockChecker } from './scraper/index.js';
import { HttpStockStrategy } from './scraper/http.js';
import { BrowserStockStrategy } from './scraper/browser.js';

export type RunMode = 'single' | 'continuous';

/**
 * Wires the checkers and channels for `config`, runs the chosen mode and
 * always releases the browser before returning. SIGINT/SIGTERM stop the run
 * at the next product or sleep boundary.
 */
export async function runApp(
  config: AppConfig,
  log: Logger,
  mode: RunMode,
  launch: Launcher = launchBrowser,
): Promise<void> {
  const session = new BrowserSession(
    { executablePath: config.browser.executablePath, userAgent: config.userAgent },
    log,
    launch,
  );
  const checker = new StockChecker({
    http: new HttpStockStrategy(config.userAgent, log),
    browser: new BrowserStockStrategy(session, log),
  });
  const telegram = new TelegramChannel(config.telegram, log);
  const notifier = new Notifier([new EmailChannel(config.email, log), telegram], log);

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'Monitor stopped by user');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  log.info(
    {
      mode,
      source: config.source,
      products: config.products.length,
      browserProducts: config.products.filter((p) => p.useBrowser).length,
      telegram: telegram.enabled,
    },
    'Stockwatch starting',
  );

  try {
    if (mode === 'single') {
      await runSingleCheck(config.products, { checker, notifier, log }, controller.signal);
    } else {
      await runContinuous(config.products, { checker, notifier, log }, {
        intervalSec: config.checkIntervalSec,
        signal: controller.signal,
      });
    }
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    await session.close();
  }
}

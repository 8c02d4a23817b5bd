import type { Logger } from 'pino';
import type { ProductConfig } from '../config.js';
import type { DriverProvider, PageDriver } from '../browser/driver.js';
import { SetupFailure, describeError } from '../errors.js';
import { RENDERED_ALERT_SELECTOR, classifyAlertText } from './classifier.js';
import { resolveLocationModal } from './modal.js';
import { indeterminate, type StockStrategy, type StockVerdict } from './types.js';

export const NAVIGATION_TIMEOUT_MS = 30_000;
export const LOAD_COMPLETE_TIMEOUT_MS = 15_000;

export class BrowserStockStrategy implements StockStrategy {
  constructor(
    private readonly session: DriverProvider,
    private readonly log: Logger,
  ) {}

  async check(product: ProductConfig): Promise<StockVerdict> {
    let driver: PageDriver;
    try {
      driver = await this.session.acquire();
    } catch (err) {
      const reason = err instanceof SetupFailure ? err.message : `Browser setup failed: ${describeError(err)}`;
      return indeterminate('setup', reason);
    }

    try {
      await driver.goto(product.url, NAVIGATION_TIMEOUT_MS);

      if (!(await resolveLocationModal(driver, product, this.log))) {
        return indeterminate('modal', 'Failed to handle pincode modal');
      }

      await driver.waitForLoadComplete(LOAD_COMPLETE_TIMEOUT_MS);

      const alertText = await driver.textOf(RENDERED_ALERT_SELECTOR);
      return classifyAlertText(alertText);
    } catch (err) {
      this.log.error({ product: product.name, err: describeError(err) }, 'Browser check failed');
      return indeterminate('fetch', `Browser error: ${describeError(err)}`);
    }
  }
}

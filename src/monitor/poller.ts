import type { Logger } from 'pino';
import type { ProductConfig } from '../config.js';
import { describeError } from '../errors.js';
import type { DeliveryReport } from '../notify/index.js';
import type { StockAlert } from '../notify/types.js';
import type { StockVerdict } from '../scraper/types.js';
import { sleep as defaultSleep, type Sleep } from '../timing/delay.js';
import { StatusTracker, type TransitionType } from './state.js';

export const PRODUCT_PAUSE_MS = 2_000;
export const ERROR_COOLDOWN_MS = 60_000;

export interface ProductCheck {
  check(product: ProductConfig): Promise<StockVerdict>;
}

export interface AlertSender {
  notify(alert: StockAlert): Promise<DeliveryReport>;
}

export interface MonitorDeps {
  checker: ProductCheck;
  notifier: AlertSender;
  log: Logger;
  sleep?: Sleep;
  now?: () => Date;
}

export interface ProductReport {
  product: string;
  verdict: StockVerdict;
  transition: TransitionType;
  /** Per-channel delivery, or `null` when no alert was due. */
  delivery: DeliveryReport | null;
}

interface PassOptions {
  /** Log and skip a product whose check throws, instead of failing the pass. */
  isolateErrors: boolean;
  signal?: AbortSignal;
}

async function checkProduct(product: ProductConfig, tracker: StatusTracker, deps: MonitorDeps): Promise<ProductReport> {
  const { log } = deps;
  log.info({ product: product.name }, 'Checking product');

  const verdict = await deps.checker.check(product);
  const { transition, notify } = tracker.observe(product.name, verdict);

  let delivery: DeliveryReport | null = null;

  if (verdict.status === 'indeterminate') {
    log.warn({ product: product.name, failure: verdict.failure, reason: verdict.reason }, 'Could not determine stock status');
  } else if (notify) {
    log.info({ product: product.name, reason: verdict.reason }, 'ALERT: product is IN STOCK');
    delivery = await deps.notifier.notify({
      productName: product.name,
      url: product.url,
      reason: verdict.reason,
      checkedAt: (deps.now ?? (() => new Date()))(),
    });
    log.info({ product: product.name, delivery }, 'Notifications dispatched');
  } else if (verdict.status === 'in_stock') {
    log.info({ product: product.name }, 'OK: product is still in stock');
  } else {
    log.info({ product: product.name, reason: verdict.reason }, 'WAITING: product is out of stock');
  }

  return { product: product.name, verdict, transition, delivery };
}

export async function runCheckPass(
  products: readonly ProductConfig[],
  tracker: StatusTracker,
  deps: MonitorDeps,
  options: PassOptions,
): Promise<ProductReport[]> {
  const sleep = deps.sleep ?? defaultSleep;
  const reports: ProductReport[] = [];

  for (const [index, product] of products.entries()) {
    if (options.signal?.aborted) break;

    if (options.isolateErrors) {
      try {
        reports.push(await checkProduct(product, tracker, deps));
      } catch (err) {
        deps.log.error({ product: product.name, err: describeError(err) }, 'Unexpected error while checking product');
      }
    } else {
      reports.push(await checkProduct(product, tracker, deps));
    }

    if (index < products.length - 1) {
      await sleep(PRODUCT_PAUSE_MS, options.signal);
    }
  }

  deps.log.info(summarize(reports), 'Check pass complete');
  return reports;
}

export function summarize(reports: readonly ProductReport[]): Record<string, number> {
  const summary = { checked: reports.length, inStock: 0, outOfStock: 0, indeterminate: 0, notified: 0 };
  for (const report of reports) {
    if (report.verdict.status === 'in_stock') summary.inStock++;
    else if (report.verdict.status === 'out_of_stock') summary.outOfStock++;
    else summary.indeterminate++;
    if (report.delivery) summary.notified++;
  }
  return summary;
}

/**
 * One pass over every product with no memory of earlier runs,
 * so every in-stock product is alerted.
 */
export async function runSingleCheck(
  products: readonly ProductConfig[],
  deps: MonitorDeps,
  signal?: AbortSignal,
): Promise<ProductReport[]> {
  deps.log.info({ products: products.length }, 'Starting single stock check');
  return runCheckPass(products, new StatusTracker(), deps, { isolateErrors: true, signal });
}

export interface ContinuousOptions {
  intervalSec: number;
  signal: AbortSignal;
  cooldownMs?: number;
}

/**
 * Repeats the check pass until `signal` aborts, alerting only on restocks.
 * An unexpected error abandons the pass and retries after a fixed cooldown.
 */
export async function runContinuous(
  products: readonly ProductConfig[],
  deps: MonitorDeps,
  options: ContinuousOptions,
): Promise<StatusTracker> {
  const { log } = deps;
  const { signal } = options;
  const sleep = deps.sleep ?? defaultSleep;
  const cooldownMs = options.cooldownMs ?? ERROR_COOLDOWN_MS;
  const tracker = new StatusTracker();

  log.info({ products: products.length, intervalSec: options.intervalSec }, 'Starting continuous stock monitor');

  let cycle = 0;
  while (!signal.aborted) {
    cycle++;
    try {
      await runCheckPass(products, tracker, deps, { isolateErrors: false, signal });
      if (signal.aborted) break;

      log.info({ cycle, seconds: options.intervalSec }, 'Waiting before next check');
      await sleep(options.intervalSec * 1000, signal);
    } catch (err) {
      log.error({ cycle, err: describeError(err), cooldownSec: cooldownMs / 1000 }, 'Unexpected error, cooling down');
      await sleep(cooldownMs, signal);
    }
  }

  log.info({ cycles: cycle }, 'Monitor stopped');
  return tracker;
}

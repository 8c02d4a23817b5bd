import type { FailureKind } from '../errors.js';
import type { ProductConfig } from '../config.js';

export type StockStatus = 'in_stock' | 'out_of_stock';

export type StockVerdict =
  | { status: 'in_stock'; reason: string }
  | { status: 'out_of_stock'; reason: string }
  | { status: 'indeterminate'; reason: string; failure: Exclude<FailureKind, 'notification'> };

/**
 * One way of loading a product page and turning it into a verdict.
 * Implementations resolve every failure to an indeterminate verdict instead of rejecting.
 */
export interface StockStrategy {
  check(product: ProductConfig): Promise<StockVerdict>;
}

export const inStock = (reason: string): StockVerdict => ({ status: 'in_stock', reason });

export const outOfStock = (reason: string): StockVerdict => ({ status: 'out_of_stock', reason });

export const indeterminate = (
  failure: Extract<StockVerdict, { status: 'indeterminate' }>['failure'],
  reason: string,
): StockVerdict => ({ status: 'indeterminate', reason, failure });

import type { StockStatus, StockVerdict } from '../scraper/types.js';

export type TransitionType = 'restock' | 'sold_out' | 'none' | 'skipped';

export interface Observation {
  previous: StockStatus | null;
  transition: TransitionType;
  notify: boolean;
}

export function isAvailable(status: StockStatus | null): boolean {
  return status === 'in_stock';
}

export function detectTransition(previous: StockStatus | null, verdict: StockVerdict): TransitionType {
  if (verdict.status === 'indeterminate') return 'skipped';

  const wasAvailable = isAvailable(previous);
  const nowAvailable = isAvailable(verdict.status);

  if (!wasAvailable && nowAvailable) return 'restock';
  if (wasAvailable && !nowAvailable) return 'sold_out';
  return 'none';
}

/**
 * Last determinate status per product. A product with no entry is "unknown",
 * which behaves like out of stock: the first in-stock verdict is a restock.
 */
export class StatusTracker {
  private readonly statuses = new Map<string, StockStatus>();

  get(productName: string): StockStatus | null {
    return this.statuses.get(productName) ?? null;
  }

  /** Records the verdict and reports whether it warrants a notification. */
  observe(productName: string, verdict: StockVerdict): Observation {
    const previous = this.get(productName);
    const transition = detectTransition(previous, verdict);

    if (verdict.status !== 'indeterminate') {
      this.statuses.set(productName, verdict.status);
    }

    return { previous, transition, notify: transition === 'restock' };
  }

  get size(): number {
    return this.statuses.size;
  }
}

import type { ProductConfig } from '../config.js';
import type { StockStrategy, StockVerdict } from './types.js';

export interface StockStrategies {
  http: StockStrategy;
  browser: StockStrategy;
}

/** Routes each product to the strategy its `use_selenium` flag selects. */
export class StockChecker {
  constructor(private readonly strategies: StockStrategies) {}

  strategyFor(product: ProductConfig): StockStrategy {
    return product.useBrowser ? this.strategies.browser : this.strategies.http;
  }

  check(product: ProductConfig): Promise<StockVerdict> {
    return this.strategyFor(product).check(product);
  }
}

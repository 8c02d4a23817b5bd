import type { Logger } from 'pino';
import type { ProductConfig } from '../config.js';
import { ClassificationFailure, FetchFailure, describeError } from '../errors.js';
import { classifyStaticHtml } from './classifier.js';
import { indeterminate, type StockStrategy, type StockVerdict } from './types.js';

export const HTTP_TIMEOUT_MS = 10_000;

export async function fetchPageHtml(url: string, userAgent: string, timeoutMs = HTTP_TIMEOUT_MS): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        'User-Agent': userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        'Accept-Encoding': 'gzip, deflate',
        Connection: 'keep-alive',
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new FetchFailure(describeError(err), { cause: err });
  }

  if (!response.ok) {
    throw new FetchFailure(`HTTP ${response.status} ${response.statusText}`.trim());
  }

  try {
    return await response.text();
  } catch (err) {
    throw new FetchFailure(`could not read response body: ${describeError(err)}`, { cause: err });
  }
}

export class HttpStockStrategy implements StockStrategy {
  constructor(
    private readonly userAgent: string,
    private readonly log: Logger,
  ) {}

  async check(product: ProductConfig): Promise<StockVerdict> {
    let html: string;
    try {
      html = await fetchPageHtml(product.url, this.userAgent);
    } catch (err) {
      this.log.error({ product: product.name, err }, 'Request failed');
      return indeterminate('fetch', `Request failed: ${describeError(err)}`);
    }

    try {
      return classifyStaticHtml(html);
    } catch (err) {
      const failure = new ClassificationFailure(describeError(err), { cause: err });
      this.log.error({ product: product.name, err: failure }, 'Could not classify page');
      return indeterminate('classification', `Error: ${failure.message}`);
    }
  }
}

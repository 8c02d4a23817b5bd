import * as cheerio from 'cheerio';
import { inStock, outOfStock, type StockVerdict } from './types.js';

/** Alert shown by the storefront on server-rendered pages. */
export const STATIC_ALERT_SELECTOR = 'div.alert.alert-danger.mt-3';

/** The same alert after client-side rendering, where the spacing class is not guaranteed. */
export const RENDERED_ALERT_SELECTOR = 'div.alert.alert-danger';

export const REASON_SOLD_OUT = "explicit 'Sold Out' alert found";
export const REASON_NO_ALERT = 'no sold-out alert, assuming available';
export const REASON_UNCONFIRMED = 'could not confirm status from alert element';

function saysSoldOut(text: string): boolean {
  return text.toLowerCase().includes('sold out');
}

/**
 * Classifies a server-rendered page. An alert that does not mention "sold out"
 * counts as available here, unlike {@link classifyAlertText}.
 */
export function classifyStaticHtml(html: string): StockVerdict {
  const $ = cheerio.load(html);
  const alert = $(STATIC_ALERT_SELECTOR).first();

  if (alert.length > 0 && saysSoldOut(alert.text())) {
    return outOfStock(REASON_SOLD_OUT);
  }
  return inStock(REASON_NO_ALERT);
}

/**
 * Classifies the text of the rendered alert element, or `null` when the page has none.
 * An alert with any other wording is treated as out of stock.
 */
export function classifyAlertText(alertText: string | null): StockVerdict {
  if (alertText === null) {
    return inStock(REASON_NO_ALERT);
  }
  if (saysSoldOut(alertText)) {
    return outOfStock(REASON_SOLD_OUT);
  }
  return outOfStock(REASON_UNCONFIRMED);
}

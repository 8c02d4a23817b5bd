import { describe, it, expect } from 'vitest';
import {
  classifyAlertText,
  classifyStaticHtml,
  REASON_NO_ALERT,
  REASON_SOLD_OUT,
  REASON_UNCONFIRMED,
} from './classifier.js';

const page = (body: string) => `<html><head><title>Widget</title></head><body>${body}</body></html>`;

describe('classifyStaticHtml', () => {
  it('is in stock when the page has no alert', () => {
    expect(classifyStaticHtml(page('<h1>Widget</h1><button>Add to cart</button>'))).toEqual({
      status: 'in_stock',
      reason: REASON_NO_ALERT,
    });
  });

  it('is out of stock when the danger alert says sold out, in any case', () => {
    for (const text of ['Sold Out', 'SOLD OUT', 'This item is sold out.']) {
      expect(classifyStaticHtml(page(`<div class="alert alert-danger mt-3">${text}</div>`))).toEqual({
        status: 'out_of_stock',
        reason: REASON_SOLD_OUT,
      });
    }
  });

  it('only looks at the first matching alert', () => {
    const html = page(
      '<div class="alert alert-danger mt-3">Limited offer</div><div class="alert alert-danger mt-3">Sold Out</div>',
    );
    expect(classifyStaticHtml(html).status).toBe('in_stock');
  });

  it('ignores a sold-out alert without the spacing class', () => {
    expect(classifyStaticHtml(page('<div class="alert alert-danger">Sold Out</div>')).status).toBe('in_stock');
  });

  // Differs from classifyAlertText, which treats the same alert as out of stock.
  it('treats an alert with other wording as in stock', () => {
    expect(classifyStaticHtml(page('<div class="alert alert-danger mt-3">Only 2 left</div>'))).toEqual({
      status: 'in_stock',
      reason: REASON_NO_ALERT,
    });
  });
});

describe('classifyAlertText', () => {
  it('is in stock when there is no alert element', () => {
    expect(classifyAlertText(null)).toEqual({ status: 'in_stock', reason: REASON_NO_ALERT });
  });

  it('is out of stock when the alert says sold out', () => {
    expect(classifyAlertText('  Sold out  ')).toEqual({ status: 'out_of_stock', reason: REASON_SOLD_OUT });
  });

  // Differs from classifyStaticHtml, which treats the same alert as in stock.
  it('treats an alert with other wording as out of stock', () => {
    expect(classifyAlertText('Only 2 left')).toEqual({ status: 'out_of_stock', reason: REASON_UNCONFIRMED });
  });

  it('treats an empty alert as out of stock', () => {
    expect(classifyAlertText('').status).toBe('out_of_stock');
  });
});

import pino, { type Logger } from 'pino';
import { DEFAULT_SELECTORS, type ProductConfig } from '../config.js';
import type { PageDriver } from '../browser/driver.js';
import type { BrowserPage, LaunchedBrowser } from '../browser/launcher.js';

export const quietLogger = (): Logger => pino({ level: 'silent' });

/** Logger that keeps every emitted line, parsed. */
export function capturingLogger(): { log: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const log = pino({ level: 'debug' }, {
    write(line: string) {
      lines.push(JSON.parse(line));
    },
  });
  return { log, lines };
}

export function makeProduct(overrides: Partial<ProductConfig> = {}): ProductConfig {
  return {
    name: 'Widget',
    url: 'https://shop.example.com/products/widget',
    useBrowser: false,
    pincode: null,
    selectors: { ...DEFAULT_SELECTORS },
    ...overrides,
  };
}

/** Scripted page: records every call and answers from the sets below. */
export class FakeDriver implements PageDriver {
  readonly calls: string[] = [];
  /** Selectors that are (or become) visible. */
  readonly visible = new Set<string>();
  /** Selectors that exist for `clickIfPresent`. */
  readonly present = new Set<string>();
  /** Visible selectors that never become editable. */
  readonly readonly = new Set<string>();
  /** Selectors that never disappear. */
  readonly stuck = new Set<string>();
  readonly texts = new Map<string, string>();
  gotoError: Error | null = null;

  async goto(url: string): Promise<void> {
    this.calls.push(`goto ${url}`);
    if (this.gotoError) throw this.gotoError;
  }

  async waitForLoadComplete(): Promise<void> {
    this.calls.push('waitForLoadComplete');
  }

  async waitForVisible(selector: string): Promise<boolean> {
    this.calls.push(`waitForVisible ${selector}`);
    return this.visible.has(selector);
  }

  async waitForInteractable(selector: string): Promise<boolean> {
    this.calls.push(`waitForInteractable ${selector}`);
    return this.visible.has(selector) && !this.readonly.has(selector);
  }

  async waitForHidden(selector: string, timeoutMs: number): Promise<void> {
    this.calls.push(`waitForHidden ${selector}`);
    if (this.stuck.has(selector)) {
      throw new Error(`Timeout ${timeoutMs}ms exceeded`);
    }
  }

  async fill(selector: string, value: string): Promise<void> {
    this.calls.push(`fill ${selector} ${value}`);
  }

  async clickWhenVisible(selector: string): Promise<boolean> {
    this.calls.push(`clickWhenVisible ${selector}`);
    return this.visible.has(selector);
  }

  async clickIfPresent(selector: string): Promise<boolean> {
    this.calls.push(`clickIfPresent ${selector}`);
    return this.present.has(selector);
  }

  async press(selector: string, key: string): Promise<void> {
    this.calls.push(`press ${selector} ${key}`);
  }

  async textOf(selector: string): Promise<string | null> {
    this.calls.push(`textOf ${selector}`);
    return this.texts.get(selector) ?? null;
  }

  async pause(ms: number): Promise<void> {
    this.calls.push(`pause ${ms}`);
  }
}

/** In-process browser: hands out `FakeDriver` pages and lets tests fire crash events. */
export class FakeBrowser implements LaunchedBrowser {
  readonly drivers: FakeDriver[] = [];
  closeCount = 0;
  newPageError: Error | null = null;
  private disconnectListeners: Array<() => void> = [];
  private goneListeners: Array<(reason: 'crash' | 'close') => void> = [];

  async newPage(): Promise<BrowserPage> {
    if (this.newPageError) throw this.newPageError;
    const driver = new FakeDriver();
    this.drivers.push(driver);
    return {
      driver,
      onGone: (listener) => {
        this.goneListeners.push(listener);
      },
    };
  }

  onDisconnected(listener: () => void): void {
    this.disconnectListeners.push(listener);
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }

  disconnect(): void {
    for (const listener of this.disconnectListeners) listener();
  }

  /** Fires the gone event of the most recently opened page. */
  losePage(reason: 'crash' | 'close'): void {
    this.goneListeners.at(-1)?.(reason);
  }
}

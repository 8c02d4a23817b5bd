import { errors, type Page } from 'rebrowser-playwright-core';

/**
 * The page operations the stock checks need. Every wait is bounded by an explicit timeout.
 */
export interface PageDriver {
  goto(url: string, timeoutMs: number): Promise<void>;
  /** Resolves once `document.readyState` is `complete`. */
  waitForLoadComplete(timeoutMs: number): Promise<void>;
  /** `false` when the element did not become visible in time. */
  waitForVisible(selector: string, timeoutMs: number): Promise<boolean>;
  /** `false` when the element did not become visible and editable within `timeoutMs` overall. */
  waitForInteractable(selector: string, timeoutMs: number): Promise<boolean>;
  waitForHidden(selector: string, timeoutMs: number): Promise<void>;
  fill(selector: string, value: string, timeoutMs: number): Promise<void>;
  /** Clicks the element once it is visible; `false` when it never showed up. */
  clickWhenVisible(selector: string, timeoutMs: number): Promise<boolean>;
  /** Clicks the element if it exists right now; `false` when it does not. */
  clickIfPresent(selector: string, timeoutMs: number): Promise<boolean>;
  press(selector: string, key: string, timeoutMs: number): Promise<void>;
  /** Visible text of the first match, or `null` when nothing matches. */
  textOf(selector: string): Promise<string | null>;
  pause(ms: number): Promise<void>;
}

export interface DriverProvider {
  acquire(): Promise<PageDriver>;
}

const EDITABLE_POLL_MS = 100;

export function isTimeout(err: unknown): boolean {
  return err instanceof errors.TimeoutError;
}

export class PlaywrightDriver implements PageDriver {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  async waitForLoadComplete(timeoutMs: number): Promise<void> {
    await this.page.waitForFunction('document.readyState === "complete"', undefined, { timeout: timeoutMs });
  }

  async waitForVisible(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { state: 'visible', timeout: timeoutMs });
      return true;
    } catch (err) {
      if (isTimeout(err)) return false;
      throw err;
    }
  }

  async waitForInteractable(selector: string, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    if (!(await this.waitForVisible(selector, timeoutMs))) return false;

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return false;
      try {
        if (await this.page.isEditable(selector, { timeout: remaining })) return true;
      } catch (err) {
        if (isTimeout(err)) return false;
        throw err;
      }
      await this.page.waitForTimeout(Math.min(EDITABLE_POLL_MS, remaining));
    }
  }

  async waitForHidden(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { state: 'hidden', timeout: timeoutMs });
  }

  async fill(selector: string, value: string, timeoutMs: number): Promise<void> {
    await this.page.fill(selector, value, { timeout: timeoutMs });
  }

  async clickWhenVisible(selector: string, timeoutMs: number): Promise<boolean> {
    if (!(await this.waitForVisible(selector, timeoutMs))) return false;
    await this.page.click(selector, { timeout: timeoutMs });
    return true;
  }

  async clickIfPresent(selector: string, timeoutMs: number): Promise<boolean> {
    const element = await this.page.$(selector);
    if (!element) return false;
    await element.click({ timeout: timeoutMs });
    return true;
  }

  async press(selector: string, key: string, timeoutMs: number): Promise<void> {
    await this.page.press(selector, key, { timeout: timeoutMs });
  }

  async textOf(selector: string): Promise<string | null> {
    const element = await this.page.$(selector);
    if (!element) return null;
    return element.innerText();
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }
}

import type { Locator, Page } from 'playwright';

// ─────────────────────────────────────────────────────────────────────────────
// AgentPage: the narrow slice of a browser page the mission core relies on.
// Playwright pages are adapted to it; tests supply an in-process fake.
// ─────────────────────────────────────────────────────────────────────────────

export interface TimeoutOptions {
  timeout?: number;
}

export interface AgentLocator {
  click(options?: TimeoutOptions): Promise<void>;
  fill(value: string, options?: TimeoutOptions): Promise<void>;
  press(key: string, options?: TimeoutOptions): Promise<void>;
  inputValue(options?: TimeoutOptions): Promise<string>;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  count(): Promise<number>;
  first(): AgentLocator;
}

export interface AgentPage {
  /** Current URL, read synchronously */
  url(): string;
  title(): Promise<string>;
  content(): Promise<string>;
  goto(url: string, options?: TimeoutOptions): Promise<void>;
  /** Evaluate a script expression in the page; callers validate the result */
  evaluate(script: string): Promise<unknown>;
  locator(selector: string): AgentLocator;
  /** Keyboard press on whatever currently has focus */
  pressKey(key: string): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;
  screenshot(options: { path: string; fullPage?: boolean }): Promise<void>;
  /** URLs of every frame on the page, main frame included */
  frameUrls(): string[];
  close(): Promise<void>;
}

// ─── Playwright adapter ──────────────────────────────────────────────────────

class PlaywrightLocator implements AgentLocator {
  constructor(private readonly inner: Locator) {}

  async click(options?: TimeoutOptions): Promise<void> {
    await this.inner.click(options);
  }

  async fill(value: string, options?: TimeoutOptions): Promise<void> {
    await this.inner.fill(value, options);
  }

  async press(key: string, options?: TimeoutOptions): Promise<void> {
    await this.inner.press(key, options);
  }

  async inputValue(options?: TimeoutOptions): Promise<string> {
    return this.inner.inputValue(options);
  }

  async isVisible(): Promise<boolean> {
    return this.inner.isVisible();
  }

  async isEnabled(): Promise<boolean> {
    return this.inner.isEnabled();
  }

  async count(): Promise<number> {
    return this.inner.count();
  }

  first(): AgentLocator {
    return new PlaywrightLocator(this.inner.first());
  }
}

export class PlaywrightPage implements AgentPage {
  constructor(readonly raw: Page) {}

  url(): string {
    return this.raw.url();
  }

  async title(): Promise<string> {
    return this.raw.title();
  }

  async content(): Promise<string> {
    return this.raw.content();
  }

  async goto(url: string, options?: TimeoutOptions): Promise<void> {
    await this.raw.goto(url, { waitUntil: 'domcontentloaded', timeout: options?.timeout });
  }

  async evaluate(script: string): Promise<unknown> {
    const result: unknown = await this.raw.evaluate(script);
    return result;
  }

  locator(selector: string): AgentLocator {
    return new PlaywrightLocator(this.raw.locator(normalizeSelector(selector)));
  }

  async pressKey(key: string): Promise<void> {
    await this.raw.keyboard.press(key);
  }

  async waitForTimeout(ms: number): Promise<void> {
    await this.raw.waitForTimeout(ms);
  }

  async screenshot(options: { path: string; fullPage?: boolean }): Promise<void> {
    await this.raw.screenshot({ path: options.path, fullPage: options.fullPage ?? false, type: 'png' });
  }

  frameUrls(): string[] {
    return this.raw.frames().map((f) => f.url());
  }

  async close(): Promise<void> {
    await this.raw.close();
  }
}

/**
 * Rewrite jQuery-style pseudo selectors the reasoner sometimes produces:
 *   :contains('text')  →  :has-text("text")
 *   [text='value']     →  :has-text("value")
 */
export function normalizeSelector(selector: string): string {
  return selector
    .replace(/:contains\(['"]([^'"]+)['"]\)/g, ':has-text("$1")')
    .replace(/\[text=['"]([^'"]+)['"]\]/g, ':has-text("$1")');
}

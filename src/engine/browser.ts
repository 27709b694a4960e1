import { chromium as chromiumExtra } from 'playwright-extra';
import { chromium } from 'playwright';
import { createRequire } from 'module';
import { randomUUID } from 'crypto';
import type { Browser, BrowserContext } from 'playwright';
import type { AgentConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { PlaywrightPage } from './page.js';

// The stealth plugin ships as CommonJS; load it from this ESM module on demand
const _require = createRequire(import.meta.url);
type StealthPluginFactory = () => Parameters<typeof chromiumExtra.use>[0];

let stealthInstalled = false;

function installStealth(): void {
  if (stealthInstalled) return;
  const StealthPlugin: StealthPluginFactory = _require('puppeteer-extra-plugin-stealth');
  chromiumExtra.use(StealthPlugin());
  stealthInstalled = true;
}

// ─────────────────────────────────────────────────────────────────────────────
// BrowserEngine: owns the Chromium process and hands out one isolated
// context + page per mission. Missions never share a page.
// ─────────────────────────────────────────────────────────────────────────────

export type BrowserSettings = Pick<AgentConfig, 'headless' | 'stealth' | 'cdpEndpoint' | 'navigationTimeoutMs'>;

export interface MissionSession {
  id: string;
  page: PlaywrightPage;
}

export class BrowserEngine {
  private browser: Browser | null = null;
  private contexts: Map<string, BrowserContext> = new Map();
  private settings: BrowserSettings;
  private logger?: Logger;

  constructor(settings: BrowserSettings, logger?: Logger) {
    this.settings = settings;
    this.logger = logger;
  }

  get isRunning(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  get sessionCount(): number {
    return this.contexts.size;
  }

  async launch(): Promise<void> {
    if (this.isRunning) return;

    if (this.settings.cdpEndpoint) {
      this.browser = await chromium.connectOverCDP(this.settings.cdpEndpoint);
      this.logger?.info({ endpoint: this.settings.cdpEndpoint }, 'connected to browser over CDP');
      return;
    }

    const launchArgs: string[] = [];
    if (this.settings.stealth) {
      installStealth();
      launchArgs.push('--disable-blink-features=AutomationControlled', '--no-sandbox', '--disable-setuid-sandbox');
    }

    this.browser = await chromiumExtra.launch({
      headless: this.settings.headless,
      args: launchArgs,
    });
    this.logger?.info({ headless: this.settings.headless, stealth: this.settings.stealth }, 'browser launched');
  }

  async close(): Promise<void> {
    for (const ctx of this.contexts.values()) {
      await ctx.close();
    }
    this.contexts.clear();
    await this.browser?.close();
    this.browser = null;
  }

  // ─── Sessions ──────────────────────────────────────────────────────────────

  async createSession(id: string = randomUUID()): Promise<MissionSession> {
    if (!this.isRunning) await this.launch();
    const browser = this.browser;
    if (!browser) throw new Error('Browser not launched');

    const context = await browser.newContext({
      userAgent: this.settings.stealth ? randomUserAgent() : undefined,
      viewport: { width: 1440, height: 900 },
      deviceScaleFactor: 1,
      hasTouch: false,
      extraHTTPHeaders: this.settings.stealth ? { 'Accept-Language': 'en-US,en;q=0.9' } : undefined,
    });
    context.setDefaultNavigationTimeout(this.settings.navigationTimeoutMs);

    const page = await context.newPage();
    this.contexts.set(id, context);
    return { id, page: new PlaywrightPage(page) };
  }

  async destroySession(id: string): Promise<void> {
    const ctx = this.contexts.get(id);
    this.contexts.delete(id);
    if (ctx) await ctx.close();
  }
}

// ─── Utilities ─────────────────────────────────────────────────────────────

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

const USER_AGENTS = [
  DEFAULT_USER_AGENT,
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
];

function randomUserAgent(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)] ?? DEFAULT_USER_AGENT;
}

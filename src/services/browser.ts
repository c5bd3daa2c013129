import { chromium } from 'playwright-core';
import type { Browser, BrowserContext, Page } from 'playwright-core';
import { addExtra } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { logger } from '../utils/logger.js';

export interface NavigationResult {
  /** HTTP status of the main document, or null when no response arrived. */
  status: number | null;
}

/**
 * The slice of browser automation the extraction protocol relies on.
 * `content()` is the single batched DOM read per page.
 */
export interface AutomationPage {
  goto(url: string, timeoutMs: number): Promise<NavigationResult>;
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  isVisible(selector: string): Promise<boolean>;
  click(selector: string, timeoutMs: number): Promise<void>;
  wait(ms: number): Promise<void>;
  content(): Promise<string>;
  url(): string;
  close(): Promise<void>;
}

export interface BrowserSession {
  newPage(): Promise<AutomationPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserSession>;

export interface BrowserOptions {
  headless: boolean;
  stealth: boolean;
  userAgent: string;
}

class PlaywrightPage implements AutomationPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<NavigationResult> {
    const response = await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
    return { status: response ? response.status() : null };
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs });
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.page.locator(selector).first().click({ timeout: timeoutMs });
  }

  async wait(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  url(): string {
    return this.page.url();
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
  ) {}

  async newPage(): Promise<AutomationPage> {
    const page = await this.context.newPage();
    return new PlaywrightPage(page);
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

async function launchChromium(options: BrowserOptions): Promise<Browser> {
  const launchOptions = {
    headless: options.headless,
    args: ['--disable-blink-features=AutomationControlled'],
  };

  if (options.stealth) {
    const stealthChromium = addExtra(chromium);
    stealthChromium.use(StealthPlugin());
    return stealthChromium.launch(launchOptions);
  }

  return chromium.launch(launchOptions);
}

export async function launchBrowser(options: BrowserOptions): Promise<BrowserSession> {
  logger.info({ headless: options.headless, stealth: options.stealth }, 'Launching browser');
  const browser = await launchChromium(options);

  try {
    const context = await browser.newContext({
      userAgent: options.userAgent,
      viewport: { width: 1920, height: 1080 },
      extraHTTPHeaders: {
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
        'DNT': '1',
        'Upgrade-Insecure-Requests': '1',
      },
    });
    return new PlaywrightSession(browser, context);
  } catch (error) {
    await browser.close();
    throw error;
  }
}

export function createBrowserLauncher(options: BrowserOptions): BrowserLauncher {
  return () => launchBrowser(options);
}

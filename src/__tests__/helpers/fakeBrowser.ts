import type { AutomationPage, BrowserSession, NavigationResult } from '../../services/browser.js';

/** Scripted page serving a fixed HTML document. */
export class FakePage implements AutomationPage {
  status: number | null = 200;
  navigationError: Error | null = null;
  readonly absentSelectors = new Set<string>();
  readonly visibility = new Map<string, () => boolean>();
  readonly clickHandlers = new Map<string, () => void>();
  readonly visited: string[] = [];
  readonly clicks: string[] = [];
  readonly waits: number[] = [];
  closed = false;
  private currentUrl = '';

  constructor(public html: string) {}

  async goto(url: string): Promise<NavigationResult> {
    this.visited.push(url);
    if (this.navigationError) {
      throw this.navigationError;
    }
    this.currentUrl = url;
    return { status: this.status };
  }

  async waitForSelector(selector: string): Promise<void> {
    if (this.absentSelectors.has(selector)) {
      throw new Error(`Timeout waiting for ${selector}`);
    }
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.visibility.get(selector)?.() ?? false;
  }

  async click(selector: string): Promise<void> {
    this.clicks.push(selector);
    this.clickHandlers.get(selector)?.();
  }

  async wait(ms: number): Promise<void> {
    this.waits.push(ms);
  }

  async content(): Promise<string> {
    return this.html;
  }

  url(): string {
    return this.currentUrl;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeBrowserSession implements BrowserSession {
  readonly pages: FakePage[] = [];
  closed = false;

  async newPage(): Promise<AutomationPage> {
    const page = new FakePage('<html><body></body></html>');
    this.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

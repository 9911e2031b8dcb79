import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import { logger } from '../utils/logger.js';

/**
 * The subset of a Playwright page the navigator drives. Kept narrow so the
 * navigator can be exercised against an in-process fake.
 */
export interface BrowserPage {
  goto(url: string, options?: { timeout?: number; waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' }): Promise<unknown>;
  waitForSelector(selector: string, options?: { timeout?: number; state?: 'attached' | 'visible' }): Promise<unknown>;
  isVisible(selector: string): Promise<boolean>;
  click(selector: string, options?: { timeout?: number }): Promise<void>;
  textContent(selector: string, options?: { timeout?: number }): Promise<string | null>;
  content(): Promise<string>;
  mouse: { wheel(deltaX: number, deltaY: number): Promise<void> };
}

/** Exclusive handle on one browser tab. Only the navigator it is given to may drive it. */
export interface SessionHandle {
  readonly page: BrowserPage;
}

export interface SessionOptions {
  headless: boolean;
}

export class BrowserSession implements SessionHandle {
  private closed = false;

  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    readonly page: Page,
  ) {}

  static async open(options: SessionOptions): Promise<BrowserSession> {
    const browser = await chromium.launch({
      headless: options.headless,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
    let context: BrowserContext | undefined;
    try {
      context = await browser.newContext({
        userAgent:
          'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
        viewport: { width: 1280, height: 800 },
      });
      const page = await context.newPage();
      logger.info({ headless: options.headless }, 'Playwright browser launched');
      return new BrowserSession(browser, context, page);
    } catch (err) {
      try {
        await context?.close();
      } finally {
        await browser.close();
      }
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
      logger.info('Playwright browser closed');
    }
  }
}

/** Runs `fn` with a fresh session and tears it down on every exit path. */
export async function withBrowserSession<T>(
  options: SessionOptions,
  fn: (session: SessionHandle) => Promise<T>,
): Promise<T> {
  const session = await BrowserSession.open(options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

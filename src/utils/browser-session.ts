/**
 * @fileoverview Browser session lifecycle. The fetcher talks to the browser
 * only through {@link PageHandle}, so the driver can be swapped for a fake in
 * tests. The single live page is created lazily and torn down on scope exit.
 */
import type { Logger as WinstonLogger } from 'winston';
import { describeError } from '../common/AppError.js';

/**
 * The operations the fetcher needs from a rendered page.
 */
export interface PageHandle {
  goto(url: string, timeoutMs: number): Promise<void>;
  /** Resolves false when the selector did not appear within the timeout. */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  /** Clicks the first element matching the selector if it is present now. */
  clickIfPresent(selector: string): Promise<boolean>;
  scrollHeight(): Promise<number>;
  scrollToBottom(): Promise<void>;
  content(): Promise<string>;
}

export interface BrowserHandle {
  newPage(): Promise<PageHandle>;
  close(): Promise<void>;
}

/**
 * Starts a browser. Implemented by the puppeteer driver and by test fakes.
 */
export interface BrowserLauncher {
  launch(): Promise<BrowserHandle>;
}

export class BrowserSession {
  private browser: BrowserHandle | null = null;
  private activePage: PageHandle | null = null;

  constructor(
    private readonly launcher: BrowserLauncher,
    private readonly logger: WinstonLogger
  ) {}

  get isOpen(): boolean {
    return this.browser !== null;
  }

  /**
   * Returns the live page, launching the browser first if needed.
   */
  async page(): Promise<PageHandle> {
    if (this.activePage) {
      return this.activePage;
    }
    if (!this.browser) {
      this.logger.debug('Launching browser session');
      this.browser = await this.launcher.launch();
    }
    this.activePage = await this.browser.newPage();
    return this.activePage;
  }

  /**
   * Tears the session down and starts a fresh one.
   */
  async reset(): Promise<void> {
    this.logger.info('Reinitializing browser session');
    await this.close();
    await this.page();
  }

  /**
   * Closes the browser. Close failures are logged, never thrown.
   */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.activePage = null;
    if (!browser) {
      return;
    }
    try {
      await browser.close();
      this.logger.debug('Browser session closed');
    } catch (error: unknown) {
      this.logger.warn(`Error closing browser session: ${describeError(error)}`);
    }
  }
}

/**
 * Runs `fn` with a session that is closed on every exit path.
 */
export async function withBrowserSession<T>(
  launcher: BrowserLauncher,
  logger: WinstonLogger,
  fn: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = new BrowserSession(launcher, logger);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

import puppeteer, {
  TimeoutError,
  type Browser,
  type Page,
  type PuppeteerLaunchOptions,
} from 'puppeteer-core';
import type { Logger as WinstonLogger } from 'winston';
import { BROWSER_LAUNCH_ARGS, type ScraperConfig } from '../config/app-config.js';
import type { BrowserHandle, BrowserLauncher, PageHandle } from './browser-session.js';

/**
 * Builds launch options from the scraper config. Without an explicit binary
 * the locally installed stable Chrome channel is used.
 */
export function buildLaunchOptions(config: ScraperConfig): PuppeteerLaunchOptions {
  const options: PuppeteerLaunchOptions = {
    headless: config.headless,
    args: [...BROWSER_LAUNCH_ARGS],
    defaultViewport: { width: 1920, height: 1080 },
  };
  if (config.executablePath) {
    options.executablePath = config.executablePath;
  } else {
    options.channel = 'chrome';
  }
  return options;
}

/**
 * Sets the timeout, user agent and viewport, and hides the webdriver flag.
 */
export async function configurePage(page: Page, config: ScraperConfig): Promise<Page> {
  page.setDefaultTimeout(config.pageLoadTimeoutMs);
  await page.setUserAgent(config.userAgent);
  await page.setViewport({
    width: 1920,
    height: 1080,
    deviceScaleFactor: 1,
    isMobile: false,
    hasTouch: false,
    isLandscape: true,
  });
  await page.evaluateOnNewDocument(() => {
    Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
    Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
  });
  return page;
}

export class PuppeteerPageHandle implements PageHandle {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'networkidle2', timeout: timeoutMs });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs });
      return true;
    } catch (error: unknown) {
      if (error instanceof TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async clickIfPresent(selector: string): Promise<boolean> {
    const element = await this.page.$(selector);
    if (!element) {
      return false;
    }
    await element.click();
    return true;
  }

  async scrollHeight(): Promise<number> {
    return this.page.evaluate(() => document.body.scrollHeight);
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => {
      window.scrollTo(0, document.body.scrollHeight);
    });
  }

  async content(): Promise<string> {
    return this.page.content();
  }
}

class PuppeteerBrowserHandle implements BrowserHandle {
  constructor(
    private readonly browser: Browser,
    private readonly config: ScraperConfig
  ) {}

  async newPage(): Promise<PageHandle> {
    const page = await configurePage(await this.browser.newPage(), this.config);
    return new PuppeteerPageHandle(page);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/**
 * {@link BrowserLauncher} backed by puppeteer-core.
 */
export class PuppeteerLauncher implements BrowserLauncher {
  constructor(
    private readonly config: ScraperConfig,
    private readonly logger: WinstonLogger
  ) {}

  async launch(): Promise<BrowserHandle> {
    const options = buildLaunchOptions(this.config);
    this.logger.debug('Launching Chrome', {
      headless: options.headless,
      executablePath: options.executablePath ?? `channel:${options.channel}`,
    });
    const browser = await puppeteer.launch(options);
    return new PuppeteerBrowserHandle(browser, this.config);
  }
}

/**
 * @module page-fetcher
 * @description Retrieves rendered markup for a URL through a {@link BrowserSession}.
 *
 * Each fetch makes at most `maxRetries` attempts. A driver error resets the
 * browser session and waits `2^attempt` seconds before the next attempt; the
 * last failure raises {@link RetrievalError} without waiting. When the
 * ready-selector does not appear in time the markup present at that moment is
 * returned. Every completed fetch is followed by a random politeness delay
 * between `requestDelayMinMs` and `requestDelayMaxMs`.
 */
import type { Logger as WinstonLogger } from 'winston';
import { describeError, RetrievalError } from '../common/AppError.js';
import { CONSENT_BUTTON_SELECTORS, type ScraperConfig } from '../config/app-config.js';
import type { BrowserSession, PageHandle } from './browser-session.js';
import { detectErrorType, formatDetailedError, ProcessingPhase } from './error-types.js';
import { dismissConsentDialogs, scrollUntilStable, sleep, type Sleep } from './page-interactions.js';
import {
  backoffDelayMs,
  createAcquisitionState,
  transition,
  type AcquisitionPhase,
  type AcquisitionState,
} from './retry-state-machine.js';

export interface FetchOptions {
  /** Selector whose presence marks the page as rendered. */
  waitForSelector?: string;
  /** Scroll until the page stops growing before reading the markup. */
  scroll?: boolean;
  /** Defaults to true. */
  dismissConsent?: boolean;
}

/**
 * Anything that turns a URL into markup. The batch orchestrator depends on
 * this rather than on the browser.
 */
export interface PageSource {
  fetch(url: string, options?: FetchOptions): Promise<string>;
}

export interface PageFetcherOptions {
  config: ScraperConfig;
  logger: WinstonLogger;
  sleep?: Sleep;
  /** Source of randomness for the politeness delay, in [0, 1). */
  random?: () => number;
}

export class PageFetcher implements PageSource {
  private readonly config: ScraperConfig;
  private readonly logger: WinstonLogger;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private state: AcquisitionState;

  constructor(
    private readonly session: BrowserSession,
    options: PageFetcherOptions
  ) {
    this.config = options.config;
    this.logger = options.logger;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.state = createAcquisitionState(this.config.maxRetries);
  }

  get phase(): AcquisitionPhase {
    return this.state.phase;
  }

  /**
   * @throws {RetrievalError} After `maxRetries` failed attempts.
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<string> {
    const { maxRetries } = this.config;
    this.state = createAcquisitionState(maxRetries);

    for (;;) {
      this.state = transition(this.state, 'START');
      const { attempt } = this.state;
      let step = ProcessingPhase.SESSION;
      try {
        const page = await this.session.page();

        step = ProcessingPhase.NAVIGATION;
        this.logger.info(`Navigating to ${url} (attempt ${attempt}/${maxRetries})`);
        await page.goto(url, this.config.pageLoadTimeoutMs);
        this.state = transition(this.state, 'NAVIGATED');

        step = ProcessingPhase.CONTENT_WAIT;
        const ready = await this.waitForContent(page, url, options);

        step = ProcessingPhase.INTERACTION;
        if (options.dismissConsent ?? true) {
          await dismissConsentDialogs(
            page,
            CONSENT_BUTTON_SELECTORS,
            this.config.consentSettleMs,
            this.logger,
            this.sleep
          );
        }
        if (options.scroll) {
          await scrollUntilStable(
            page,
            {
              pauseMs: this.config.scrollPauseMs,
              maxIterations: this.config.maxScrollIterations,
              wait: this.sleep,
            },
            this.logger
          );
        }

        step = ProcessingPhase.EXTRACTION;
        const html = await page.content();
        this.state = transition(this.state, ready ? 'CONTENT_READY' : 'CONTENT_TIMEOUT');
        this.logger.debug(`Retrieved ${html.length} characters from ${url}`);

        await this.politenessDelay();
        this.state = transition(this.state, 'RESET');
        return html;
      } catch (error: unknown) {
        const detailed = detectErrorType(error, step, url, attempt);
        this.state = transition(this.state, 'DRIVER_ERROR');

        if (this.state.phase === 'FAILED') {
          this.logger.error(`Giving up on ${url}: ${formatDetailedError(detailed)}`);
          this.state = transition(this.state, 'RESET');
          await this.session.close();
          throw new RetrievalError(url, attempt, error);
        }

        const delay = backoffDelayMs(attempt);
        this.logger.warn(
          `Attempt ${attempt}/${maxRetries} failed for ${url} [${detailed.code}]: ${detailed.message}. Retrying in ${delay}ms`
        );
        await this.sleep(delay);
        await this.reinitializeSession();
        this.state = transition(this.state, 'REINITIALIZED');
      }
    }
  }

  private async waitForContent(
    page: PageHandle,
    url: string,
    options: FetchOptions
  ): Promise<boolean> {
    if (!options.waitForSelector) {
      return true;
    }
    const found = await page.waitForSelector(
      options.waitForSelector,
      this.config.pageLoadTimeoutMs
    );
    if (!found) {
      this.logger.warn(
        `Timed out waiting for "${options.waitForSelector}" on ${url}; using the current markup`
      );
    }
    return found;
  }

  /**
   * A failed relaunch is logged; the next attempt launches again lazily.
   */
  private async reinitializeSession(): Promise<void> {
    try {
      await this.session.reset();
    } catch (error: unknown) {
      this.logger.error(`Failed to reinitialize browser session: ${describeError(error)}`);
    }
  }

  private async politenessDelay(): Promise<void> {
    const { requestDelayMinMs: min, requestDelayMaxMs: max } = this.config;
    const delay = Math.round(min + this.random() * (max - min));
    if (delay > 0) {
      await this.sleep(delay);
    }
  }
}

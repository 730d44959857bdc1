/**
 * @fileoverview Best-effort page interactions run between navigation and
 * reading the markup: dismissing consent dialogs and scrolling until lazily
 * loaded rows stop appearing.
 */
import type { Logger as WinstonLogger } from 'winston';
import { describeError } from '../common/AppError.js';
import type { PageHandle } from './browser-session.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Clicks the first consent button found. Failures are logged at debug level
 * and never propagate.
 *
 * @returns The selector that was clicked, or null.
 */
export async function dismissConsentDialogs(
  page: PageHandle,
  selectors: readonly string[],
  settleMs: number,
  logger: WinstonLogger,
  wait: Sleep = sleep
): Promise<string | null> {
  for (const selector of selectors) {
    try {
      if (await page.clickIfPresent(selector)) {
        logger.debug(`Dismissed consent dialog using selector: ${selector}`);
        await wait(settleMs);
        return selector;
      }
    } catch (error: unknown) {
      logger.debug(`Consent selector ${selector} failed: ${describeError(error)}`);
    }
  }
  return null;
}

export interface ScrollOptions {
  pauseMs: number;
  maxIterations: number;
  wait?: Sleep;
}

/**
 * Scrolls to the bottom repeatedly until the document height stops growing
 * or `maxIterations` scrolls have been made.
 *
 * @returns The number of scrolls performed.
 */
export async function scrollUntilStable(
  page: PageHandle,
  { pauseMs, maxIterations, wait = sleep }: ScrollOptions,
  logger: WinstonLogger
): Promise<number> {
  let lastHeight = await page.scrollHeight();
  let iterations = 0;
  while (iterations < maxIterations) {
    await page.scrollToBottom();
    iterations++;
    await wait(pauseMs);
    const height = await page.scrollHeight();
    if (height === lastHeight) {
      break;
    }
    lastHeight = height;
  }
  logger.debug(`Scrolling finished after ${iterations} iteration(s), height ${lastHeight}`);
  return iterations;
}

// src/config/app-config.ts
import { ConfigurationError } from '../common/AppError.js';

/**
 * Default User-Agent string for browser page requests.
 */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

/**
 * Origin of the rankings site. Detail URLs are resolved against it and
 * validated against its host.
 */
export const SITE_ORIGIN = 'https://www.timeshighereducation.com';

export const SITE_DOMAIN = 'timeshighereducation.com';

/**
 * Base of the rankings listing; the year and view are appended.
 */
export const RANKINGS_BASE_URL = `${SITE_ORIGIN}/world-university-rankings`;

export const DEFAULT_RANKINGS_YEAR = '2025';
export const DEFAULT_RANKINGS_VIEW = 'reputation';

/**
 * Selector the rankings fetch waits for before reading the markup.
 */
export const RANKINGS_READY_SELECTOR =
  'table.rankings-table, table.data-table, table#datatable-1';

/**
 * Selector the detail fetch waits for before reading the markup.
 */
export const DETAIL_READY_SELECTOR = '.profile-header';

/**
 * Buttons that accept or dismiss cookie/consent dialogs, tried in order.
 */
export const CONSENT_BUTTON_SELECTORS = [
  '#onetrust-accept-btn-handler',
  '.cookie-consent-accept',
  '.accept-cookies',
  "[data-cookieconsent='accept']",
  '[class*="consent"] button[class*="accept"]',
  '[class*="cookie"] button[class*="accept"]',
  'button[id*="cookie"][id*="accept"]',
] as const;

/**
 * Chromium launch arguments for a stable headless session.
 */
export const BROWSER_LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--window-size=1920,1080',
  '--disable-blink-features=AutomationControlled',
  '--disable-extensions',
  '--no-first-run',
  '--no-default-browser-check',
] as const;

/**
 * Runtime knobs for acquisition and batching. All durations are in milliseconds.
 */
export interface ScraperConfig {
  maxRetries: number;
  /** Lower bound of the politeness delay after a successful fetch. */
  requestDelayMinMs: number;
  /** Upper bound of the politeness delay after a successful fetch. */
  requestDelayMaxMs: number;
  pageLoadTimeoutMs: number;
  /** Pause after a consent dialog is dismissed. */
  consentSettleMs: number;
  scrollPauseMs: number;
  maxScrollIterations: number;
  batchSize: number;
  headless: boolean;
  /** Minimum detail success rate before the pipeline warns. */
  minSuccessRate: number;
  userAgent: string;
  /** Chrome/Chromium binary; the `chrome` release channel is used when absent. */
  executablePath?: string;
}

export const DEFAULT_SCRAPER_CONFIG: Readonly<ScraperConfig> = {
  maxRetries: 3,
  requestDelayMinMs: 2000,
  requestDelayMaxMs: 3000,
  pageLoadTimeoutMs: 30000,
  consentSettleMs: 1000,
  scrollPauseMs: 2000,
  maxScrollIterations: 20,
  batchSize: 50,
  headless: true,
  minSuccessRate: 0.7,
  userAgent: DEFAULT_USER_AGENT,
  executablePath: process.env.PUPPETEER_EXECUTABLE_PATH || undefined,
};

const POSITIVE_INTEGER_KEYS = [
  'maxRetries',
  'pageLoadTimeoutMs',
  'maxScrollIterations',
  'batchSize',
] as const;

const NON_NEGATIVE_KEYS = [
  'requestDelayMinMs',
  'requestDelayMaxMs',
  'consentSettleMs',
  'scrollPauseMs',
] as const;

/**
 * Merges overrides over {@link DEFAULT_SCRAPER_CONFIG} and validates the result.
 * Undefined override values leave the default in place.
 *
 * @throws {ConfigurationError} If a value is out of range.
 */
export function resolveScraperConfig(
  overrides: Partial<ScraperConfig> = {}
): ScraperConfig {
  const config: ScraperConfig = { ...DEFAULT_SCRAPER_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }

  for (const key of POSITIVE_INTEGER_KEYS) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigurationError(
        `${key} must be a positive integer (got ${value})`,
        key
      );
    }
  }
  for (const key of NON_NEGATIVE_KEYS) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigurationError(
        `${key} must be a non-negative number (got ${value})`,
        key
      );
    }
  }
  if (config.requestDelayMinMs > config.requestDelayMaxMs) {
    throw new ConfigurationError(
      `requestDelayMinMs (${config.requestDelayMinMs}) must not exceed requestDelayMaxMs (${config.requestDelayMaxMs})`,
      'requestDelayMinMs'
    );
  }
  if (config.minSuccessRate < 0 || config.minSuccessRate > 1) {
    throw new ConfigurationError(
      `minSuccessRate must be between 0 and 1 (got ${config.minSuccessRate})`,
      'minSuccessRate'
    );
  }
  return config;
}

/**
 * Builds the rankings listing URL for a year and view.
 * @example buildRankingsUrl('2025', 'reputation')
 * // 'https://www.timeshighereducation.com/world-university-rankings/2025/world-ranking/results?view=reputation'
 */
export function buildRankingsUrl(
  year: string = DEFAULT_RANKINGS_YEAR,
  view: string = DEFAULT_RANKINGS_VIEW
): string {
  return `${RANKINGS_BASE_URL}/${encodeURIComponent(year)}/world-ranking/results?view=${encodeURIComponent(view)}`;
}

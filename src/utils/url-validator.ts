/**
 * @fileoverview Shape checks for detail-page URLs. Runs before any browser work
 * so that non-profile links in the rankings table never reach the fetcher.
 */
import type { Logger as WinstonLogger } from 'winston';
import { SITE_DOMAIN } from '../config/app-config.js';

export interface UrlValidationResult {
  isValid: boolean;
  reason?: string;
  url: string;
}

export interface UrlValidationRules {
  /** Registered domain; subdomains of it are accepted. */
  domain: string;
  /** Pattern the URL path must match. */
  pathPattern: RegExp;
}

/**
 * `/world-university-rankings/<slug>`; year and `latest` listings are not
 * profiles.
 */
export const DETAIL_PATH_PATTERN =
  /^\/world-university-rankings\/(?!\d{4}(?:\/|$))(?!latest(?:\/|$))[a-z0-9]+(?:-[a-z0-9]+)*\/?$/i;

export const DETAIL_URL_RULES: UrlValidationRules = {
  domain: SITE_DOMAIN,
  pathPattern: DETAIL_PATH_PATTERN,
};

export function validateDetailUrl(
  url: string,
  rules: UrlValidationRules = DETAIL_URL_RULES
): UrlValidationResult {
  const trimmed = url.trim();
  if (!trimmed) {
    return { isValid: false, reason: 'empty', url: trimmed };
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return { isValid: false, reason: 'not an absolute URL', url: trimmed };
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return { isValid: false, reason: `unsupported protocol ${parsed.protocol}`, url: trimmed };
  }
  const host = parsed.hostname.toLowerCase();
  if (host !== rules.domain && !host.endsWith(`.${rules.domain}`)) {
    return { isValid: false, reason: `foreign domain ${host}`, url: trimmed };
  }
  if (!rules.pathPattern.test(parsed.pathname)) {
    return { isValid: false, reason: `unexpected path ${parsed.pathname}`, url: trimmed };
  }
  return { isValid: true, url: trimmed };
}

/**
 * Keeps the URLs that pass {@link validateDetailUrl}, trimmed, de-duplicated
 * and in input order. Drops are logged at debug level. Never throws, and
 * validating an already validated list returns it unchanged.
 */
export function validateDetailUrls(
  urls: readonly string[],
  logger?: WinstonLogger,
  rules: UrlValidationRules = DETAIL_URL_RULES
): string[] {
  const seen = new Set<string>();
  const valid: string[] = [];
  for (const url of urls) {
    const result = validateDetailUrl(url, rules);
    if (!result.isValid) {
      logger?.debug(`Dropping URL ${JSON.stringify(url)}: ${result.reason}`);
      continue;
    }
    if (seen.has(result.url)) {
      logger?.debug(`Dropping duplicate URL ${result.url}`);
      continue;
    }
    seen.add(result.url);
    valid.push(result.url);
  }
  if (valid.length < urls.length) {
    logger?.debug(`URL validation kept ${valid.length} of ${urls.length} URLs`);
  }
  return valid;
}

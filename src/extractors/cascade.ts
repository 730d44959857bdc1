/**
 * @fileoverview Ordered strategy lists. Each field or section is extracted by
 * trying its strategies in order; the first non-empty result wins. A strategy
 * that throws is recorded as a warning and the next one is tried.
 */
import type { CheerioAPI } from 'cheerio';
import type { Logger as WinstonLogger } from 'winston';
import { describeError } from '../common/AppError.js';
import type { ExtractionWarning } from '../common/types.js';

export interface ExtractionStrategy<T> {
  name: string;
  extract: ($: CheerioAPI) => T | null;
}

export interface CascadeOutcome<T> {
  value: T;
  strategy: string;
}

/**
 * Where warnings of one extraction run are collected.
 */
export interface ExtractionContext {
  warnings: ExtractionWarning[];
  logger?: WinstonLogger;
}

export function recordWarning(
  context: ExtractionContext,
  warning: ExtractionWarning
): void {
  context.warnings.push(warning);
  context.logger?.warn(
    `Extraction warning [${warning.scope}] ${warning.target}: ${warning.message}`
  );
}

/**
 * Empty strings, arrays and objects count as "no match".
 */
export function hasContent(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === 'string') {
    return value.trim().length > 0;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === 'object') {
    return Object.keys(value).length > 0;
  }
  return true;
}

export function runCascade<T>(
  $: CheerioAPI,
  section: string,
  strategies: readonly ExtractionStrategy<T>[],
  context: ExtractionContext
): CascadeOutcome<T> | null {
  for (const strategy of strategies) {
    try {
      const value = strategy.extract($);
      if (value !== null && hasContent(value)) {
        context.logger?.debug(`${section}: matched by ${strategy.name}`);
        return { value, strategy: strategy.name };
      }
    } catch (error: unknown) {
      recordWarning(context, {
        scope: 'strategy',
        target: `${section}/${strategy.name}`,
        message: describeError(error),
      });
    }
  }
  return null;
}

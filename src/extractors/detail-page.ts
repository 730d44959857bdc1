/**
 * @module detail-page
 * @description Builds a {@link DetailRecord} from a detail page. The five
 * sections are extracted independently; the record keeps whatever sections
 * succeeded and degrades to an error record only when none did.
 */
import * as cheerio from 'cheerio';
import type { Logger as WinstonLogger } from 'winston';
import type {
  DetailRecord,
  DetailRecordSuccess,
  ExtractionWarning,
  LabelledValues,
} from '../common/types.js';
import { recordWarning, runCascade, type ExtractionContext, type ExtractionStrategy } from './cascade.js';
import { additionalInfoStrategies } from './detail/additional-info.js';
import { keyStatsStrategies } from './detail/key-stats.js';
import { nameStrategies } from './detail/name.js';
import { rankingMetricStrategies } from './detail/ranking-metrics.js';
import { subjectStrategies } from './detail/subjects.js';

export const UNKNOWN_NAME = 'Unknown';
export const NO_SECTIONS_ERROR = 'No detail sections could be extracted';

export type DetailSection = 'name' | 'rankingData' | 'keyStats' | 'subjects' | 'additionalInfo';

export interface DetailExtraction {
  record: DetailRecord;
  warnings: ExtractionWarning[];
  /** Strategy that produced each section that was found. */
  strategies: Partial<Record<DetailSection, string>>;
}

function compactValues(values: LabelledValues): LabelledValues {
  const result: LabelledValues = {};
  for (const [key, value] of Object.entries(values)) {
    const trimmed = value.trim();
    if (key.trim() && trimmed) {
      result[key.trim()] = trimmed;
    }
  }
  return result;
}

/**
 * Trims identifiers, drops empty mapping values and unnamed subjects.
 * Returns a new record.
 */
export function cleanDetailRecord(record: DetailRecordSuccess): DetailRecordSuccess {
  return {
    status: 'success',
    url: record.url.trim(),
    name: record.name.trim() || UNKNOWN_NAME,
    rankingData: compactValues(record.rankingData),
    keyStats: compactValues(record.keyStats),
    subjects: record.subjects
      .map((subject) => ({ ...subject, name: subject.name.trim() }))
      .filter((subject) => subject.name),
    additionalInfo: compactValues(record.additionalInfo),
  };
}

export function extractDetailRecord(
  html: string,
  url: string,
  logger?: WinstonLogger
): DetailExtraction {
  const $ = cheerio.load(html);
  const context: ExtractionContext = { warnings: [], logger };
  const strategies: Partial<Record<DetailSection, string>> = {};

  const section = <T>(
    key: DetailSection,
    list: readonly ExtractionStrategy<T>[]
  ): T | null => {
    const outcome = runCascade($, key, list, context);
    if (!outcome) {
      recordWarning(context, {
        scope: 'section',
        target: `${url} ${key}`,
        message: 'No strategy matched',
      });
      return null;
    }
    strategies[key] = outcome.strategy;
    return outcome.value;
  };

  const name = section('name', nameStrategies);
  const rankingData = section('rankingData', rankingMetricStrategies);
  const keyStats = section('keyStats', keyStatsStrategies);
  const subjects = section('subjects', subjectStrategies);
  const additionalInfo = section('additionalInfo', additionalInfoStrategies);

  if (!name && !rankingData && !keyStats && !subjects && !additionalInfo) {
    logger?.warn(`${NO_SECTIONS_ERROR}: ${url}`);
    return {
      record: { status: 'error', url, error: NO_SECTIONS_ERROR },
      warnings: context.warnings,
      strategies,
    };
  }

  const record = cleanDetailRecord({
    status: 'success',
    url,
    name: name ?? UNKNOWN_NAME,
    rankingData: rankingData ?? {},
    keyStats: keyStats ?? {},
    subjects: subjects ?? [],
    additionalInfo: additionalInfo ?? {},
  });
  logger?.debug(`Extracted detail record for ${record.name}`, { url, strategies });
  return { record, warnings: context.warnings, strategies };
}

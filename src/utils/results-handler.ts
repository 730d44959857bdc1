/**
 * @fileoverview End-of-run reporting and output files. Summaries report
 * totals and per-field coverage instead of an all-or-nothing result; results
 * are written as timestamped JSON files in the output directory.
 */
import path from 'path';
import type { Logger as WinstonLogger } from 'winston';
import {
  isSuccessRecord,
  type DetailRecord,
  type RankEntry,
  type ScoreField,
} from '../common/types.js';
import { UNKNOWN_NAME, type DetailSection } from '../extractors/detail-page.js';
import { fileTimestamp, writeJsonFile } from './file-system-utils.js';

export interface DetailSummary {
  total: number;
  successful: number;
  failed: number;
  /** successful / total, 0 for an empty run. */
  successRate: number;
  /** Successful records with a non-empty value per section. */
  coverage: Record<DetailSection, number>;
  uniqueSubjects: number;
  uniqueLocations: number;
}

export interface RankingSummary {
  total: number;
  countries: number;
  withDetailUrl: number;
  scoreCoverage: Record<ScoreField, number>;
  overallMin: number | null;
  overallMax: number | null;
}

export type OutputKind = 'rankings' | 'details' | 'combined';

export function summarizeDetailRecords(records: readonly DetailRecord[]): DetailSummary {
  const coverage: Record<DetailSection, number> = {
    name: 0,
    rankingData: 0,
    keyStats: 0,
    subjects: 0,
    additionalInfo: 0,
  };
  const subjects = new Set<string>();
  const locations = new Set<string>();
  let successful = 0;

  for (const record of records) {
    if (!isSuccessRecord(record)) {
      continue;
    }
    successful++;
    if (record.name && record.name !== UNKNOWN_NAME) coverage.name++;
    if (Object.keys(record.rankingData).length > 0) coverage.rankingData++;
    if (Object.keys(record.keyStats).length > 0) coverage.keyStats++;
    if (record.subjects.length > 0) coverage.subjects++;
    if (Object.keys(record.additionalInfo).length > 0) coverage.additionalInfo++;

    record.subjects.forEach((subject) => subjects.add(subject.name.toLowerCase()));
    const location = record.additionalInfo.location;
    if (location) {
      locations.add(location);
    }
  }

  return {
    total: records.length,
    successful,
    failed: records.length - successful,
    successRate: records.length > 0 ? successful / records.length : 0,
    coverage,
    uniqueSubjects: subjects.size,
    uniqueLocations: locations.size,
  };
}

export function summarizeRankEntries(entries: readonly RankEntry[]): RankingSummary {
  const covered = (field: ScoreField) =>
    entries.filter((entry) => entry[field] !== null).length;
  const overall = entries
    .map((entry) => entry.overall)
    .filter((score): score is number => score !== null);

  return {
    total: entries.length,
    countries: new Set(entries.map((entry) => entry.country).filter(Boolean)).size,
    withDetailUrl: entries.filter((entry) => entry.detailUrl !== null).length,
    scoreCoverage: {
      overall: covered('overall'),
      teaching: covered('teaching'),
      research: covered('research'),
      citations: covered('citations'),
      industryIncome: covered('industryIncome'),
      internationalOutlook: covered('internationalOutlook'),
    },
    overallMin: overall.length > 0 ? Math.min(...overall) : null,
    overallMax: overall.length > 0 ? Math.max(...overall) : null,
  };
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/**
 * Logs every failed record and the run summary, and warns when the success
 * rate is below `minSuccessRate`.
 *
 * @example
 * processAndLogDetailRecords(records, logger, 0.7);
 * // info: Detail extraction: 8/10 succeeded (80.0%), 2 failed
 */
export function processAndLogDetailRecords(
  records: readonly DetailRecord[],
  logger: WinstonLogger,
  minSuccessRate: number
): DetailSummary {
  if (records.length === 0) {
    logger.info('No detail records to process.');
    return summarizeDetailRecords(records);
  }

  for (const record of records) {
    if (record.status === 'error') {
      logger.error(`ERROR: Detail extraction failed for URL: ${record.url} - ${record.error}`);
    }
  }

  const summary = summarizeDetailRecords(records);
  logger.info(
    `Detail extraction: ${summary.successful}/${summary.total} succeeded (${percent(summary.successRate)}), ${summary.failed} failed`
  );
  logger.info('Section coverage', summary.coverage);
  logger.info(
    `Unique subjects: ${summary.uniqueSubjects}, unique locations: ${summary.uniqueLocations}`
  );
  if (summary.successRate < minSuccessRate) {
    logger.warn(
      `Success rate ${percent(summary.successRate)} is below the minimum of ${percent(minSuccessRate)}`
    );
  }
  return summary;
}

export function logRankingSummary(
  entries: readonly RankEntry[],
  logger: WinstonLogger
): RankingSummary {
  const summary = summarizeRankEntries(entries);
  logger.info(
    `Rankings: ${summary.total} entries from ${summary.countries} countries, ${summary.withDetailUrl} with detail URLs`
  );
  if (summary.overallMin !== null && summary.overallMax !== null) {
    logger.info(`Overall score range: ${summary.overallMin} - ${summary.overallMax}`);
  }
  logger.debug('Score coverage', summary.scoreCoverage);
  return summary;
}

/**
 * Writes `data` to `<outputDir>/<kind>-<timestamp>.json` and returns the path.
 */
export async function writeResultsFile(
  kind: OutputKind,
  data: unknown,
  outputDir: string,
  logger: WinstonLogger,
  date: Date = new Date()
): Promise<string> {
  const filePath = path.join(outputDir, `${kind}-${fileTimestamp(date)}.json`);
  await writeJsonFile(filePath, data, logger);
  logger.info(`Results written to ${filePath}`);
  return filePath;
}

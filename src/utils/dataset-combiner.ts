/**
 * @module dataset-combiner
 * @description Left-joins rank entries with detail records on the detail URL.
 */
import type { Logger as WinstonLogger } from 'winston';
import {
  isSuccessRecord,
  type CompositeRecord,
  type DetailRecord,
  type DetailRecordSuccess,
  type RankEntry,
} from '../common/types.js';

/**
 * Join key for a URL: trimmed, fragment removed, host lower-cased and any
 * trailing slash dropped. Strings that do not parse as URLs are only trimmed.
 * @example urlKey('https://WWW.Example.com/a/#top') // 'https://www.example.com/a'
 */
export function urlKey(url: string): string {
  const trimmed = url.trim();
  try {
    const parsed = new URL(trimmed);
    parsed.hash = '';
    return parsed.toString().replace(/\/+$/, '');
  } catch {
    return trimmed.replace(/\/+$/, '');
  }
}

/**
 * Successful records keyed by {@link urlKey}. The first record for a key wins;
 * error records carry nothing to join and are left out.
 */
export function buildDetailLookup(
  records: readonly DetailRecord[]
): Map<string, DetailRecordSuccess> {
  const lookup = new Map<string, DetailRecordSuccess>();
  for (const record of records) {
    if (!isSuccessRecord(record)) {
      continue;
    }
    const key = urlKey(record.url);
    if (!lookup.has(key)) {
      lookup.set(key, record);
    }
  }
  return lookup;
}

/**
 * One composite per rank entry, in input order. Inputs are not modified;
 * detail fields are copied so the output shares no mutable state with them.
 */
export function combineDatasets(
  rankEntries: readonly RankEntry[],
  detailRecords: readonly DetailRecord[],
  logger?: WinstonLogger
): CompositeRecord[] {
  const lookup = buildDetailLookup(detailRecords);
  let matched = 0;

  const combined = rankEntries.map((entry): CompositeRecord => {
    const detail = entry.detailUrl ? lookup.get(urlKey(entry.detailUrl)) : undefined;
    if (!detail) {
      return { ...entry };
    }
    matched++;
    return {
      ...entry,
      detailedRankingData: { ...detail.rankingData },
      keyStats: { ...detail.keyStats },
      subjects: detail.subjects.map((subject) => ({ ...subject })),
      additionalInfo: { ...detail.additionalInfo },
    };
  });

  logger?.info(
    `Combined ${rankEntries.length} ranking entries with ${lookup.size} detail records (${matched} matched)`
  );
  return combined;
}

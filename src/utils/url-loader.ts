/**
 * @fileoverview Loads the inputs of the detail and combine stages: detail URLs
 * from JSON, CSV or text files, and rank entries or detail records written by
 * earlier runs.
 */
import path from 'path';
import { parse } from 'csv-parse/sync';
import type { Logger as WinstonLogger } from 'winston';
import { AppError, describeError } from '../common/AppError.js';
import { isDetailRecord, isObject, isRankEntry } from '../common/guards.js';
import type { DetailRecord, RankEntry } from '../common/types.js';
import { readJsonFile, readTextFile } from './file-system-utils.js';
import { URLLoadingTracer } from './telemetry.js';

/** Keys whose value holds the entry list in an object-shaped JSON file. */
export const LIST_KEYS = ['rankings', 'data', 'universities', 'results'] as const;

/** Entry fields that may carry a detail URL, in order of preference. */
export const URL_FIELDS = ['detailUrl', 'detail_url', 'university_url', 'url', 'link'] as const;

/**
 * The entry list of a parsed JSON document: the document itself when it is
 * an array, else the first of {@link LIST_KEYS} holding an array, else the
 * first array-valued property. Null when there is none.
 */
export function findEntryList(document: unknown): unknown[] | null {
  if (Array.isArray(document)) {
    return document;
  }
  if (!isObject(document)) {
    return null;
  }
  for (const key of LIST_KEYS) {
    const value = document[key];
    if (Array.isArray(value)) {
      return value;
    }
  }
  return Object.values(document).find((value): value is unknown[] => Array.isArray(value)) ?? null;
}

function urlOfEntry(entry: unknown): string | null {
  if (typeof entry === 'string') {
    return entry;
  }
  if (!isObject(entry)) {
    return null;
  }
  for (const field of URL_FIELDS) {
    const value = entry[field];
    if (typeof value === 'string' && value.trim()) {
      return value;
    }
  }
  return null;
}

function urlsFromJson(fileName: string, content: string, logger: WinstonLogger): string[] {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error: unknown) {
    throw new AppError(`Invalid JSON in ${fileName}: ${describeError(error)}`, {
      errorCode: 'JSON_PARSE_FAILED',
      originalError: error,
      fileName,
    });
  }
  const entries = findEntryList(document);
  if (!entries) {
    logger.warn(`No entry list found in ${fileName}`);
    return [];
  }
  return entries.map(urlOfEntry).filter((url): url is string => url !== null);
}

function urlsFromCsv(fileName: string, content: string, logger: WinstonLogger): string[] {
  const rows: unknown = parse(content, { columns: false, skip_empty_lines: true, trim: true });
  if (!Array.isArray(rows)) {
    return [];
  }
  const urls: string[] = [];
  for (const row of rows) {
    const cell: unknown = Array.isArray(row) ? row[0] : undefined;
    if (typeof cell !== 'string' || !cell) {
      continue;
    }
    if (/^https?:\/\//i.test(cell)) {
      urls.push(cell);
    } else {
      logger.debug(`Skipping non-URL CSV value in ${fileName}: "${cell}"`);
    }
  }
  return urls;
}

function urlsFromText(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

/**
 * Extracts candidate URLs from file content, choosing the parser by
 * extension: `.json`, `.csv`, anything else is one URL per line with `#`
 * comments. Duplicates are removed, first occurrence kept.
 *
 * @throws {AppError} `JSON_PARSE_FAILED` for malformed JSON.
 */
export function extractUrlsFromContent(
  fileName: string,
  content: string,
  logger: WinstonLogger
): string[] {
  const extension = path.extname(fileName).toLowerCase();
  let urls: string[];
  if (extension === '.json') {
    urls = urlsFromJson(fileName, content, logger);
  } else if (extension === '.csv') {
    urls = urlsFromCsv(fileName, content, logger);
  } else {
    urls = urlsFromText(content);
  }
  return [...new Set(urls.map((url) => url.trim()))];
}

/**
 * Reads detail URLs from a file. The result is not validated yet.
 */
export async function loadDetailUrls(filePath: string, logger: WinstonLogger): Promise<string[]> {
  const tracer = new URLLoadingTracer(filePath, logger);
  const content = await readTextFile(filePath, logger);
  tracer.recordUrlCount(content.length, 'content_read');

  const urls = extractUrlsFromContent(path.basename(filePath), content, logger);
  logger.info(`Loaded ${urls.length} URLs from ${filePath}`);
  tracer.finish(urls.length);
  return urls;
}

async function loadValidatedList<T>(
  filePath: string,
  kind: string,
  guard: (value: unknown) => value is T,
  logger: WinstonLogger
): Promise<T[]> {
  const entries = findEntryList(await readJsonFile(filePath, logger));
  if (!entries) {
    throw new AppError(`No ${kind} list found in ${filePath}`, {
      errorCode: 'INPUT_SHAPE_INVALID',
      filePath,
    });
  }
  const valid = entries.filter(guard);
  const skipped = entries.length - valid.length;
  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} malformed ${kind} in ${filePath}`);
  }
  logger.info(`Loaded ${valid.length} ${kind} from ${filePath}`);
  return valid;
}

/**
 * @throws {AppError} When the file cannot be read or holds no list.
 */
export function loadRankEntriesFile(filePath: string, logger: WinstonLogger): Promise<RankEntry[]> {
  return loadValidatedList(filePath, 'rank entries', isRankEntry, logger);
}

/**
 * @throws {AppError} When the file cannot be read or holds no list.
 */
export function loadDetailRecordsFile(
  filePath: string,
  logger: WinstonLogger
): Promise<DetailRecord[]> {
  return loadValidatedList(filePath, 'detail records', isDetailRecord, logger);
}

/**
 * @module rankings-table
 * @description Parses the rankings listing into {@link RankEntry} rows.
 *
 * Column layout: rank, institution (name link plus location), then the six
 * sub-scores in {@link SCORE_FIELDS} order. A row is skipped, with a warning,
 * when it has fewer than two cells, no name, or a rank that is neither a number
 * nor a placeholder dash; a placeholder rank is kept as null. Score defects
 * become null fields. Header rows (no `td`) are skipped silently.
 */
import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { Logger as WinstonLogger } from 'winston';
import { SITE_ORIGIN } from '../config/app-config.js';
import {
  SCORE_FIELDS,
  type ExtractionWarning,
  type RankEntry,
  type ScoreField,
} from '../common/types.js';
import { recordWarning, runCascade, type ExtractionContext, type ExtractionStrategy } from './cascade.js';
import { collapseWhitespace, firstLine, isMissingValue, normalizeRank, normalizeScore } from './normalize.js';

export interface RankingsExtractionOptions {
  /** Base for resolving relative detail links. */
  baseUrl?: string;
  /** Row count a table needs before the last-resort strategy accepts it. */
  minRows?: number;
  logger?: WinstonLogger;
}

export interface RankingsExtraction {
  entries: RankEntry[];
  warnings: ExtractionWarning[];
  /** Name of the strategy that located the table, or null when none did. */
  table: string | null;
}

const DEFAULT_MIN_ROWS = 5;

function tableStrategies(minRows: number): ExtractionStrategy<Cheerio<Element>>[] {
  const nonEmpty = (table: Cheerio<Element>) => (table.length > 0 ? table : null);
  return [
    { name: 'table-id', extract: ($) => nonEmpty($('table#datatable-1').first()) },
    {
      name: 'table-class',
      extract: ($) => nonEmpty($('table.rankings-table, table.data-table').first()),
    },
    {
      name: 'large-table',
      extract: ($) => {
        const table = $('table')
          .toArray()
          .find((el) => $(el).find('tr').length > minRows);
        return table ? $(table) : null;
      },
    },
  ];
}

function extractName(cell: Cheerio<Element>): string {
  const candidates = [
    () => cell.find('a.ranking-institution-title').first().text(),
    () => cell.find('a').first().text(),
    () => firstLine(cell.text()),
  ];
  for (const candidate of candidates) {
    const value = collapseWhitespace(candidate());
    if (value) {
      return value;
    }
  }
  return '';
}

function extractCountry(cell: Cheerio<Element>): string {
  const link = collapseWhitespace(cell.find('div.location a').first().text());
  if (link) {
    return link;
  }
  return collapseWhitespace(cell.find('.location').first().text());
}

function extractDetailUrl(cell: Cheerio<Element>, baseUrl: string): string | null {
  const href =
    cell.find('a.ranking-institution-title').first().attr('href') ??
    cell.find('a[href]').first().attr('href');
  if (!href) {
    return null;
  }
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function parseRow(
  $: CheerioAPI,
  row: Element,
  target: string,
  baseUrl: string,
  context: ExtractionContext
): RankEntry | null {
  const cells = $(row).children('td');
  if (cells.length === 0) {
    return null;
  }
  if (cells.length < 2) {
    recordWarning(context, { scope: 'row', target, message: 'Row has fewer than 2 cells' });
    return null;
  }

  const institution = cells.eq(1);
  const name = extractName(institution);
  if (!name) {
    recordWarning(context, { scope: 'row', target, message: 'Row has no institution name' });
    return null;
  }

  const rankText = cells.eq(0).text();
  const rank = normalizeRank(rankText);
  if (rank === null && !isMissingValue(rankText)) {
    recordWarning(context, {
      scope: 'row',
      target,
      message: `Unparsable rank "${collapseWhitespace(rankText)}"`,
    });
    return null;
  }

  const score = (field: ScoreField): number | null => {
    const cell = cells.eq(SCORE_FIELDS.indexOf(field) + 2);
    if (cell.length === 0) {
      return null;
    }
    return normalizeScore(cell.text(), (message) =>
      recordWarning(context, { scope: 'field', target: `${target}.${field}`, message })
    );
  };

  return {
    rank,
    name,
    country: extractCountry(institution),
    detailUrl: extractDetailUrl(institution, baseUrl),
    overall: score('overall'),
    teaching: score('teaching'),
    research: score('research'),
    citations: score('citations'),
    industryIncome: score('industryIncome'),
    internationalOutlook: score('internationalOutlook'),
  };
}

/**
 * Extracts every rankings row from the listing markup. Never throws: when no
 * table is found the result is empty and carries one section warning.
 */
export function extractRankEntries(
  html: string,
  options: RankingsExtractionOptions = {}
): RankingsExtraction {
  const { baseUrl = SITE_ORIGIN, minRows = DEFAULT_MIN_ROWS, logger } = options;
  const context: ExtractionContext = { warnings: [], logger };
  const $ = cheerio.load(html);

  const located = runCascade($, 'rankings-table', tableStrategies(minRows), context);
  if (!located) {
    recordWarning(context, {
      scope: 'section',
      target: 'rankings-table',
      message: 'No rankings table found',
    });
    return { entries: [], warnings: context.warnings, table: null };
  }
  if (located.strategy !== 'table-id') {
    logger?.info(`Rankings table located by fallback strategy ${located.strategy}`);
  }

  const entries: RankEntry[] = [];
  located.value
    .find('tr')
    .toArray()
    .forEach((row, index) => {
      const entry = parseRow($, row, `row ${index + 1}`, baseUrl, context);
      if (entry) {
        entries.push(entry);
      }
    });

  logger?.info(`Extracted ${entries.length} ranking entries`, {
    warnings: context.warnings.length,
  });
  return { entries, warnings: context.warnings, table: located.strategy };
}

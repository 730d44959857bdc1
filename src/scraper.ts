/**
 * @fileoverview Stage runners behind the CLI commands. Each stage owns one
 * browser session for its whole duration, writes its result as JSON in the
 * output directory and logs an end-of-run summary.
 *
 * - `scrapeRankings`: fetch the listing, extract rank entries.
 * - `scrapeDetails`: validate detail URLs, batch-process them with checkpoints.
 * - `combineFiles`: join earlier outputs.
 * - `runFullPipeline`: rankings, then the ranked detail URLs, then the join.
 */
import path from 'path';
import type { Logger as WinstonLogger } from 'winston';
import {
  DETAIL_READY_SELECTOR,
  RANKINGS_READY_SELECTOR,
  buildRankingsUrl,
  type ScraperConfig,
} from './config/app-config.js';
import type {
  BatchResult,
  CompositeRecord,
  DetailRecord,
  ExtractionWarning,
  RankEntry,
} from './common/types.js';
import { extractRankEntries } from './extractors/rankings-table.js';
import { BatchOrchestrator, createDetailProcessor } from './utils/batch-orchestrator.js';
import { withBrowserSession, type BrowserLauncher } from './utils/browser-session.js';
import { CheckpointStore } from './utils/checkpoint-store.js';
import { combineDatasets } from './utils/dataset-combiner.js';
import { fileTimestamp, writeTextFile } from './utils/file-system-utils.js';
import { PageFetcher } from './utils/page-fetcher.js';
import type { Sleep } from './utils/page-interactions.js';
import { PuppeteerLauncher } from './utils/puppeteer-driver.js';
import {
  logRankingSummary,
  processAndLogDetailRecords,
  writeResultsFile,
  type DetailSummary,
} from './utils/results-handler.js';
import { loadDetailRecordsFile, loadRankEntriesFile } from './utils/url-loader.js';
import { validateDetailUrls } from './utils/url-validator.js';

/**
 * Everything a stage needs from its caller.
 */
export interface HarvestContext {
  config: ScraperConfig;
  logger: WinstonLogger;
  outputDir: string;
  /** Defaults to a puppeteer-core launcher built from `config`. */
  launcher?: BrowserLauncher;
  sleep?: Sleep;
  random?: () => number;
  /** Source of output-file timestamps. */
  clock?: () => Date;
}

export interface RankingsOptions {
  /** Full listing URL; built from `year` and `view` when absent. */
  url?: string;
  year?: string;
  view?: string;
  /** Keep only the first `limit` entries. */
  limit?: number;
  /** Also write the raw listing markup. */
  saveHtml?: boolean;
}

export interface RankingsRun {
  entries: RankEntry[];
  warnings: ExtractionWarning[];
  outputFile: string;
  htmlFile?: string;
}

export interface DetailsOptions {
  /** Skip URLs with a successful record in earlier checkpoints. */
  skipProcessed?: boolean;
  /** Defaults to `<outputDir>/checkpoints`. */
  checkpointDir?: string;
  /** Process only the first `limit` URLs that survive validation. */
  limit?: number;
}

export interface DetailsRun {
  records: DetailRecord[];
  batches: BatchResult[];
  summary: DetailSummary;
  /** URLs skipped because earlier checkpoints already hold them. */
  skipped: number;
  outputFile: string;
}

export interface CombineRun {
  records: CompositeRecord[];
  outputFile: string;
}

export interface PipelineRun {
  rankings: RankingsRun;
  details: DetailsRun;
  combined: CombineRun;
}

function now(context: HarvestContext): Date {
  return context.clock ? context.clock() : new Date();
}

function applyLimit<T>(items: T[], limit: number | undefined): T[] {
  return limit !== undefined && limit >= 0 ? items.slice(0, limit) : items;
}

async function withFetcher<T>(
  context: HarvestContext,
  fn: (fetcher: PageFetcher) => Promise<T>
): Promise<T> {
  const { config, logger } = context;
  const launcher = context.launcher ?? new PuppeteerLauncher(config, logger);
  return withBrowserSession(launcher, logger, (session) =>
    fn(
      new PageFetcher(session, {
        config,
        logger,
        sleep: context.sleep,
        random: context.random,
      })
    )
  );
}

/**
 * @throws {RetrievalError} When the listing cannot be retrieved.
 */
export async function scrapeRankings(
  context: HarvestContext,
  options: RankingsOptions = {}
): Promise<RankingsRun> {
  const { logger, outputDir } = context;
  const url = options.url ?? buildRankingsUrl(options.year, options.view);
  const startedAt = now(context);
  logger.info(`Scraping rankings from ${url}`);

  const html = await withFetcher(context, (fetcher) =>
    fetcher.fetch(url, { waitForSelector: RANKINGS_READY_SELECTOR, scroll: true })
  );

  let htmlFile: string | undefined;
  if (options.saveHtml) {
    htmlFile = path.join(outputDir, `rankings-${fileTimestamp(startedAt)}.html`);
    await writeTextFile(htmlFile, html, logger);
    logger.info(`Rankings markup saved to ${htmlFile}`);
  }

  const extraction = extractRankEntries(html, { logger });
  const entries = applyLimit(extraction.entries, options.limit);
  logRankingSummary(entries, logger);

  const outputFile = await writeResultsFile('rankings', entries, outputDir, logger, startedAt);
  return {
    entries,
    warnings: extraction.warnings,
    outputFile,
    ...(htmlFile ? { htmlFile } : {}),
  };
}

export async function scrapeDetails(
  context: HarvestContext,
  urls: readonly string[],
  options: DetailsOptions = {}
): Promise<DetailsRun> {
  const { config, logger, outputDir } = context;
  const startedAt = now(context);
  const checkpoints = new CheckpointStore(
    options.checkpointDir ?? path.join(outputDir, 'checkpoints'),
    logger,
    fileTimestamp(startedAt)
  );

  let pending = validateDetailUrls(urls, logger);
  logger.info(`${pending.length} of ${urls.length} detail URLs passed validation`);

  let skipped = 0;
  if (options.skipProcessed) {
    const completed = await checkpoints.loadCompletedUrls();
    const remaining = pending.filter((url) => !completed.has(url));
    skipped = pending.length - remaining.length;
    pending = remaining;
    logger.info(`Skipping ${skipped} previously processed URLs`);
  }
  pending = applyLimit(pending, options.limit);

  const batches = await withFetcher(context, (fetcher) => {
    const orchestrator = new BatchOrchestrator(
      createDetailProcessor(fetcher, logger, { waitForSelector: DETAIL_READY_SELECTOR }),
      {
        logger,
        checkpoint: checkpoints,
        onBatchComplete: (batch, total) =>
          logger.info(`Progress: batch ${batch.batchId}/${total} done`),
      }
    );
    return orchestrator.processBatches(pending, config.batchSize);
  });

  const records = batches.flatMap((batch) => batch.records);
  const summary = processAndLogDetailRecords(records, logger, config.minSuccessRate);
  const outputFile = await writeResultsFile('details', records, outputDir, logger, startedAt);
  return { records, batches, summary, skipped, outputFile };
}

/**
 * Joins a rankings output file with a details output file.
 *
 * @throws {AppError} When either file cannot be read or holds no list.
 */
export async function combineFiles(
  context: HarvestContext,
  rankingsFile: string,
  detailsFile: string
): Promise<CombineRun> {
  const { logger, outputDir } = context;
  const entries = await loadRankEntriesFile(rankingsFile, logger);
  const details = await loadDetailRecordsFile(detailsFile, logger);
  const records = combineDatasets(entries, details, logger);
  const outputFile = await writeResultsFile('combined', records, outputDir, logger, now(context));
  return { records, outputFile };
}

export async function runFullPipeline(
  context: HarvestContext,
  options: RankingsOptions & Pick<DetailsOptions, 'skipProcessed' | 'checkpointDir'> = {}
): Promise<PipelineRun> {
  const { logger, outputDir } = context;
  const rankings = await scrapeRankings(context, options);

  const detailUrls = rankings.entries
    .map((entry) => entry.detailUrl)
    .filter((url): url is string => url !== null);
  logger.info(`${detailUrls.length} of ${rankings.entries.length} ranked institutions link to a detail page`);

  const details = await scrapeDetails(context, detailUrls, {
    skipProcessed: options.skipProcessed,
    checkpointDir: options.checkpointDir,
  });

  const records = combineDatasets(rankings.entries, details.records, logger);
  const outputFile = await writeResultsFile('combined', records, outputDir, logger, now(context));
  return { rankings, details, combined: { records, outputFile } };
}

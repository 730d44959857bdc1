/**
 * @module batch-orchestrator
 * @description Runs detail URLs in ordered, non-overlapping batches.
 *
 * URLs inside a batch are processed sequentially. A {@link RetrievalError}
 * for one URL becomes an error record; any other exception aborts the rest
 * of that batch only, which is marked failed with the records it had
 * collected. Every batch is checkpointed before the next one starts.
 */
import type { Logger as WinstonLogger } from 'winston';
import { BatchError, ConfigurationError, describeError, RetrievalError } from '../common/AppError.js';
import type { BatchResult, DetailRecord } from '../common/types.js';
import { extractDetailRecord } from '../extractors/detail-page.js';
import type { CheckpointWriter } from './checkpoint-store.js';
import type { FetchOptions, PageSource } from './page-fetcher.js';
import { traceBatch } from './telemetry.js';

/** Turns one detail URL into a record. */
export type DetailProcessor = (url: string) => Promise<DetailRecord>;

export interface BatchOrchestratorOptions {
  logger: WinstonLogger;
  checkpoint?: CheckpointWriter;
  onBatchComplete?: (batch: BatchResult, totalBatches: number) => void;
}

/**
 * Splits `items` into consecutive chunks of at most `size`.
 *
 * @throws {ConfigurationError} If `size` is not a positive integer.
 */
export function partitionIntoBatches<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigurationError(`batchSize must be a positive integer (got ${size})`, 'batchSize');
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Fetches and extracts a detail page. Retrieval failures become error
 * records; anything else propagates to the orchestrator.
 */
export function createDetailProcessor(
  source: PageSource,
  logger: WinstonLogger,
  fetchOptions: FetchOptions = {}
): DetailProcessor {
  return async (url) => {
    let html: string;
    try {
      html = await source.fetch(url, fetchOptions);
    } catch (error: unknown) {
      if (error instanceof RetrievalError) {
        return { status: 'error', url, error: error.message };
      }
      throw error;
    }
    return extractDetailRecord(html, url, logger).record;
  };
}

export class BatchOrchestrator {
  private readonly logger: WinstonLogger;
  private readonly checkpoint?: CheckpointWriter;
  private readonly onBatchComplete?: (batch: BatchResult, totalBatches: number) => void;

  constructor(
    private readonly processUrl: DetailProcessor,
    options: BatchOrchestratorOptions
  ) {
    this.logger = options.logger;
    this.checkpoint = options.checkpoint;
    this.onBatchComplete = options.onBatchComplete;
  }

  /**
   * All records in batch order, including those of failed batches.
   */
  async runBatches(urls: readonly string[], batchSize: number): Promise<DetailRecord[]> {
    const batches = await this.processBatches(urls, batchSize);
    return batches.flatMap((batch) => batch.records);
  }

  async processBatches(urls: readonly string[], batchSize: number): Promise<BatchResult[]> {
    const batches = partitionIntoBatches(urls, batchSize);
    this.logger.info(
      `Processing ${urls.length} URLs in ${batches.length} batch(es) of up to ${batchSize}`
    );

    const results: BatchResult[] = [];
    for (const [index, batchUrls] of batches.entries()) {
      const result = await this.runBatch(index + 1, batchUrls, batches.length);
      results.push(result);
      await this.saveCheckpoint(result);
      this.onBatchComplete?.(result, batches.length);
    }

    const failed = results.filter((batch) => batch.status === 'failed').length;
    if (failed > 0) {
      this.logger.warn(`${failed} of ${results.length} batch(es) failed; their partial results were kept`);
    }
    return results;
  }

  private async runBatch(
    batchId: number,
    urls: readonly string[],
    totalBatches: number
  ): Promise<BatchResult> {
    this.logger.info(`Starting batch ${batchId}/${totalBatches} (${urls.length} URLs)`);

    return traceBatch(batchId, urls.length, this.logger, async (tracer) => {
      const records: DetailRecord[] = [];
      let error: BatchError | undefined;
      try {
        for (const url of urls) {
          records.push(await this.processUrl(url));
        }
      } catch (cause: unknown) {
        error = new BatchError(batchId, cause);
        tracer.recordError(error);
        this.logger.error(error.message, { batchId, processed: records.length });
      }

      const successCount = records.filter((record) => record.status === 'success').length;
      const failureCount = records.length - successCount;
      tracer.recordCounts(successCount, failureCount);

      const result: BatchResult = {
        batchId,
        status: error ? 'failed' : 'completed',
        records,
        successCount,
        failureCount,
        ...(error ? { error: error.message } : {}),
      };
      this.logger.info(
        `Batch ${batchId}/${totalBatches} ${result.status}: ${successCount} succeeded, ${failureCount} failed`
      );
      return { result, success: !error };
    });
  }

  private async saveCheckpoint(batch: BatchResult): Promise<void> {
    if (!this.checkpoint) {
      return;
    }
    try {
      await this.checkpoint.save(batch);
    } catch (error: unknown) {
      this.logger.error(`Failed to save checkpoint for batch ${batch.batchId}: ${describeError(error)}`);
    }
  }
}

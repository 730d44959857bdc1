import { describe, it, expect, vi } from 'vitest';
import {
  BatchOrchestrator,
  createDetailProcessor,
  partitionIntoBatches,
  type DetailProcessor,
} from '../batch-orchestrator.js';
import type { CheckpointWriter } from '../checkpoint-store.js';
import type { PageSource } from '../page-fetcher.js';
import { PageFetcher } from '../page-fetcher.js';
import { BrowserSession } from '../browser-session.js';
import { resolveScraperConfig } from '../../config/app-config.js';
import { ConfigurationError, RetrievalError } from '../../common/AppError.js';
import type { BatchResult, DetailRecord } from '../../common/types.js';
import { FakeLauncher, routeFromMap } from '../../__tests__/helpers/fake-browser.js';
import { createTestLogger } from '../../__tests__/helpers/test-logger.js';

const urls = ['u1', 'u2', 'u3', 'u4', 'u5', 'u6'];

function okRecord(url: string): DetailRecord {
  return {
    status: 'success',
    url,
    name: `Name ${url}`,
    rankingData: {},
    keyStats: {},
    subjects: [],
    additionalInfo: {},
  };
}

function recordingCheckpoint() {
  const saved: BatchResult[] = [];
  const writer: CheckpointWriter = {
    save: async (batch) => {
      saved.push(batch);
    },
  };
  return { saved, writer };
}

describe('partitionIntoBatches', () => {
  it('splits into ordered, non-overlapping chunks', () => {
    expect(partitionIntoBatches([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([[1, 2, 3], [4, 5, 6], [7]]);
    expect(partitionIntoBatches([], 3)).toEqual([]);
  });

  it('rejects a non-positive batch size', () => {
    expect(() => partitionIntoBatches([1], 0)).toThrow(ConfigurationError);
  });
});

describe('BatchOrchestrator', () => {
  it('keeps the records of batches 1 and 3 when batch 2 raises', async () => {
    const processor: DetailProcessor = async (url) => {
      if (url === 'u4') {
        throw new Error('driver crashed');
      }
      return okRecord(url);
    };
    const { saved, writer } = recordingCheckpoint();
    const { logger, messagesAt } = createTestLogger();
    const orchestrator = new BatchOrchestrator(processor, { logger, checkpoint: writer });

    const records = await orchestrator.runBatches(urls, 2);

    expect(records.map((record) => record.url)).toEqual(['u1', 'u2', 'u3', 'u5', 'u6']);
    expect(saved.map((batch) => [batch.batchId, batch.status])).toEqual([
      [1, 'completed'],
      [2, 'failed'],
      [3, 'completed'],
    ]);
    expect(saved[1]).toMatchObject({
      error: 'Batch 2 failed: driver crashed',
      successCount: 1,
      failureCount: 0,
    });
    expect(messagesAt('error')).toEqual(['Batch 2 failed: driver crashed']);
  });

  it('reports progress after each checkpoint', async () => {
    const onBatchComplete = vi.fn();
    const orchestrator = new BatchOrchestrator(async (url) => okRecord(url), {
      logger: createTestLogger().logger,
      onBatchComplete,
    });

    const batches = await orchestrator.processBatches(urls, 4);

    expect(batches.map((batch) => batch.records.length)).toEqual([4, 2]);
    expect(onBatchComplete).toHaveBeenCalledTimes(2);
    expect(onBatchComplete).toHaveBeenLastCalledWith(batches[1], 2);
  });

  it('logs a failed checkpoint write and continues', async () => {
    const { logger, messagesAt } = createTestLogger();
    const writer: CheckpointWriter = {
      save: async () => {
        throw new Error('disk full');
      },
    };
    const orchestrator = new BatchOrchestrator(async (url) => okRecord(url), { logger, checkpoint: writer });

    const records = await orchestrator.runBatches(['u1', 'u2'], 1);

    expect(records).toHaveLength(2);
    expect(messagesAt('error')).toEqual([
      'Failed to save checkpoint for batch 1: disk full',
      'Failed to save checkpoint for batch 2: disk full',
    ]);
  });
});

describe('createDetailProcessor', () => {
  const DETAIL = '<html><body><h1 class="university-name">Processor University</h1></body></html>';

  it('extracts a record from fetched markup', async () => {
    const source: PageSource = { fetch: async () => DETAIL };
    const record = await createDetailProcessor(source, createTestLogger().logger)('u1');
    expect(record).toMatchObject({ status: 'success', url: 'u1', name: 'Processor University' });
  });

  it('turns a retrieval failure into an error record', async () => {
    const source: PageSource = {
      fetch: async (url) => {
        throw new RetrievalError(url, 3, new Error('net::ERR_CONNECTION_RESET'));
      },
    };
    const record = await createDetailProcessor(source, createTestLogger().logger)('u1');
    expect(record).toEqual({
      status: 'error',
      url: 'u1',
      error: 'Failed to retrieve URL: u1 after 3 attempts (net::ERR_CONNECTION_RESET)',
    });
  });

  it('lets unexpected errors reach the orchestrator', async () => {
    const source: PageSource = {
      fetch: async () => {
        throw new TypeError('undefined is not a function');
      },
    };
    await expect(createDetailProcessor(source, createTestLogger().logger)('u1')).rejects.toThrow(TypeError);
  });

  it('records an unreachable URL as an error and carries on', async () => {
    const good = 'https://www.timeshighereducation.com/world-university-rankings/good-university';
    const bad = 'https://www.timeshighereducation.com/world-university-rankings/bad-university';
    const launcher = new FakeLauncher(routeFromMap({ [good]: DETAIL }));
    const { logger } = createTestLogger();
    const fetcher = new PageFetcher(new BrowserSession(launcher, logger), {
      config: resolveScraperConfig({ maxRetries: 2, requestDelayMinMs: 0, requestDelayMaxMs: 0 }),
      logger,
      sleep: async () => undefined,
    });
    const orchestrator = new BatchOrchestrator(createDetailProcessor(fetcher, logger), { logger });

    const records = await orchestrator.runBatches([bad, good], 5);

    expect(records.map((record) => record.status)).toEqual(['error', 'success']);
    expect(launcher.visits).toEqual([bad, bad, good]);
  });
});

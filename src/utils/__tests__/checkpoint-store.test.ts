import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync, mkdirSync } from 'fs';
import os from 'os';
import path from 'path';
import { CheckpointStore, checkpointFileName } from '../checkpoint-store.js';
import type { BatchResult } from '../../common/types.js';
import { createTestLogger } from '../../__tests__/helpers/test-logger.js';

const BATCH: BatchResult = {
  batchId: 2,
  status: 'completed',
  records: [
    {
      status: 'success',
      url: 'https://www.timeshighereducation.com/world-university-rankings/a-university',
      name: 'A University',
      rankingData: {},
      keyStats: {},
      subjects: [],
      additionalInfo: {},
    },
    {
      status: 'error',
      url: 'https://www.timeshighereducation.com/world-university-rankings/b-university',
      error: 'Failed to retrieve URL',
    },
  ],
  successCount: 1,
  failureCount: 1,
};

describe('CheckpointStore', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), 'checkpoints-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('pads batch numbers in file names', () => {
    expect(checkpointFileName(7)).toBe('batch-007.json');
    expect(checkpointFileName(1234)).toBe('batch-1234.json');
  });

  it('writes one file per batch under the run directory', async () => {
    const store = new CheckpointStore(root, createTestLogger().logger, 'run-1');

    await store.save(BATCH);

    const saved = JSON.parse(readFileSync(path.join(root, 'run-1', 'batch-002.json'), 'utf8'));
    expect(saved).toMatchObject({ batchId: 2, status: 'completed', successCount: 1, failureCount: 1 });
    expect(saved.records).toEqual(BATCH.records);
    expect(typeof saved.savedAt).toBe('string');
  });

  it('collects successful URLs across runs', async () => {
    const logger = createTestLogger().logger;
    await new CheckpointStore(root, logger, 'run-1').save(BATCH);
    await new CheckpointStore(root, logger, 'run-2').save({
      ...BATCH,
      batchId: 1,
      records: [{ ...BATCH.records[0], url: 'https://www.timeshighereducation.com/world-university-rankings/c-university' }],
    });

    const completed = await new CheckpointStore(root, logger, 'run-3').loadCompletedUrls();

    expect([...completed].sort()).toEqual([
      'https://www.timeshighereducation.com/world-university-rankings/a-university',
      'https://www.timeshighereducation.com/world-university-rankings/c-university',
    ]);
  });

  it('skips unreadable files and ignores unrelated ones', async () => {
    const { logger, messagesAt } = createTestLogger();
    mkdirSync(path.join(root, 'run-1'));
    writeFileSync(path.join(root, 'run-1', 'batch-001.json'), '{not json');
    writeFileSync(path.join(root, 'run-1', 'notes.txt'), 'hello');

    const completed = await new CheckpointStore(root, logger).loadCompletedUrls();

    expect(completed.size).toBe(0);
    expect(messagesAt('warn')).toHaveLength(1);
    expect(messagesAt('warn')[0]).toMatch(/^Skipping unreadable checkpoint .*batch-001\.json/);
  });

  it('returns an empty set when the root does not exist', async () => {
    const store = new CheckpointStore(path.join(root, 'missing'), createTestLogger().logger);
    await expect(store.loadCompletedUrls()).resolves.toEqual(new Set());
  });
});

/**
 * @module checkpoint-store
 * @description Persists each finished batch as `<root>/<runId>/batch-NNN.json`.
 * Runs never overwrite each other's checkpoints, so URLs completed by any
 * earlier run can be collected with {@link CheckpointStore.loadCompletedUrls}.
 */
import { promises as fsPromises } from 'fs';
import path from 'path';
import type { Logger as WinstonLogger } from 'winston';
import { isDetailRecord, isObject } from '../common/guards.js';
import type { BatchResult, DetailRecord } from '../common/types.js';
import { describeError } from '../common/AppError.js';
import { fileTimestamp, readJsonFile, writeJsonFile } from './file-system-utils.js';

const CHECKPOINT_FILE = /^batch-\d+\.json$/;

export interface CheckpointWriter {
  save(batch: BatchResult): Promise<void>;
}

export interface CheckpointFile extends BatchResult {
  savedAt: string;
}

export function checkpointFileName(batchId: number): string {
  return `batch-${String(batchId).padStart(3, '0')}.json`;
}

function recordsOf(data: unknown): DetailRecord[] {
  if (!isObject(data) || !Array.isArray(data.records)) {
    return [];
  }
  return data.records.filter(isDetailRecord);
}

export class CheckpointStore implements CheckpointWriter {
  readonly runDir: string;

  constructor(
    private readonly rootDir: string,
    private readonly logger: WinstonLogger,
    runId: string = fileTimestamp()
  ) {
    this.runDir = path.join(rootDir, runId);
  }

  async save(batch: BatchResult): Promise<void> {
    const filePath = path.join(this.runDir, checkpointFileName(batch.batchId));
    const file: CheckpointFile = { ...batch, savedAt: new Date().toISOString() };
    await writeJsonFile(filePath, file, this.logger);
    this.logger.info(`Checkpoint saved: ${filePath}`);
  }

  /**
   * URLs with a successful record in any run's checkpoints. A missing root
   * gives an empty set; unreadable files are skipped with a warning.
   */
  async loadCompletedUrls(): Promise<Set<string>> {
    const completed = new Set<string>();
    for (const filePath of await this.listCheckpointFiles()) {
      try {
        for (const record of recordsOf(await readJsonFile(filePath))) {
          if (record.status === 'success') {
            completed.add(record.url);
          }
        }
      } catch (error: unknown) {
        this.logger.warn(`Skipping unreadable checkpoint ${filePath}: ${describeError(error)}`);
      }
    }
    this.logger.info(`Found ${completed.size} completed URLs in checkpoints under ${this.rootDir}`);
    return completed;
  }

  private async listCheckpointFiles(): Promise<string[]> {
    let runs: string[];
    try {
      const entries = await fsPromises.readdir(this.rootDir, { withFileTypes: true });
      runs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
    } catch (error: unknown) {
      this.logger.debug(`No checkpoints under ${this.rootDir}: ${describeError(error)}`);
      return [];
    }

    const files: string[] = [];
    for (const run of runs) {
      const runDir = path.join(this.rootDir, run);
      const names = await fsPromises.readdir(runDir);
      files.push(
        ...names
          .filter((name) => CHECKPOINT_FILE.test(name))
          .sort()
          .map((name) => path.join(runDir, name))
      );
    }
    return files;
  }
}

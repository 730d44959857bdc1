import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  ensureDirectoryExists,
  fileTimestamp,
  readDirectory,
  readJsonFile,
  readTextFile,
  writeJsonFile,
} from '../file-system-utils.js';
import { AppError } from '../../common/AppError.js';

async function errorCodeOf(promise: Promise<unknown>): Promise<string | undefined> {
  const outcome = await promise.then(
    () => undefined,
    (error: unknown) => error
  );
  return outcome instanceof AppError ? outcome.errorCode : undefined;
}

describe('file-system-utils', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'fs-utils-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes pretty-printed JSON, creating parent directories', async () => {
    const filePath = path.join(dir, 'a', 'b', 'out.json');
    await writeJsonFile(filePath, { rank: 1 });
    expect(readFileSync(filePath, 'utf8')).toBe('{\n  "rank": 1\n}');
    await expect(readJsonFile(filePath)).resolves.toEqual({ rank: 1 });
  });

  it('reports invalid JSON', async () => {
    const filePath = path.join(dir, 'bad.json');
    writeFileSync(filePath, '{"rank":');
    expect(await errorCodeOf(readJsonFile(filePath))).toBe('JSON_PARSE_FAILED');
  });

  it('reports missing files and directories', async () => {
    expect(await errorCodeOf(readTextFile(path.join(dir, 'missing.txt')))).toBe('FS_READFILE_FAILED');
    expect(await errorCodeOf(readDirectory(path.join(dir, 'missing')))).toBe('FS_READDIR_FAILED');
  });

  it('reports a directory that cannot be created', async () => {
    const blocker = path.join(dir, 'file');
    writeFileSync(blocker, 'x');
    expect(await errorCodeOf(ensureDirectoryExists(path.join(blocker, 'child')))).toBe('FS_MKDIR_FAILED');
  });

  it('lists directory entries', async () => {
    writeFileSync(path.join(dir, 'one.txt'), '1');
    await expect(readDirectory(dir)).resolves.toEqual(['one.txt']);
  });
});

describe('fileTimestamp', () => {
  it('pads every component', () => {
    expect(fileTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('20250102-030405');
  });
});

import { promises as fsPromises } from 'fs';
import path from 'path';
import type { Logger as WinstonLogger } from 'winston';
import { AppError, describeError, type AppErrorDetails } from '../common/AppError.js';

/**
 * Ensures that a directory exists, creating parents as needed.
 *
 * @throws {AppError} `FS_MKDIR_FAILED` if the directory cannot be created.
 */
export async function ensureDirectoryExists(
  dirPath: string,
  logger?: WinstonLogger
): Promise<void> {
  try {
    await fsPromises.mkdir(dirPath, { recursive: true });
  } catch (error: unknown) {
    logger?.error(`Error ensuring directory ${dirPath} exists:`, {
      errorMessage: describeError(error),
    });
    const details: AppErrorDetails = {
      errorCode: 'FS_MKDIR_FAILED',
      originalError: error,
      dirPath,
    };
    throw new AppError(`Failed to ensure directory exists: ${dirPath}`, details);
  }
}

/**
 * Lists the entry names of a directory.
 *
 * @throws {AppError} `FS_READDIR_FAILED` if the directory cannot be read.
 */
export async function readDirectory(
  dirPath: string,
  logger?: WinstonLogger
): Promise<string[]> {
  try {
    return await fsPromises.readdir(dirPath);
  } catch (error: unknown) {
    logger?.error(`Error reading directory ${dirPath}:`, {
      errorMessage: describeError(error),
    });
    throw new AppError(`Failed to read directory: ${dirPath}`, {
      errorCode: 'FS_READDIR_FAILED',
      originalError: error,
      dirPath,
    });
  }
}

/**
 * Reads a text file.
 *
 * @throws {AppError} `FS_READFILE_FAILED` if the file cannot be read.
 */
export async function readTextFile(
  filePath: string,
  logger?: WinstonLogger
): Promise<string> {
  try {
    return await fsPromises.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    logger?.error(`Error reading file ${filePath}:`, {
      errorMessage: describeError(error),
    });
    throw new AppError(`Failed to read file: ${filePath}`, {
      errorCode: 'FS_READFILE_FAILED',
      originalError: error,
      filePath,
    });
  }
}

/**
 * Reads and parses a JSON file. The result is `unknown`; callers narrow it.
 *
 * @throws {AppError} `FS_READFILE_FAILED` or `JSON_PARSE_FAILED`.
 */
export async function readJsonFile(
  filePath: string,
  logger?: WinstonLogger
): Promise<unknown> {
  const content = await readTextFile(filePath, logger);
  try {
    return JSON.parse(content);
  } catch (error: unknown) {
    const message = `Error processing JSON file ${filePath}: Invalid JSON syntax.`;
    logger?.error(message, { errorMessage: describeError(error), filePath });
    throw new AppError(message, {
      errorCode: 'JSON_PARSE_FAILED',
      originalError: error,
      filePath,
    });
  }
}

/**
 * Writes text to a file, creating its directory first.
 *
 * @throws {AppError} `FS_WRITEFILE_FAILED` if writing fails.
 */
export async function writeTextFile(
  filePath: string,
  content: string,
  logger?: WinstonLogger
): Promise<void> {
  await ensureDirectoryExists(path.dirname(filePath), logger);
  try {
    await fsPromises.writeFile(filePath, content, 'utf8');
  } catch (error: unknown) {
    logger?.error(`Error writing file ${filePath}:`, {
      errorMessage: describeError(error),
    });
    throw new AppError(`Failed to write file: ${filePath}`, {
      errorCode: 'FS_WRITEFILE_FAILED',
      originalError: error,
      filePath,
    });
  }
}

/**
 * Writes data as pretty-printed (2-space) JSON.
 *
 * @throws {AppError} `FS_MKDIR_FAILED` or `FS_WRITEFILE_FAILED`.
 */
export async function writeJsonFile(
  filePath: string,
  data: unknown,
  logger?: WinstonLogger
): Promise<void> {
  await writeTextFile(filePath, JSON.stringify(data, null, 2), logger);
}

/**
 * File-name-safe timestamp, e.g. `20250301-142501`.
 */
export function fileTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

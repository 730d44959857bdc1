import { Command, Flags } from '@oclif/core';
import type { Logger as WinstonLogger } from 'winston';
import { AppError, ConfigurationError, describeError } from '../common/AppError.js';
import { resolveScraperConfig, type ScraperConfig } from '../config/app-config.js';
import type { HarvestContext } from '../scraper.js';
import { initTracer, shutdownTracer } from '../tracer.js';
import loggerModule, { initializeLogger } from '../utils/logger.js';

export const outputFlags = {
  outputDir: Flags.string({
    description: 'Directory to save output files',
    default: 'output',
  }),
  logDir: Flags.string({
    description: 'Directory to save log files',
    default: 'logs',
  }),
  verbose: Flags.boolean({
    description: 'Enable verbose output, including full error messages and stack traces.',
    default: false,
  }),
  traceConsole: Flags.boolean({
    description: 'Print finished OpenTelemetry spans to stdout.',
    default: false,
  }),
};

export const browserFlags = {
  headless: Flags.boolean({
    description: 'Run Chrome in headless mode',
    default: true,
    allowNo: true,
  }),
  executablePath: Flags.string({
    description: 'Chrome/Chromium binary to drive (defaults to the installed Chrome release channel)',
    env: 'PUPPETEER_EXECUTABLE_PATH',
  }),
  maxRetries: Flags.integer({
    description: 'Attempts per URL before it is recorded as failed',
    min: 1,
  }),
  pageLoadTimeout: Flags.integer({
    description: 'Navigation and content-wait timeout in milliseconds',
    min: 1,
  }),
  requestDelayMin: Flags.integer({
    description: 'Minimum pause after each page in milliseconds',
    min: 0,
  }),
  requestDelayMax: Flags.integer({
    description: 'Maximum pause after each page in milliseconds',
    min: 0,
  }),
  batchSize: Flags.integer({
    description: 'Detail URLs per checkpointed batch',
    min: 1,
  }),
  limit: Flags.integer({
    description: 'Process at most this many entries',
    min: 0,
  }),
};

export const rankingsFlags = {
  url: Flags.string({
    description: 'Full rankings listing URL (overrides --year and --view)',
  }),
  year: Flags.string({
    description: 'Ranking year',
  }),
  view: Flags.string({
    description: 'Ranking view',
  }),
  saveHtml: Flags.boolean({
    description: 'Also save the raw rankings markup',
    default: false,
  }),
};

export const resumeFlags = {
  skipProcessed: Flags.boolean({
    description: 'Skip URLs that already have a successful record in an earlier checkpoint.',
    default: false,
  }),
  checkpointDir: Flags.string({
    description: 'Directory holding per-run batch checkpoints (defaults to <outputDir>/checkpoints)',
  }),
};

/** Parsed values of {@link outputFlags}. */
export interface OutputFlagValues {
  outputDir: string;
  logDir: string;
  verbose: boolean;
  traceConsole: boolean;
}

/** Parsed values of {@link browserFlags}. */
export interface BrowserFlagValues {
  headless?: boolean;
  executablePath?: string;
  maxRetries?: number;
  pageLoadTimeout?: number;
  requestDelayMin?: number;
  requestDelayMax?: number;
  batchSize?: number;
}

/**
 * Maps CLI flags onto configuration overrides. Absent flags keep the defaults.
 */
export function toConfigOverrides(flags: BrowserFlagValues): Partial<ScraperConfig> {
  return {
    headless: flags.headless,
    executablePath: flags.executablePath,
    maxRetries: flags.maxRetries,
    pageLoadTimeoutMs: flags.pageLoadTimeout,
    requestDelayMinMs: flags.requestDelayMin,
    requestDelayMaxMs: flags.requestDelayMax,
    batchSize: flags.batchSize,
  };
}

/**
 * User-facing message for a failed stage.
 */
export function describeStageFailure(stage: string, error: unknown): string {
  if (error instanceof AppError && error.errorCode) {
    return `${stage} failed with code: ${error.errorCode}. Message: ${error.message}`;
  }
  return `${stage} failed: ${describeError(error)}`;
}

/**
 * Runs one stage with the logger and tracer set up and torn down around it.
 * Configuration errors and stage failures end the command with exit code 1.
 */
export async function executeStage(
  command: Command,
  stage: string,
  flags: OutputFlagValues & BrowserFlagValues,
  fn: (context: HarvestContext) => Promise<void>
): Promise<void> {
  initializeLogger(flags.logDir, flags.verbose);
  const logger: WinstonLogger = loggerModule.instance;

  let config: ScraperConfig;
  try {
    config = resolveScraperConfig(toConfigOverrides(flags));
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      command.error(error.message, { exit: 1 });
    }
    throw error;
  }

  initTracer(logger, { console: flags.traceConsole });
  let failure: { error: unknown } | undefined;
  try {
    logger.info(`Starting ${stage}`);
    await fn({ config, logger, outputDir: flags.outputDir });
    logger.info(`${stage} completed`);
  } catch (error: unknown) {
    logger.error(describeStageFailure(stage, error), {
      details: error instanceof AppError ? error.details : undefined,
      stack: error instanceof Error ? error.stack : undefined,
    });
    failure = { error };
  } finally {
    await shutdownTracer(logger);
  }
  if (failure) {
    command.error(describeStageFailure(stage, failure.error), { exit: 1 });
  }
}

/**
 * @module logger
 * @description Singleton Winston logger. Call `initializeLogger` once at startup;
 * library code receives the instance by injection. Logs go to the console and to
 * `app.log`/`error.log` in the log directory, with OpenTelemetry trace ids attached
 * when a span is active.
 */
import winston, { Logger, Logform, transports } from 'winston';
import TransportStream from 'winston-transport';
import fs from 'fs';
import path from 'path';
import { isSpanContextValid, trace, type SpanContext } from '@opentelemetry/api';

let logger: Logger | undefined;
export let isVerbose = false;

/**
 * Adds `trace_id` and `span_id` from the active OpenTelemetry span, if it is recording a valid trace.
 */
function activeSpanContext(): SpanContext | undefined {
  const spanContext = trace.getActiveSpan()?.spanContext();
  return spanContext && isSpanContextValid(spanContext) ? spanContext : undefined;
}

const openTelemetryFormat = winston.format((info) => {
  const spanContext = activeSpanContext();
  if (spanContext) {
    info.trace_id = spanContext.traceId;
    info.span_id = spanContext.spanId;
  }
  return info;
});

/**
 * Renders winston splat metadata (the `...rest` arguments) for the console.
 * Returns an empty string for trivial metadata.
 */
function formatSplatMetadata(splat: unknown): string {
  if (Array.isArray(splat)) {
    return splat
      .map((s: unknown) => (typeof s === 'object' ? JSON.stringify(s) : String(s)))
      .join(' ');
  }
  if (typeof splat === 'object' && splat !== null) {
    const metadataString = JSON.stringify(splat);
    return metadataString !== '{}' ? metadataString : '';
  }
  return splat === undefined ? '' : String(splat);
}

/**
 * Formats a log entry for console output.
 *
 * Outside verbose mode, error entries are shortened: the text after the first
 * `" at "` is dropped, stacks are omitted, and a `URL: <url>` fragment is lifted
 * into a `Processing failed for <url> : ` prefix.
 */
export function formatConsoleLogMessage(info: Logform.TransformableInfo): string {
  const message =
    typeof info.message === 'string' ? info.message : String(info.message);
  const stack = typeof info.stack === 'string' ? info.stack : undefined;

  if ((info.level.includes('error') || stack) && !isVerbose) {
    const atIndex = message.indexOf(' at ');
    const truncated = atIndex !== -1 ? message.substring(0, atIndex) : message;
    const urlMatch = message.match(/URL: (\S+)/i);
    const urlPart = urlMatch ? `Processing failed for ${urlMatch[1]} : ` : '';
    return `${info.timestamp} ${info.level}: ${urlPart}${truncated}`;
  }

  let line = `${info.timestamp} ${info.level}: ${message}`;
  if (isVerbose && stack) {
    line += `\n${stack}`;
  }

  const spanContext = activeSpanContext();
  if (spanContext) {
    line += ` (trace_id: ${spanContext.traceId}, span_id: ${spanContext.spanId})`;
  }

  const metadataString = formatSplatMetadata(info[Symbol.for('splat')]);
  if (metadataString) {
    line += ` ${metadataString}`;
  }
  return line;
}

/**
 * In-memory transport for tests; keeps every entry it receives.
 */
export class MockTransport extends TransportStream {
  public messages: Logform.TransformableInfo[] = [];

  constructor(opts?: TransportStream.TransportStreamOptions) {
    super(opts);
  }

  log(info: Logform.TransformableInfo, callback: () => void): void {
    setImmediate(() => {
      this.emit('logged', info);
    });
    this.messages.push(info);
    callback();
  }
}

/**
 * Initializes the logger singleton.
 *
 * @param logDir - Directory for `app.log` and `error.log`; created if missing.
 * @param verboseFlag - Keep full error messages and stacks on the console.
 * @param testTransports - Replace the default transports (no directory is created).
 */
export function initializeLogger(
  logDir: string,
  verboseFlag = false,
  testTransports: TransportStream[] | null = null
): Logger {
  isVerbose = verboseFlag;

  let effectiveTransports: TransportStream[];
  if (testTransports) {
    effectiveTransports = testTransports;
  } else {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    effectiveTransports = [
      new transports.Console({
        level: process.env.LOG_LEVEL_CONSOLE || (verboseFlag ? 'debug' : 'info'),
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(formatConsoleLogMessage)
        ),
      }),
      new transports.File({
        filename: path.join(logDir, 'app.log'),
        level: process.env.LOG_LEVEL_APP || 'info',
        format: winston.format.combine(openTelemetryFormat(), winston.format.json()),
      }),
      new transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        format: winston.format.combine(openTelemetryFormat(), winston.format.json()),
      }),
    ];
  }

  logger = winston.createLogger({
    levels: winston.config.npm.levels,
    level: 'debug',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.splat()
    ),
    transports: effectiveTransports,
    exitOnError: false,
  });

  if (!testTransports) {
    logger.info(
      `Logger initialized. Log directory: ${logDir}, Verbose: ${isVerbose}`
    );
  }
  return logger;
}

export function setTestIsVerbose(value: boolean): void {
  isVerbose = value;
}

export default {
  /**
   * The logger singleton.
   * @throws {Error} If `initializeLogger` has not been called.
   */
  get instance(): Logger {
    if (!logger) {
      throw new Error(
        'Logger has not been initialized. Call initializeLogger(logDir) first.'
      );
    }
    return logger;
  },
};

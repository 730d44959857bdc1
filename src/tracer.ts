/**
 * @file OpenTelemetry SDK setup for the CLI.
 *
 * @remarks
 * The OTLP exporter is enabled when `OTEL_EXPORTER_OTLP_ENDPOINT` is set; its
 * headers and protocol follow the standard `OTEL_EXPORTER_OTLP_*` variables.
 * `OTEL_SERVICE_NAME` names the service. Without an exporter no SDK is
 * started and the batch spans in `utils/telemetry.ts` stay no-ops.
 */
import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  type SpanProcessor,
} from '@opentelemetry/sdk-trace-node';
import type { Logger as WinstonLogger } from 'winston';
import { describeError } from './common/AppError.js';

export interface TracerOptions {
  /** Print finished spans to stdout. */
  console?: boolean;
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

let sdk: NodeSDK | undefined;
let signalHandler: (() => void) | undefined;

function buildSpanProcessors(options: TracerOptions): SpanProcessor[] {
  const env = options.env ?? process.env;
  const processors: SpanProcessor[] = [];
  if (options.console) {
    processors.push(new BatchSpanProcessor(new ConsoleSpanExporter()));
  }
  if (env.OTEL_EXPORTER_OTLP_ENDPOINT) {
    processors.push(new BatchSpanProcessor(new OTLPTraceExporter()));
  }
  return processors;
}

/**
 * Starts the NodeSDK when at least one exporter is configured. Returns whether
 * tracing is active. Initialization failures are logged and tracing stays off.
 */
export function initTracer(logger: WinstonLogger, options: TracerOptions = {}): boolean {
  if (sdk) {
    return true;
  }
  const spanProcessors = buildSpanProcessors(options);
  if (spanProcessors.length === 0) {
    logger.debug('No span exporter configured; tracing disabled');
    return false;
  }

  try {
    sdk = new NodeSDK({
      serviceName: (options.env ?? process.env).OTEL_SERVICE_NAME || 'rankings-harvester',
      spanProcessors,
    });
    sdk.start();
    logger.info(`OpenTelemetry NodeSDK started with ${spanProcessors.length} exporter(s)`);
  } catch (error: unknown) {
    logger.error(`Failed to start OpenTelemetry SDK: ${describeError(error)}`);
    sdk = undefined;
    return false;
  }

  const handler = () => {
    shutdownTracer(logger)
      .catch((error: unknown) => logger.error(`Tracer shutdown failed: ${describeError(error)}`))
      .finally(() => process.exit(0));
  };
  signalHandler = handler;
  process.once('SIGTERM', handler);
  return true;
}

/**
 * Flushes buffered spans and stops the SDK. Safe to call when tracing is off.
 */
export async function shutdownTracer(logger: WinstonLogger): Promise<void> {
  if (signalHandler) {
    process.removeListener('SIGTERM', signalHandler);
    signalHandler = undefined;
  }
  if (!sdk) {
    return;
  }
  const running = sdk;
  sdk = undefined;
  await running.shutdown();
  logger.info('OpenTelemetry tracing terminated gracefully.');
}

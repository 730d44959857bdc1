/**
 * @fileoverview Tracing helpers for the pipeline stages. Each stage logs its
 * start, counts and completion under a shared trace id; batches additionally
 * run inside an OpenTelemetry span so that log lines carry `trace_id`.
 */
import { isSpanContextValid, SpanStatusCode, trace, type Span } from '@opentelemetry/api';
import type { Logger as WinstonLogger } from 'winston';

export const TRACER_NAME = 'rankings-harvester';

function generateTraceId(): string {
  return Math.random().toString(36).substring(2, 15);
}

/**
 * Tracer for URL loading from an input file.
 */
export class URLLoadingTracer {
  private readonly traceId = generateTraceId();
  private readonly startTime = Date.now();

  constructor(
    source: string,
    private readonly logger: WinstonLogger
  ) {
    this.logger.debug('TRACE [URL_LOADING] Starting', { traceId: this.traceId, source });
  }

  recordUrlCount(count: number, stage: string): void {
    this.logger.debug(`TRACE [URL_LOADING] ${stage}`, { traceId: this.traceId, stage, count });
  }

  finish(finalCount: number): void {
    this.logger.debug('TRACE [URL_LOADING] COMPLETED', {
      traceId: this.traceId,
      finalCount,
      durationMs: Date.now() - this.startTime,
    });
  }
}

/**
 * Tracer for one batch of detail URLs, bound to the batch's span.
 */
export class BatchProcessingTracer {
  private readonly traceId: string;
  private readonly startTime = Date.now();
  private finished = false;

  constructor(
    private readonly span: Span,
    private readonly batchId: number,
    private readonly size: number,
    private readonly logger: WinstonLogger
  ) {
    const spanContext = span.spanContext();
    this.traceId = isSpanContextValid(spanContext) ? spanContext.traceId : generateTraceId();
    this.logger.debug('TRACE [BATCH_PROCESSING] Starting', {
      traceId: this.traceId,
      batchId,
      size,
    });
  }

  recordCounts(successful: number, failed: number): void {
    this.span.setAttributes({
      'batch.successful': successful,
      'batch.failed': failed,
    });
    this.logger.debug('TRACE [BATCH_PROCESSING] Results', {
      traceId: this.traceId,
      batchId: this.batchId,
      successful,
      failed,
    });
    if (this.size > 0 && successful === 0) {
      this.logger.warn(`Batch ${this.batchId}: none of ${this.size} URLs produced a record`);
    }
  }

  recordError(error: Error): void {
    this.span.recordException(error);
    this.span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  }

  finish(success: boolean): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    if (success) {
      this.span.setStatus({ code: SpanStatusCode.OK });
    }
    this.span.end();
    this.logger.debug('TRACE [BATCH_PROCESSING] COMPLETED', {
      traceId: this.traceId,
      batchId: this.batchId,
      durationMs: Date.now() - this.startTime,
      success,
    });
  }
}

/**
 * Runs `fn` inside an active span named after the batch. The tracer is
 * finished on every exit path; `fn` reports success through its result.
 */
export async function traceBatch<T>(
  batchId: number,
  size: number,
  logger: WinstonLogger,
  fn: (tracer: BatchProcessingTracer) => Promise<{ result: T; success: boolean }>
): Promise<T> {
  return trace
    .getTracer(TRACER_NAME)
    .startActiveSpan(
      `batch ${batchId}`,
      { attributes: { 'batch.id': batchId, 'batch.size': size } },
      async (span) => {
        const tracer = new BatchProcessingTracer(span, batchId, size, logger);
        let success = false;
        try {
          const outcome = await fn(tracer);
          success = outcome.success;
          return outcome.result;
        } finally {
          tracer.finish(success);
        }
      }
    );
}

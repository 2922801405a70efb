import { Trace } from './traces';
import type { Span } from './spans';
import type { TracingExporter, TracingProcessor } from './processor-interface';
import { logger } from '../logger';

/**
 * Prints the traces and spans to the debug log.
 */
export class ConsoleSpanExporter implements TracingExporter {
  export(items: Array<Trace | Span>): void {
    for (const item of items) {
      if (item instanceof Trace) {
        logger.debug(`[Exporter] Export trace_id=${item.traceId}, name=${item.name}`);
      } else {
        logger.debug(`[Exporter] Export span: ${JSON.stringify(item.export())}`);
      }
    }
  }
}

/**
 * Hands every started trace and finished span straight to the exporter.
 */
export class SimpleTraceProcessor implements TracingProcessor {
  private readonly exporter: TracingExporter;
  private isShutdown: boolean = false;

  constructor(exporter: TracingExporter) {
    this.exporter = exporter;
  }

  onTraceStart(trace: Trace): void {
    if (!this.isShutdown) {
      this.exporter.export([trace]);
    }
  }

  onTraceEnd(_trace: Trace): void {
    // We send traces via onTraceStart
  }

  onSpanStart(_span: Span): void {
    // We send spans via onSpanEnd
  }

  onSpanEnd(span: Span): void {
    if (!this.isShutdown) {
      this.exporter.export([span]);
    }
  }

  shutdown(): void {
    this.isShutdown = true;
  }
}

const globalProcessor = new SimpleTraceProcessor(new ConsoleSpanExporter());

export function defaultProcessor(): SimpleTraceProcessor {
  return globalProcessor;
}

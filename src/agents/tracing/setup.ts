import { logger } from '../logger';
import { genTraceId } from './ids';
import type { TracingProcessor } from './processor-interface';
import { defaultProcessor } from './processors';
import { Scope } from './scope';
import { Span } from './spans';
import type { SpanData } from './span-data';
import { NoOpTrace, Trace, TraceImpl } from './traces';

export interface TraceOptions {
  /** Links the traces of related runs, e.g. by request id */
  groupId?: string | null;
  metadata?: Record<string, string> | null;
  /** Return a no-op trace for this run only */
  disabled?: boolean;
}

/**
 * Creates traces and spans and hands them to one processor. The service runs with the default
 * console processor; tests swap in their own.
 */
export class TraceProvider {
  private processor: TracingProcessor;
  private disabled = false;

  constructor(processor: TracingProcessor) {
    this.processor = processor;
  }

  setProcessor(processor: TracingProcessor): void {
    this.processor = processor;
  }

  setDisabled(disabled: boolean): void {
    this.disabled = disabled;
  }

  isDisabled(): boolean {
    return this.disabled;
  }

  createTrace(name: string, { groupId = null, metadata = null, disabled = false }: TraceOptions = {}): Trace {
    if (this.disabled || disabled) {
      logger.debug(`Tracing is disabled. Not creating trace ${name}`);
      return new NoOpTrace();
    }

    const traceId = genTraceId();
    logger.debug(`Creating trace ${name} with id ${traceId}`);
    return new TraceImpl(name, traceId, groupId, metadata, this.processor);
  }

  /**
   * Create a span under the current span, or under the current trace when no span is open.
   * Spans outside a recording trace, or under an inert span, are inert.
   */
  createSpan<T extends SpanData>(data: T, disabled = false): Span<T> {
    if (this.disabled || disabled) {
      return Span.inert(data);
    }

    const currentTrace = Scope.getCurrentTrace();
    if (currentTrace === null || currentTrace instanceof NoOpTrace) {
      return Span.inert(data);
    }

    const parent = Scope.getCurrentSpan();
    if (parent === null) {
      return Span.recording(data, this.processor, currentTrace.traceId, null);
    }
    return parent.isRecording
      ? Span.recording(data, this.processor, currentTrace.traceId, parent.spanId)
      : Span.inert(data);
  }

  shutdown(): void {
    logger.debug('Shutting down trace provider');
    this.processor.shutdown();
  }
}

export const GLOBAL_TRACE_PROVIDER = new TraceProvider(defaultProcessor());

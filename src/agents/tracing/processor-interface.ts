import type { Span } from './spans';
import type { Trace } from './traces';

/**
 * Interface for processing spans.
 */
export interface TracingProcessor {
  /**
   * Called when a trace is started.
   */
  onTraceStart(trace: Trace): void;

  /**
   * Called when a trace is finished.
   */
  onTraceEnd(trace: Trace): void;

  /**
   * Called when a span is started.
   */
  onSpanStart(span: Span): void;

  /**
   * Called when a span is finished. Should not block or raise exceptions.
   */
  onSpanEnd(span: Span): void;

  /**
   * Called when the application stops.
   */
  shutdown(): void;
}

/**
 * Exports traces and spans. For example, could log them or send them to a backend.
 */
export interface TracingExporter {
  export(items: Array<Trace | Span>): void;
}

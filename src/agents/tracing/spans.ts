import { logger } from '../logger';
import type { SpanData } from './span-data';
import type { TracingProcessor } from './processor-interface';
import { timeIso, genSpanId } from './ids';

export interface SpanError {
  message: string;
  data: Record<string, unknown> | null;
}

interface SpanIds {
  traceId: string;
  spanId: string;
  parentId: string | null;
}

/**
 * One timed step of a trace: a pipeline stage, a completion call or a search.
 *
 * A span made with `Span.inert()` keeps its data so callers can fill it in unconditionally, but it
 * has no ids and reports nothing. Spans created outside a trace, or while tracing is off, are inert.
 */
export class Span<TData extends SpanData = SpanData> {
  readonly data: TData;
  private readonly ids: SpanIds | null;
  private readonly processor: TracingProcessor | null;
  private _startedAt: string | null = null;
  private _endedAt: string | null = null;
  private _error: SpanError | null = null;

  private constructor(data: TData, ids: SpanIds | null, processor: TracingProcessor | null) {
    this.data = data;
    this.ids = ids;
    this.processor = processor;
  }

  static recording<T extends SpanData>(
    data: T,
    processor: TracingProcessor,
    traceId: string,
    parentId: string | null
  ): Span<T> {
    return new Span(data, { traceId, spanId: genSpanId(), parentId }, processor);
  }

  static inert<T extends SpanData>(data: T): Span<T> {
    return new Span(data, null, null);
  }

  get isRecording(): boolean {
    return this.processor !== null;
  }

  get traceId(): string | null {
    return this.ids?.traceId ?? null;
  }

  get spanId(): string | null {
    return this.ids?.spanId ?? null;
  }

  get parentId(): string | null {
    return this.ids?.parentId ?? null;
  }

  get startedAt(): string | null {
    return this._startedAt;
  }

  get endedAt(): string | null {
    return this._endedAt;
  }

  get error(): SpanError | null {
    return this._error;
  }

  start(): void {
    if (this.processor === null) {
      return;
    }
    if (this._startedAt !== null) {
      logger.warning(`${this.data.type} span already started`);
      return;
    }
    this._startedAt = timeIso();
    this.processor.onSpanStart(this);
  }

  finish(): void {
    if (this.processor === null) {
      return;
    }
    if (this._endedAt !== null) {
      logger.warning(`${this.data.type} span already finished`);
      return;
    }
    this._endedAt = timeIso();
    this.processor.onSpanEnd(this);
  }

  setError(error: SpanError): void {
    if (this.processor !== null) {
      this._error = error;
    }
  }

  /**
   * Plain-object form for exporters; `null` for inert spans.
   */
  export(): Record<string, unknown> | null {
    if (this.ids === null) {
      return null;
    }
    return {
      object: 'trace.span',
      id: this.ids.spanId,
      trace_id: this.ids.traceId,
      parent_id: this.ids.parentId,
      started_at: this._startedAt,
      ended_at: this._endedAt,
      span_data: this.data.export(),
      error: this._error,
    };
  }
}

import type { TracingProcessor } from './processor-interface';

/**
 * A trace is the root level object that tracing creates. It represents one pipeline run or
 * one article request.
 */
export abstract class Trace {
  abstract start(): void;

  abstract finish(): void;

  abstract get traceId(): string;

  /**
   * The name of the workflow being traced.
   */
  abstract get name(): string;

  /**
   * Export the trace as a plain object.
   */
  abstract export(): Record<string, unknown> | null;
}

/**
 * A no-op trace that will not be recorded.
 */
export class NoOpTrace extends Trace {
  start(): void {
    // No-op
  }

  finish(): void {
    // No-op
  }

  get traceId(): string {
    return 'no-op';
  }

  get name(): string {
    return 'no-op';
  }

  export(): Record<string, unknown> | null {
    return null;
  }
}

/**
 * A trace that will be recorded by the tracing library.
 */
export class TraceImpl extends Trace {
  private _name: string;
  private _traceId: string;
  public groupId: string | null;
  public metadata: Record<string, string> | null;
  private _processor: TracingProcessor;
  private _started: boolean = false;
  private _finished: boolean = false;

  constructor(
    name: string,
    traceId: string,
    groupId: string | null,
    metadata: Record<string, string> | null,
    processor: TracingProcessor
  ) {
    super();
    this._name = name;
    this._traceId = traceId;
    this.groupId = groupId;
    this.metadata = metadata;
    this._processor = processor;
  }

  get traceId(): string {
    return this._traceId;
  }

  get name(): string {
    return this._name;
  }

  start(): void {
    if (this._started) {
      return;
    }

    this._started = true;
    this._processor.onTraceStart(this);
  }

  finish(): void {
    if (!this._started || this._finished) {
      return;
    }

    this._finished = true;
    this._processor.onTraceEnd(this);
  }

  export(): Record<string, unknown> | null {
    return {
      object: 'trace',
      id: this.traceId,
      workflow_name: this.name,
      group_id: this.groupId,
      metadata: this.metadata,
    };
  }
}

import { describeError } from '../exceptions';
import { Scope } from './scope';
import type { Span } from './spans';
import type { SpanData } from './span-data';
import type { Trace } from './traces';

/**
 * Run a callback inside a trace: the trace is started, made current for everything the callback
 * awaits, and finished whether the callback resolves or rejects.
 */
export async function withTrace<R>(trace: Trace, callback: (trace: Trace) => Promise<R>): Promise<R> {
  trace.start();
  try {
    return await Scope.runWithTrace(trace, () => callback(trace));
  } finally {
    trace.finish();
  }
}

/**
 * Run a callback inside a span. A rejection is recorded on the span before it propagates.
 */
export async function withSpan<T extends SpanData, R>(
  span: Span<T>,
  callback: (span: Span<T>) => Promise<R>
): Promise<R> {
  span.start();
  try {
    return await Scope.runWithSpan(span, () => callback(span));
  } catch (error) {
    span.setError({
      message: describeError(error),
      data: error instanceof Error ? { type: error.name } : null,
    });
    throw error;
  } finally {
    span.finish();
  }
}

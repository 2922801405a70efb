import { AsyncLocalStorage } from 'async_hooks';
import type { Span } from './spans';
import type { Trace } from './traces';

interface ScopeFrame {
  trace: Trace | null;
  span: Span | null;
}

// One frame per async task, so concurrent pipeline runs never see each other's trace
const storage = new AsyncLocalStorage<ScopeFrame>();

/**
 * Manages the current trace and span context
 */
export class Scope {
  static getCurrentSpan(): Span | null {
    return storage.getStore()?.span ?? null;
  }

  static getCurrentTrace(): Trace | null {
    return storage.getStore()?.trace ?? null;
  }

  /**
   * Run a callback with the given trace as the current trace and no current span
   */
  static runWithTrace<R>(trace: Trace, callback: () => R): R {
    return storage.run({ trace, span: null }, callback);
  }

  /**
   * Run a callback with the given span as the current span, keeping the current trace
   */
  static runWithSpan<R>(span: Span, callback: () => R): R {
    const trace = storage.getStore()?.trace ?? null;
    return storage.run({ trace, span }, callback);
  }
}

import { DONT_LOG_MODEL_DATA } from '../debug';
import { logger } from '../logger';
import { Scope } from './scope';
import { GLOBAL_TRACE_PROVIDER, TraceOptions } from './setup';
import { AgentSpanData, GenerationSpanData, SearchSpanData } from './span-data';
import type { Span } from './spans';
import type { Trace } from './traces';

/**
 * Create a new trace. The trace is not started automatically; call `trace.start()` and
 * `trace.finish()`, or hand it to `withTrace()`.
 *
 * @param workflowName - The name of the logical workflow, e.g. "Content pipeline".
 */
export function trace(workflowName: string, options: TraceOptions = {}): Trace {
  if (Scope.getCurrentTrace()) {
    logger.warning(
      'Trace already exists. Creating a new trace, but this is probably a mistake.'
    );
  }

  return GLOBAL_TRACE_PROVIDER.createTrace(workflowName, options);
}

/**
 * Returns the currently active trace, if present.
 */
export function getCurrentTrace(): Trace | null {
  return Scope.getCurrentTrace();
}

/**
 * Returns the currently active span, if present.
 */
export function getCurrentSpan(): Span | null {
  return Scope.getCurrentSpan();
}

/**
 * Create a new agent span for one pipeline stage.
 */
export function agentSpan(
  name: string,
  kind: string | null = null,
  stage: number | null = null,
  disabled: boolean = false
): Span<AgentSpanData> {
  return GLOBAL_TRACE_PROVIDER.createSpan(new AgentSpanData(name, kind, stage), disabled);
}

/**
 * Create a new generation span for a completion call. Pass `null` input to keep the messages out
 * of the trace.
 */
export function generationSpan(
  input: Array<Record<string, string>> | null = null,
  model: string | null = null,
  disabled: boolean = false
): Span<GenerationSpanData> {
  return GLOBAL_TRACE_PROVIDER.createSpan(new GenerationSpanData(input, null, model), disabled);
}

/**
 * Create a new search span. The query is left out while model data logging is off.
 */
export function searchSpan(
  query: string,
  endpoint: string | null = null,
  disabled: boolean = false
): Span<SearchSpanData> {
  return GLOBAL_TRACE_PROVIDER.createSpan(
    new SearchSpanData(DONT_LOG_MODEL_DATA ? null : query, endpoint),
    disabled
  );
}

export * from './create';
export * from './span-data';
export * from './spans';
export * from './traces';
export * from './processor-interface';
export * from './scope';
export * from './ids';
export * from './utils';
export * from './setup';
export * from './processors';

import type { TracingProcessor } from './processor-interface';
import { GLOBAL_TRACE_PROVIDER } from './setup';

/**
 * Replace the processor that receives every trace and span. The default writes them to the
 * debug log.
 */
export function setTraceProcessor(processor: TracingProcessor): void {
  GLOBAL_TRACE_PROVIDER.setProcessor(processor);
}

/**
 * Set whether tracing is globally disabled.
 */
export function setTracingDisabled(disabled: boolean): void {
  GLOBAL_TRACE_PROVIDER.setDisabled(disabled);
}

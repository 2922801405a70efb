import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConsoleSpanExporter,
  NoOpTrace,
  SimpleTraceProcessor,
  Span,
  Trace,
  type TracingExporter,
  agentSpan,
  getCurrentSpan,
  getCurrentTrace,
  searchSpan,
  setTraceProcessor,
  setTracingDisabled,
  trace,
  withSpan,
  withTrace,
} from '../agents/tracing';
import { MemoryTracingProcessor } from './helpers/stubs';

class RecordingExporter implements TracingExporter {
  readonly exported: Array<Trace | Span> = [];

  export(items: Array<Trace | Span>): void {
    this.exported.push(...items);
  }
}

describe('tracing', () => {
  let processor: MemoryTracingProcessor;

  beforeEach(() => {
    processor = new MemoryTracingProcessor();
    setTraceProcessor(processor);
    setTracingDisabled(false);
  });

  it('generates trace and span ids in the expected shape', async () => {
    await withTrace(trace('ids'), async (current) => {
      expect(current.traceId).toMatch(/^trace_[0-9a-f]{32}$/);
      await withSpan(agentSpan('Writer'), async (span) => {
        expect(span.spanId).toMatch(/^span_[0-9a-f]{24}$/);
      });
    });
  });

  it('makes the trace and span current for everything they wrap', async () => {
    expect(getCurrentTrace()).toBeNull();

    await withTrace(trace('scope'), async (current) => {
      expect(getCurrentTrace()).toBe(current);
      expect(getCurrentSpan()).toBeNull();

      await withSpan(agentSpan('Writer'), async (span) => {
        expect(getCurrentSpan()).toBe(span);
      });

      expect(getCurrentSpan()).toBeNull();
    });

    expect(getCurrentTrace()).toBeNull();
  });

  it('makes spans under a disabled span inert', async () => {
    await withTrace(trace('partly disabled'), async () => {
      await withSpan(agentSpan('Writer', 'writer', 0, true), async () => {
        expect(searchSpan('q').isRecording).toBe(false);
      });
    });

    expect(processor.spans).toHaveLength(0);
  });

  it('parents a span on the span it runs inside', async () => {
    await withTrace(trace('nesting'), async () => {
      await withSpan(agentSpan('Researcher'), async (outer) => {
        await withSpan(searchSpan('q', 'https://search.test'), async (inner) => {
          expect(inner.parentId).toBe(outer.spanId);
          expect(inner.traceId).toBe(outer.traceId);
        });
      });
    });

    expect(processor.spans.map((span) => span.data.type)).toEqual(['search', 'agent']);
  });

  it('returns a no-op span outside any trace', () => {
    const span = agentSpan('Writer');

    expect(span.isRecording).toBe(false);
    span.start();
    span.finish();
    expect(span.export()).toBeNull();
    expect(processor.spans).toHaveLength(0);
  });

  it('returns no-op traces and spans while tracing is globally disabled', async () => {
    setTracingDisabled(true);
    const disabledTrace = trace('disabled');

    expect(disabledTrace).toBeInstanceOf(NoOpTrace);
    await withTrace(disabledTrace, async () => {
      expect(agentSpan('Writer').isRecording).toBe(false);
    });
    expect(processor.traces).toHaveLength(0);
  });

  it('starts and finishes a trace only once', () => {
    const onceTrace = trace('once');

    onceTrace.start();
    onceTrace.start();
    onceTrace.finish();
    onceTrace.finish();

    expect(processor.traces).toEqual([onceTrace]);
  });

  it('finishes the span and rethrows when the callback rejects', async () => {
    const failure = new RangeError('out of range');

    await withTrace(trace('failure'), async () => {
      await expect(
        withSpan(agentSpan('Writer'), async () => {
          throw failure;
        })
      ).rejects.toBe(failure);
    });

    const [span] = processor.spans;
    expect(span?.isRecording).toBe(true);
    expect(span?.endedAt).not.toBeNull();
    expect(span?.export()).toMatchObject({
      object: 'trace.span',
      parent_id: null,
      error: { message: 'out of range', data: { type: 'RangeError' } },
    });
  });
});

describe('SimpleTraceProcessor', () => {
  it('exports traces on start and spans on end until shut down', async () => {
    const exporter = new RecordingExporter();
    const simple = new SimpleTraceProcessor(exporter);
    setTraceProcessor(simple);
    setTracingDisabled(false);

    await withTrace(trace('exported'), async () => {
      await withSpan(agentSpan('Writer'), async () => 'done');
    });
    simple.shutdown();
    await withTrace(trace('ignored'), async () => 'done');

    expect(exporter.exported).toHaveLength(2);
    expect(exporter.exported[0]).toBeInstanceOf(Trace);
    expect(exporter.exported[1]).toBeInstanceOf(Span);
  });
});

describe('ConsoleSpanExporter', () => {
  it('writes nothing above debug level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleSpanExporter().export([new NoOpTrace()]);

    expect(debugSpy).not.toHaveBeenCalled();
    debugSpy.mockRestore();
  });
});

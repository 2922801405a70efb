import { beforeEach, describe, expect, it } from 'vitest';
import { ArticleManager } from '../agents/article-manager';
import { BackendError } from '../agents/exceptions';
import { Researcher, Writer } from '../agents/roles';
import { setTraceProcessor, setTracingDisabled } from '../agents/tracing';
import { MemoryTracingProcessor, StubModel, StubSearchBackend } from './helpers/stubs';

describe('ArticleManager', () => {
  let processor: MemoryTracingProcessor;

  beforeEach(() => {
    processor = new MemoryTracingProcessor();
    setTraceProcessor(processor);
    setTracingDisabled(false);
  });

  it('hands the writer the query as instruction and the research as context', async () => {
    const writerModel = new StubModel(() => 'the article');
    const manager = new ArticleManager({
      researcher: new Researcher({
        model: new StubModel(() => 'the research'),
        searchBackend: new StubSearchBackend({ body: { organic: [] } }),
      }),
      writer: new Writer({ model: writerModel }),
    });

    await expect(manager.writeArticle('ai news')).resolves.toEqual({
      research: 'the research',
      article: 'the article',
    });
    expect(writerModel.calls[0]?.input).toBe('ai news\n\nProvided context:\nthe research');
  });

  it('records an Article trace with a span for each agent', async () => {
    const manager = new ArticleManager({
      researcher: new Researcher({
        model: new StubModel(() => 'the research'),
        searchBackend: new StubSearchBackend({ body: {} }),
      }),
      writer: new Writer({ model: new StubModel(() => 'the article') }),
    });

    await manager.writeArticle('ai news');

    expect(processor.traces.map((articleTrace) => articleTrace.name)).toEqual(['Article']);
    expect(processor.spans.map((span) => span.data.export())).toEqual([
      { type: 'agent', name: 'Researcher', kind: 'researcher', stage: 0 },
      { type: 'agent', name: 'Writer', kind: 'writer', stage: 1 },
    ]);
  });

  it('does not write when the research fails', async () => {
    const failure = new BackendError('Search request failed: connect ECONNREFUSED', {
      backend: 'search',
    });
    const writerModel = new StubModel(() => 'the article');
    const manager = new ArticleManager({
      researcher: new Researcher({
        model: new StubModel(() => 'the research'),
        searchBackend: new StubSearchBackend({ error: failure }),
      }),
      writer: new Writer({ model: writerModel }),
    });

    await expect(manager.writeArticle('ai news')).rejects.toBe(failure);
    expect(writerModel.calls).toHaveLength(0);
  });

  it('records nothing when tracing is disabled', async () => {
    const manager = new ArticleManager({
      researcher: new Researcher({
        model: new StubModel(() => 'the research'),
        searchBackend: new StubSearchBackend({ body: {} }),
      }),
      writer: new Writer({ model: new StubModel(() => 'the article') }),
      tracingDisabled: true,
    });

    await manager.writeArticle('ai news');

    expect(processor.traces).toHaveLength(0);
    expect(processor.spans).toHaveLength(0);
  });
});

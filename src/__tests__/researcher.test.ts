import { describe, expect, it } from 'vitest';
import { BackendError } from '../agents/exceptions';
import { ContentPipeline } from '../agents/pipeline';
import { Researcher, TwitterAgent } from '../agents/roles';
import { StubModel, StubSearchBackend, echoModel } from './helpers/stubs';

const searchBody = {
  organic: [{ title: 'Async runtimes compared', link: 'https://example.com/runtimes' }],
};

const prettyBody = JSON.stringify(searchBody, null, 2);

describe('Researcher', () => {
  it('searches for the raw query and pretty-prints the response', async () => {
    const search = new StubSearchBackend({ body: searchBody });
    const researcher = new Researcher({ model: echoModel(), searchBackend: search });

    await expect(researcher.gatherContext('async runtimes')).resolves.toBe(prettyBody);
    expect(search.queries).toEqual(['async runtimes']);
  });

  it('encodes a missing response body as null', async () => {
    const search = new StubSearchBackend({ body: undefined });
    const researcher = new Researcher({ model: echoModel(), searchBackend: search });

    await expect(researcher.gatherContext('q')).resolves.toBe('null');
  });

  it('uses the search results as context when none is given', async () => {
    const model = new StubModel(() => 'summary');
    const researcher = new Researcher({ model, searchBackend: new StubSearchBackend({ body: searchBody }) });

    await expect(researcher.transform('async runtimes')).resolves.toBe('summary');
    expect(model.calls).toHaveLength(1);
    expect(model.calls[0]?.input).toBe(`async runtimes\n\nProvided context:\n${prettyBody}`);
    expect(model.calls[0]?.systemInstructions.startsWith('You are a research agent.')).toBe(true);
  });

  it('skips the search when a context is given', async () => {
    const model = echoModel();
    const search = new StubSearchBackend({ body: searchBody });
    const researcher = new Researcher({ model, searchBackend: search });

    await researcher.transform('q', 'notes');

    expect(search.queries).toEqual([]);
    expect(model.calls[0]?.input).toBe('q\n\nProvided context:\nnotes');
  });

  it('searches when the given context is blank', async () => {
    const model = echoModel();
    const search = new StubSearchBackend({ body: searchBody });
    const researcher = new Researcher({ model, searchBackend: search });

    await researcher.transform('async runtimes', '  \n ');

    expect(search.queries).toEqual(['async runtimes']);
    expect(model.calls[0]?.input).toBe(`async runtimes\n\nProvided context:\n${prettyBody}`);
  });

  it('fails with the search error and never calls the model', async () => {
    const failure = new BackendError('Search request failed with status 403', {
      backend: 'search',
      status: 403,
    });
    const model = echoModel();
    const researcher = new Researcher({
      model,
      searchBackend: new StubSearchBackend({ error: failure }),
    });

    await expect(researcher.transform('q')).rejects.toBe(failure);
    expect(model.calls).toHaveLength(0);
  });

  it('keeps the search results out of later stages', async () => {
    const researcher = new Researcher({
      model: new StubModel(() => 'summary'),
      searchBackend: new StubSearchBackend({ body: searchBody }),
    });
    const twitterModel = echoModel();
    const pipeline = new ContentPipeline([researcher, new TwitterAgent({ model: twitterModel })]);

    await expect(pipeline.runPipeline('async runtimes')).resolves.toBe('summary');
    expect(twitterModel.calls[0]?.input).toBe('summary');
  });

  it('searches again on every call', async () => {
    const search = new StubSearchBackend({ body: searchBody });
    const researcher = new Researcher({ model: echoModel(), searchBackend: search });

    await researcher.transform('first');
    await researcher.transform('second');

    expect(search.queries).toEqual(['first', 'second']);
  });
});

import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';
import { beforeEach, describe, expect, it } from 'vitest';
import { BackendError, UserError } from '../agents/exceptions';
import { DEFAULT_SEARCH_ENDPOINT, SerperSearchBackend } from '../agents/search/serper';
import { setTraceProcessor, setTracingDisabled, trace, withTrace } from '../agents/tracing';
import { MemoryTracingProcessor } from './helpers/stubs';

const ENDPOINT = 'https://search.test/search';

describe('SerperSearchBackend', () => {
  let processor: MemoryTracingProcessor;

  beforeEach(() => {
    processor = new MemoryTracingProcessor();
    setTraceProcessor(processor);
    setTracingDisabled(false);
  });

  it('posts the query with the API key and returns the response body', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const httpClient = axios.create({
      adapter: async (config) => {
        requests.push(config);
        return { data: { organic: [] }, status: 200, statusText: 'OK', headers: {}, config };
      },
    });
    const backend = new SerperSearchBackend({ apiKey: 'test-secret', endpoint: ENDPOINT, httpClient });

    await expect(backend.search('async runtimes')).resolves.toEqual({ organic: [] });

    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe('post');
    expect(requests[0]?.url).toBe(ENDPOINT);
    expect(requests[0]?.data).toBe('{"q":"async runtimes"}');
    expect(requests[0]?.headers.get('X-Api-Key')).toBe('test-secret');
  });

  it('reports a non-success status as BackendError', async () => {
    const httpClient = axios.create({
      adapter: async (config) => {
        throw new AxiosError('Request failed with status code 403', 'ERR_BAD_REQUEST', config, null, {
          data: { message: 'Unauthorized' },
          status: 403,
          statusText: 'Forbidden',
          headers: {},
          config,
        });
      },
    });
    const backend = new SerperSearchBackend({ apiKey: 'test-secret', endpoint: ENDPOINT, httpClient });

    const result = backend.search('q');
    await expect(result).rejects.toBeInstanceOf(BackendError);
    await expect(result).rejects.toMatchObject({
      message: 'Search request failed with status 403',
      backend: 'search',
      status: 403,
    });
  });

  it('reports a network failure as BackendError without a status', async () => {
    const httpClient = axios.create({
      adapter: async (config) => {
        throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
      },
    });
    const backend = new SerperSearchBackend({ apiKey: 'test-secret', endpoint: ENDPOINT, httpClient });

    await expect(backend.search('q')).rejects.toMatchObject({
      name: 'BackendError',
      message: 'Search request failed: connect ECONNREFUSED',
      status: null,
    });
  });

  it('records a search span inside a trace', async () => {
    const httpClient = axios.create({
      adapter: async (config) => ({ data: {}, status: 200, statusText: 'OK', headers: {}, config }),
    });
    const backend = new SerperSearchBackend({ apiKey: 'test-secret', httpClient });

    await withTrace(trace('test'), () => backend.search('q'));

    expect(processor.spans.map((span) => span.data.export())).toEqual([
      { type: 'search', query: 'q', endpoint: DEFAULT_SEARCH_ENDPOINT },
    ]);
  });

  it('requires an API key', () => {
    expect(() => new SerperSearchBackend({ apiKey: '' })).toThrow(UserError);
  });
});

import axios, { AxiosError, AxiosInstance } from 'axios';
import { SearchBackend } from './interface';
import { BackendError, UserError } from '../exceptions';
import { DONT_LOG_MODEL_DATA } from '../debug';
import { logger } from '../logger';
import { searchSpan, withSpan } from '../tracing';

export const DEFAULT_SEARCH_ENDPOINT = 'https://google.serper.dev/search';

/**
 * Google results through the Serper API.
 */
export class SerperSearchBackend extends SearchBackend {
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly client: AxiosInstance;

  constructor({
    apiKey,
    endpoint = DEFAULT_SEARCH_ENDPOINT,
    httpClient,
  }: {
    apiKey: string;
    endpoint?: string;
    httpClient?: AxiosInstance;
  }) {
    super();
    if (!apiKey) {
      throw new UserError('Serper API key is required');
    }
    this.apiKey = apiKey;
    this.endpoint = endpoint;
    this.client = httpClient ?? axios.create();
  }

  async search(query: string): Promise<unknown> {
    return withSpan(searchSpan(query, this.endpoint), async () => {
      if (DONT_LOG_MODEL_DATA) {
        logger.debug('Sending search request');
      } else {
        logger.debug(`Searching for: ${query}`);
      }

      try {
        const response = await this.client.post<unknown>(
          this.endpoint,
          { q: query },
          {
            headers: {
              'X-Api-Key': this.apiKey,
              'Content-Type': 'application/json',
            },
          }
        );
        return response.data;
      } catch (error) {
        if (error instanceof AxiosError) {
          const status = error.response?.status ?? null;
          throw new BackendError(
            status === null
              ? `Search request failed: ${error.message}`
              : `Search request failed with status ${status}`,
            { backend: 'search', status, cause: error }
          );
        }
        throw new BackendError(
          `Search request failed: ${error instanceof Error ? error.message : String(error)}`,
          { backend: 'search', cause: error }
        );
      }
    });
  }
}

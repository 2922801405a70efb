/**
 * The base interface for a web search service.
 */
export abstract class SearchBackend {
  /**
   * Run a free-text query and resolve with the service's JSON response body, untouched.
   * Rejects with a BackendError when the request fails or the service answers with a
   * non-success status.
   */
  abstract search(query: string): Promise<unknown>;
}

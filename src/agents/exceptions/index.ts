/**
 * Base class for every failure an agent stage can produce. A pipeline run rejects with the
 * first one raised.
 */
export class AgentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;

    // This maintains proper stack traces in modern JS engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export type BackendKind = 'completion' | 'search';

/**
 * Raised when the completion or search backend call fails: network failure, non-success
 * status, or a request the backend refused.
 */
export class BackendError extends AgentError {
  /**
   * Which backend failed
   */
  readonly backend: BackendKind;

  /**
   * HTTP status returned by the backend, when one was received
   */
  readonly status: number | null;

  constructor(
    message: string,
    {
      backend,
      status = null,
      cause,
    }: { backend: BackendKind; status?: number | null; cause?: unknown }
  ) {
    super(message, { cause });
    this.backend = backend;
    this.status = status;
  }
}

/**
 * Raised when the completion backend answers without any usable text.
 */
export class EmptyCompletion extends AgentError {
  /**
   * Name of the agent whose completion came back empty
   */
  readonly agentName: string;

  constructor(agentName: string) {
    super(`Agent ${agentName} received an empty completion`);
    this.agentName = agentName;
  }
}

export type SerializationSource = 'context' | 'request' | 'response';

/**
 * Raised when a context or payload cannot be encoded or decoded.
 */
export class SerializationError extends AgentError {
  readonly source: SerializationSource;

  constructor(
    message: string,
    { source, cause }: { source: SerializationSource; cause?: unknown }
  ) {
    super(message, { cause });
    this.source = source;
  }
}

/**
 * Exception raised when the library is used incorrectly: bad configuration, an empty
 * instruction override, or an invalid request body.
 */
export class UserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Render any thrown value as a short message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

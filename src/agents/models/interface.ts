import { DONT_LOG_MODEL_DATA } from '../debug';

/**
 * Controls how completion calls are traced.
 */
export enum ModelTracing {
  /**
   * Tracing is disabled entirely.
   */
  DISABLED = 0,

  /**
   * Tracing is enabled, and all data is included.
   */
  ENABLED = 1,

  /**
   * Tracing is enabled, but inputs/outputs are not included.
   */
  ENABLED_WITHOUT_DATA = 2,
}

/**
 * How completion calls are traced unless a model is told otherwise: without their messages while
 * model data logging is off.
 */
export const DEFAULT_MODEL_TRACING: ModelTracing = DONT_LOG_MODEL_DATA
  ? ModelTracing.ENABLED_WITHOUT_DATA
  : ModelTracing.ENABLED;

export abstract class ModelTracingUtils {
  static isDisabled(tracing: ModelTracing): boolean {
    return tracing === ModelTracing.DISABLED;
  }

  static includeData(tracing: ModelTracing): boolean {
    return tracing === ModelTracing.ENABLED;
  }
}

/**
 * Token counts a completion backend reported for one request.
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * What a completion backend returned for one request.
 */
export class ModelResponse {
  constructor(
    /**
     * Candidate completion texts, in the order the backend returned them. A candidate without
     * text content is `null`.
     */
    public readonly outputs: Array<string | null>,
    /**
     * Token usage, when the backend reports it.
     */
    public readonly usage: TokenUsage | null,
    /**
     * The backend's id for the response, when it reports one.
     */
    public readonly responseId: string | null = null
  ) {}
}

/**
 * The base interface for calling an LLM.
 */
export abstract class Model {
  /**
   * Get a response from the model for one system/user message pair.
   *
   * @param systemInstructions - Sent as the system message
   * @param input - Sent as the user message
   */
  abstract getResponse(systemInstructions: string, input: string): Promise<ModelResponse>;
}

/**
 * The base interface for a model provider.
 *
 * Model provider is responsible for looking up Models by name.
 */
export abstract class ModelProvider {
  /**
   * Get a model by name. Without a name, the provider's default model is returned.
   */
  abstract getModel(modelName?: string | null): Model;
}

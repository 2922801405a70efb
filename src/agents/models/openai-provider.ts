import { OpenAI } from 'openai';
import { DEFAULT_MODEL_TRACING, Model, ModelProvider, ModelTracing } from './interface';
import { ChatCompletionsClient, OpenAIChatCompletionsModel } from './openai-chatcompletions';
import { UserError } from '../exceptions';

export const DEFAULT_MODEL = 'gpt-4o-mini';

const _USER_AGENT = 'ContentAgents/Node';

/**
 * Provider for OpenAI chat completion models.
 */
export class OpenAIProvider extends ModelProvider {
  private _client: ChatCompletionsClient | null = null;
  private _storedApiKey: string | null = null;
  private _storedBaseUrl: string | null = null;
  private _defaultModel: string;
  private _tracing: ModelTracing;

  /**
   * @param apiKey - The API key for the OpenAI client. Required unless openaiClient is given.
   * @param baseUrl - Optional base URL for the OpenAI client.
   * @param openaiClient - An existing client to use instead of building one.
   * @param defaultModel - The model used when getModel() is called without a name.
   * @param tracing - How completion calls are traced. Defaults to leaving messages out while
   *   model data logging is off.
   */
  constructor({
    apiKey,
    baseUrl,
    openaiClient,
    defaultModel = DEFAULT_MODEL,
    tracing = DEFAULT_MODEL_TRACING,
  }: {
    apiKey?: string | null;
    baseUrl?: string | null;
    openaiClient?: ChatCompletionsClient | null;
    defaultModel?: string;
    tracing?: ModelTracing;
  } = {}) {
    super();
    if (openaiClient) {
      if (apiKey || baseUrl) {
        throw new UserError("Don't provide apiKey or baseUrl if you provide openaiClient");
      }
      this._client = openaiClient;
    } else {
      this._storedApiKey = apiKey || null;
      this._storedBaseUrl = baseUrl || null;
    }
    this._defaultModel = defaultModel;
    this._tracing = tracing;
  }

  /**
   * The client is built on first use, so a provider can be constructed before the key is known
   * to be needed.
   */
  private _getClient(): ChatCompletionsClient {
    if (this._client === null) {
      if (!this._storedApiKey) {
        throw new UserError('OpenAI API key is required');
      }
      this._client = new OpenAI({
        apiKey: this._storedApiKey,
        baseURL: this._storedBaseUrl || undefined,
        defaultHeaders: {
          'User-Agent': _USER_AGENT,
        },
      });
    }
    return this._client;
  }

  getModel(modelName?: string | null): Model {
    return new OpenAIChatCompletionsModel({
      model: modelName || this._defaultModel,
      openaiClient: this._getClient(),
      tracing: this._tracing,
    });
  }
}

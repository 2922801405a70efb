import { OpenAI } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import {
  DEFAULT_MODEL_TRACING,
  Model,
  ModelResponse,
  ModelTracing,
  ModelTracingUtils,
  TokenUsage,
} from './interface';
import { DONT_LOG_MODEL_DATA } from '../debug';
import { logger } from '../logger';
import { generationSpan, withSpan } from '../tracing';
import { AgentError, BackendError } from '../exceptions';

/**
 * The part of the OpenAI client this model calls. An `OpenAI` instance satisfies it.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<ChatCompletion>;
    };
  };
}

/**
 * Completion backend on the OpenAI chat completions API.
 */
export class OpenAIChatCompletionsModel extends Model {
  private model: string;
  private _client: ChatCompletionsClient;
  private _tracing: ModelTracing;

  constructor({
    model,
    openaiClient,
    tracing = DEFAULT_MODEL_TRACING,
  }: {
    model: string;
    openaiClient: ChatCompletionsClient;
    tracing?: ModelTracing;
  }) {
    super();
    this.model = model;
    this._client = openaiClient;
    this._tracing = tracing;
  }

  get modelName(): string {
    return this.model;
  }

  async getResponse(systemInstructions: string, input: string): Promise<ModelResponse> {
    const messages = [
      { role: 'system' as const, content: systemInstructions },
      { role: 'user' as const, content: input },
    ];

    const span = generationSpan(
      ModelTracingUtils.includeData(this._tracing) ? messages : null,
      this.model,
      ModelTracingUtils.isDisabled(this._tracing)
    );

    return withSpan(span, async (span) => {
      const response = await this._fetchResponse({ model: this.model, messages });

      const outputs = response.choices.map((choice) => choice.message.content);

      if (DONT_LOG_MODEL_DATA) {
        logger.debug('Received model response');
      } else {
        logger.debug(`LLM resp:\n${JSON.stringify(outputs, null, 2)}\n`);
      }

      const usage: TokenUsage | null = response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : null;

      if (ModelTracingUtils.includeData(this._tracing)) {
        span.data.output = outputs;
      }
      if (usage) {
        span.data.usage = { input_tokens: usage.inputTokens, output_tokens: usage.outputTokens };
      }

      return new ModelResponse(outputs, usage, response.id);
    });
  }

  private async _fetchResponse(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> {
    if (DONT_LOG_MODEL_DATA) {
      logger.debug('Calling LLM');
    } else {
      logger.debug(`Calling LLM ${this.model} with input:\n${JSON.stringify(body.messages, null, 2)}\n`);
    }

    try {
      return await this._client.chat.completions.create(body);
    } catch (error) {
      throw toBackendError(error);
    }
  }
}

function toBackendError(error: unknown): AgentError {
  if (error instanceof AgentError) {
    return error;
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? null;
    return new BackendError(`Completion request failed: ${error.message}`, {
      backend: 'completion',
      status,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendError(`Completion request failed: ${message}`, {
    backend: 'completion',
    cause: error,
  });
}

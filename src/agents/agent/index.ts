import type { Model, ModelResponse } from '../models/interface';
import {
  AgentError,
  BackendError,
  EmptyCompletion,
  SerializationError,
  UserError,
  describeError,
} from '../exceptions';
import { DONT_LOG_MODEL_DATA } from '../debug';
import { logger } from '../logger';

/**
 * Every agent variant, in the order they are documented.
 */
export const AGENT_KINDS = ['researcher', 'writer', 'twitter', 'linkedin'] as const;

export type AgentKind = (typeof AGENT_KINDS)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Auxiliary context for one transform call. Strings are sent as they are, anything else is
 * JSON-encoded.
 */
export type AgentContext = JsonValue;

/**
 * Constructor properties shared by every agent variant.
 */
export interface AgentProps {
  /** The model implementation to use when invoking the LLM */
  model: Model;
  /**
   * Replaces the variant's default system prompt. Fixed for the lifetime of the agent; must not
   * be empty.
   */
  instructions?: string;
  /** Replaces the variant's default name */
  name?: string;
}

const CONTEXT_LABEL = 'Provided context:';

/**
 * Render a context value as prompt text.
 */
export function renderContext(context: AgentContext): string {
  if (typeof context === 'string') {
    return context;
  }
  try {
    return JSON.stringify(context, null, 2);
  } catch (error) {
    throw new SerializationError(`Context could not be encoded as JSON: ${describeError(error)}`, {
      source: 'context',
      cause: error,
    });
  }
}

/**
 * Build the user message for a transform call: the instruction, then the context under a
 * labelled section. Empty context adds nothing.
 */
export function buildUserMessage(instruction: string, context: AgentContext = ''): string {
  const rendered = renderContext(context);
  if (rendered.trim() === '') {
    return instruction;
  }
  return `${instruction}\n\n${CONTEXT_LABEL}\n${rendered}`;
}

/**
 * An agent is a model configured with a fixed persona. Its one operation, `transform`, sends the
 * persona as the system message and an instruction (plus optional context) as the user message,
 * and returns the model's reply.
 *
 * Agents hold only read-only references and keep no state between calls, so a single instance can
 * serve any number of concurrent pipeline runs.
 */
export abstract class Agent {
  /** Discriminates the variants of `AnyAgent` */
  abstract readonly kind: AgentKind;

  /** The name of the agent, used in logs and traces */
  readonly name: string;

  /** The model implementation to use when invoking the LLM */
  readonly model: Model;

  private readonly instructionsOverride: string | null;

  protected constructor(defaultName: string, { model, instructions, name }: AgentProps) {
    const resolvedName = name ?? defaultName;
    if (resolvedName.trim() === '') {
      throw new UserError('Agent name must not be empty');
    }
    if (instructions !== undefined && instructions.trim() === '') {
      throw new UserError(`Instructions for agent ${resolvedName} must not be empty`);
    }
    this.name = resolvedName;
    this.model = model;
    this.instructionsOverride = instructions ?? null;
  }

  /**
   * The system prompt used when no override was supplied.
   */
  protected abstract defaultInstructions(): string;

  /**
   * Get the system prompt for the agent.
   */
  getSystemPrompt(): string {
    return this.instructionsOverride ?? this.defaultInstructions();
  }

  /**
   * Run the agent once.
   *
   * @param instruction - The text to act on: the user query or the previous agent's output.
   * @param context - Auxiliary context appended to the user message.
   * @returns The text of the model's first candidate.
   * @throws SerializationError if the context cannot be encoded.
   * @throws BackendError if the completion call fails.
   * @throws EmptyCompletion if the model returns no text.
   */
  async transform(instruction: string, context: AgentContext = ''): Promise<string> {
    const userMessage = buildUserMessage(instruction, context);

    let response: ModelResponse;
    try {
      response = await this.model.getResponse(this.getSystemPrompt(), userMessage);
    } catch (error) {
      if (error instanceof AgentError) {
        throw error;
      }
      throw new BackendError(
        `Completion request for agent ${this.name} failed: ${describeError(error)}`,
        { backend: 'completion', cause: error }
      );
    }

    const text = response.outputs[0];
    if (text === undefined || text === null || text.trim() === '') {
      throw new EmptyCompletion(this.name);
    }

    if (DONT_LOG_MODEL_DATA) {
      logger.debug(`Retrieved result from ${this.name} (${text.length} characters)`);
    } else {
      logger.debug(`Retrieved result from ${this.name}: ${text}`);
    }

    return text;
  }
}

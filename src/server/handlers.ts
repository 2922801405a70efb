import { z } from 'zod';
import { AGENT_KINDS } from '../agents/agent';
import type { ArticleManager, ArticleResult } from '../agents/article-manager';
import {
  BackendError,
  EmptyCompletion,
  SerializationError,
  UserError,
} from '../agents/exceptions';
import { logger } from '../agents/logger';
import { ContentPipeline } from '../agents/pipeline';
import { AgentFactory, DEFAULT_AGENT_KINDS } from '../agents/roles';

export const GREETING = 'Hola mundo!';

export const PromptRequestSchema = z.object({
  q: z.string(),
  agents: z.array(z.enum(AGENT_KINDS)).optional(),
});

export type PromptRequest = z.infer<typeof PromptRequestSchema>;

export const ArticleRequestSchema = z.object({
  q: z.string(),
});

export type ArticleRequest = z.infer<typeof ArticleRequestSchema>;

export interface ErrorBody {
  error: {
    type: string;
    message: string;
  };
}

export interface ErrorResponse {
  status: number;
  body: ErrorBody;
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new UserError(`Invalid request body: ${problems.join('; ')}`);
  }
  return parsed.data;
}

export function parsePromptRequest(body: unknown): PromptRequest {
  return parseBody(PromptRequestSchema, body);
}

export function parseArticleRequest(body: unknown): ArticleRequest {
  return parseBody(ArticleRequestSchema, body);
}

export interface PromptHandlerDeps {
  agentFactory: AgentFactory;
  tracingDisabled?: boolean;
}

/**
 * Build the requested agent chain and run the query through it.
 */
export async function handlePrompt(body: unknown, deps: PromptHandlerDeps): Promise<string> {
  const request = parsePromptRequest(body);
  const agents = deps.agentFactory.createMany(request.agents ?? DEFAULT_AGENT_KINDS);
  const pipeline = new ContentPipeline(agents, { tracingDisabled: deps.tracingDisabled });
  return pipeline.runPipeline(request.q);
}

export async function handleArticle(body: unknown, manager: ArticleManager): Promise<ArticleResult> {
  const request = parseArticleRequest(body);
  return manager.writeArticle(request.q);
}

// Type names for the client errors express and its body parser raise
const CLIENT_ERROR_TYPES: Partial<Record<number, string>> = {
  400: 'BadRequest',
  413: 'PayloadTooLarge',
  415: 'UnsupportedMediaType',
};

interface ExposedClientError extends Error {
  status: number;
  expose: true;
}

/**
 * Whether an error is an http-errors style 4xx whose message is safe to show the client, as
 * raised by express's body parser for oversized, aborted or unsupported bodies.
 */
export function isExposedClientError(error: unknown): error is ExposedClientError {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500 &&
    'expose' in error &&
    error.expose === true
  );
}

function errorBody(type: string, message: string): ErrorBody {
  return { error: { type, message } };
}

/**
 * Map a failure onto the HTTP status and JSON body the client sees.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof UserError) {
    return { status: 400, body: errorBody(error.name, error.message) };
  }
  if (error instanceof SerializationError) {
    const status = error.source === 'request' ? 400 : 500;
    return { status, body: errorBody(error.name, error.message) };
  }
  if (error instanceof BackendError || error instanceof EmptyCompletion) {
    return { status: 502, body: errorBody(error.name, error.message) };
  }
  if (isExposedClientError(error)) {
    return {
      status: error.status,
      body: errorBody(CLIENT_ERROR_TYPES[error.status] ?? 'ClientError', error.message),
    };
  }

  logger.error(`Unhandled error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
  return { status: 500, body: errorBody('InternalError', 'Internal server error') };
}

/**
 * Whether an error is express's JSON body parser rejecting the request body.
 */
export function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

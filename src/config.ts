import { z } from 'zod';
import { UserError } from './agents/exceptions';
import type { LogLevelName } from './agents/logger';
import { DEFAULT_MODEL } from './agents/models/openai-provider';
import { DEFAULT_SEARCH_ENDPOINT } from './agents/search/serper';

/**
 * Everything the service needs at startup, resolved once from the environment.
 */
export interface AppConfig {
  openaiApiKey: string;
  serperApiKey: string;
  openaiBaseUrl: string | null;
  model: string;
  searchEndpoint: string;
  port: number;
  logLevel: LogLevelName;
  tracingDisabled: boolean;
}

// Empty strings count as unset
const blankAsUnset = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const requiredSecret = z.preprocess(blankAsUnset, z.string({ required_error: 'must be set' }));

const flag = z.preprocess(
  blankAsUnset,
  z
    .string()
    .optional()
    .transform((value) => value === '1' || value?.toLowerCase() === 'true')
);

const EnvSchema = z.object({
  OPENAI_API_KEY: requiredSecret,
  SERPER_API_KEY: requiredSecret,
  OPENAI_BASE_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
  CONTENT_AGENTS_MODEL: z.preprocess(blankAsUnset, z.string().default(DEFAULT_MODEL)),
  SEARCH_ENDPOINT: z.preprocess(blankAsUnset, z.string().url().default(DEFAULT_SEARCH_ENDPOINT)),
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().positive().max(65535).default(8000)),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankAsUnset(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warning', 'error', 'critical']).default('info')
  ),
  CONTENT_AGENTS_DISABLE_TRACING: flag,
});

/**
 * Build the configuration from environment variables.
 *
 * @throws UserError naming every missing or invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new UserError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    serperApiKey: values.SERPER_API_KEY,
    openaiBaseUrl: values.OPENAI_BASE_URL ?? null,
    model: values.CONTENT_AGENTS_MODEL,
    searchEndpoint: values.SEARCH_ENDPOINT,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    tracingDisabled: values.CONTENT_AGENTS_DISABLE_TRACING,
  };
}

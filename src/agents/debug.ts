import 'dotenv/config';

/**
 * Helper function to check if a debug flag is enabled in environment variables
 */
export function debugFlagEnabled(flag: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const flagValue = env[flag];
  return flagValue !== undefined && (flagValue === '1' || flagValue.toLowerCase() === 'true');
}

/**
 * Agent results and model inputs/outputs are logged at debug level by default. Set this flag to
 * log only their sizes, to avoid exposing user content in the logs.
 */
export const DONT_LOG_MODEL_DATA = debugFlagEnabled('CONTENT_AGENTS_DONT_LOG_MODEL_DATA');

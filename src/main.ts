import 'dotenv/config';
import { ArticleManager } from './agents/article-manager';
import { UserError } from './agents/exceptions';
import { logger, parseLogLevel } from './agents/logger';
import { OpenAIProvider } from './agents/models/openai-provider';
import { AgentFactory } from './agents/roles';
import { SerperSearchBackend } from './agents/search/serper';
import { GLOBAL_TRACE_PROVIDER, setTracingDisabled } from './agents/tracing';
import { AppConfig, loadConfig } from './config';
import { createApp } from './server/app';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof UserError) {
      logger.critical(error.message);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();
  logger.setLevel(parseLogLevel(config.logLevel));
  setTracingDisabled(config.tracingDisabled);

  const provider = new OpenAIProvider({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    defaultModel: config.model,
  });
  const model = provider.getModel();
  const searchBackend = new SerperSearchBackend({
    apiKey: config.serperApiKey,
    endpoint: config.searchEndpoint,
  });

  const agentFactory = new AgentFactory({ model, searchBackend });
  const articleManager = new ArticleManager({
    researcher: agentFactory.create('researcher'),
    writer: agentFactory.create('writer'),
    tracingDisabled: config.tracingDisabled,
  });

  const app = createApp({ agentFactory, articleManager, tracingDisabled: config.tracingDisabled });
  const server = app.listen(config.port, () => {
    logger.info(`Listening on port ${config.port} with model ${config.model}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    GLOBAL_TRACE_PROVIDER.shutdown();
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main();

import express, { NextFunction, Request, Response } from 'express';
import type { ArticleManager } from '../agents/article-manager';
import { SerializationError } from '../agents/exceptions';
import { logger } from '../agents/logger';
import type { AgentFactory } from '../agents/roles';
import {
  GREETING,
  handleArticle,
  handlePrompt,
  isBodyParseError,
  toErrorResponse,
} from './handlers';

export interface AppServices {
  agentFactory: AgentFactory;
  articleManager: ArticleManager;
  tracingDisabled?: boolean;
}

/**
 * The HTTP surface: a greeting for liveness checks, the prompt pipeline and the article flow.
 */
export function createApp(services: AppServices): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send(GREETING);
  });

  app.post('/prompt', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const output = await handlePrompt(req.body, {
        agentFactory: services.agentFactory,
        tracingDisabled: services.tracingDisabled,
      });
      res.json(output);
    } catch (error) {
      next(error);
    }
  });

  app.post('/article', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await handleArticle(req.body, services.articleManager));
    } catch (error) {
      next(error);
    }
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: { type: 'NotFound', message: `No route for ${req.method} ${req.path}` } });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const failure = isBodyParseError(error)
      ? new SerializationError('Request body is not valid JSON', { source: 'request', cause: error })
      : error;
    const { status, body } = toErrorResponse(failure);
    logger.warning(`${req.method} ${req.path} failed with ${status}: ${body.error.message}`);
    res.status(status).json(body);
  });

  return app;
}

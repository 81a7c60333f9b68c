import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { AskHandler } from './ask.js';
import { AppError, BadRequestError } from './errors.js';
import { describeError, silentLogger, type Logger } from './logger.js';
import type { BackendKind } from './types.js';

export const SERVICE_NAME = 'CultureBot';

export interface AppOptions {
  ask: AskHandler;
  cacheBackend: BackendKind;
  model: string;
  version: string;
  logger?: Logger;
}

function readQuestion(body: unknown): string {
  if (typeof body !== 'object' || body === null || !('question' in body)) {
    throw new BadRequestError('Question is required');
  }
  const { question } = body;
  if (typeof question !== 'string' || question.length === 0) {
    throw new BadRequestError('Question is required');
  }
  return question;
}

/**
 * Build the Express app. Routes stay thin: validation here, everything else in `ask`.
 */
export function createApp(options: AppOptions): Express {
  const { ask, cacheBackend, model, version, logger = silentLogger } = options;

  const app = express();
  // Browser clients on any origin may call the API
  app.use(cors());
  app.use(express.json());

  app.get('/', (_req, res) => {
    logger.info('Health check endpoint called');
    res.json({ status: 'healthy', service: SERVICE_NAME });
  });

  app.get('/health', (_req, res) => {
    logger.info('Detailed health check endpoint called');
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      model,
      version,
      cache: cacheBackend,
    });
  });

  app.post('/ask', async (req, res, next) => {
    try {
      const question = readQuestion(req.body);
      const result = await ask(question);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.error(`Error generating answer: ${error.message}`);
      } else {
        logger.warn(`Rejected request: ${error.message}`);
      }
      res.status(error.statusCode).json(error.toJSON());
      return;
    }

    // Malformed JSON bodies arrive here from express.json()
    if (error instanceof SyntaxError) {
      res.status(400).json(new BadRequestError('Request body must be valid JSON').toJSON());
      return;
    }

    logger.error(`Unhandled error: ${describeError(error)}`);
    res.status(500).json({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
  });

  return app;
}

import express, { type Express } from 'express';
import cors from 'cors';
import type { Logger } from 'pino';
import { listCategories } from './config/categories.js';
import { ContentController } from './controllers/content.controller.js';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { DEFAULT_GENERATION_LIMIT, createGenerationRateLimiter, type RateLimitOptions } from './middleware/rateLimiter.js';
import { createContentRouter } from './routes/content.routes.js';
import type { ContentGeneratorService } from './services/contentGenerator.service.js';
import type { GeneratorConfig } from './types/generation.js';

export interface AppDependencies {
  generator: ContentGeneratorService;
  config: GeneratorConfig;
  logger: Logger;
  corsOrigin?: string;
  rateLimit?: RateLimitOptions;
}

export function createApp({ generator, config, logger, corsOrigin = '*', rateLimit }: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  app.use(
    cors({
      origin: corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Amz-Date', 'Authorization', 'X-Api-Key', 'X-Amz-Security-Token'],
      optionsSuccessStatus: 200,
    })
  );
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      environment: config.environment,
      model: config.model,
      categories: listCategories().length,
    });
  });

  const controller = new ContentController({ generator, config, logger });
  const limiter = createGenerationRateLimiter(rateLimit ?? DEFAULT_GENERATION_LIMIT);
  app.use(createContentRouter(controller, limiter));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}

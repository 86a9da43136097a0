import 'dotenv/config';
import { createServer } from 'http';
import { createApp } from './app.js';
import { buildGeneratorConfig, loadEnv } from './config/env.js';
import { createLogger } from './config/logger.js';
import { ArticleWriter } from './services/articleWriter.service.js';
import { ContentGeneratorService } from './services/contentGenerator.service.js';
import { GeminiService } from './services/gemini.service.js';
import { createObjectStore } from './services/storage.service.js';
import { errorMessage } from './utils/errors.js';

async function startServer(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ level: env.LOG_LEVEL, pretty: env.NODE_ENV !== 'production' });
  const config = buildGeneratorConfig(env);

  logger.info('🚀 Starting content generator...');

  const gemini = new GeminiService(
    {
      apiKey: env.GEMINI_API_KEY,
      model: config.model,
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      timeoutMs: config.inferenceTimeoutMs,
    },
    logger
  );
  if (!gemini.isConfigured()) {
    logger.warn('⚠ GEMINI_API_KEY is not set; every generation request will fail');
  }
  if (config.storageDriver === 's3' && !config.bucket) {
    logger.warn('⚠ OUTPUT_BUCKET_NAME is not set; /generate will answer 500');
  }

  const generator = new ContentGeneratorService({
    writer: new ArticleWriter(gemini, config.inferenceTimeoutMs, logger),
    store: createObjectStore(config, logger),
    config,
    logger,
  });

  const app = createApp({ generator, config, logger, corsOrigin: env.CORS_ORIGIN });
  const httpServer = createServer(app);

  httpServer.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE' || error.code === 'EACCES') {
      logger.fatal({ port: env.PORT, code: error.code }, `Cannot listen on port ${env.PORT}`);
      process.exit(1);
    }
    logger.fatal({ err: error }, 'Server error');
    process.exit(1);
  });

  httpServer.listen(env.PORT, env.HOST, () => {
    logger.info(
      {
        port: env.PORT,
        host: env.HOST,
        nodeEnv: env.NODE_ENV,
        model: config.model,
        storage: config.storageDriver,
        concurrency: config.concurrency,
      },
      `✅ Content generator running on http://${env.HOST}:${env.PORT}`
    );
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    httpServer.close((err) => {
      if (err) {
        logger.error({ err }, 'Error during server shutdown');
        process.exit(1);
      }
      logger.info('Graceful shutdown completed');
      process.exit(0);
    });

    // Force close after 30 seconds
    setTimeout(() => {
      logger.error('Forcing shutdown after 30 seconds');
      process.exit(1);
    }, 30_000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason: errorMessage(reason) }, 'Unhandled Promise Rejection');
  });
}

startServer().catch((error: unknown) => {
  console.error('💥 Server startup failed:', errorMessage(error));
  process.exit(1);
});

import dotenv from 'dotenv';

// Load environment variables before any other imports
dotenv.config();

import { createApp } from './app';
import { loadConfig } from './config';
import { createDatabase } from './config/database';
import { ExifGpsReader } from './services/exifGpsReader';
import { ImgbbUploadService } from './services/imageUploadService';
import { PrometheusMetricsService } from './services/prometheusMetrics';
import { SubmissionWorkflow } from './services/submissionWorkflow';
import { PostgresRowStore } from './services/surveyStore';
import { errorMessage } from './utils/errors';
import Logger from './utils/logger';

const logger = Logger.createServiceLogger('Server');

async function startServer(): Promise<void> {
  const config = loadConfig();
  const db = createDatabase(config.database);

  try {
    const health = await db.healthCheck();
    if (!health.healthy) {
      throw new Error(`Database connection failed: ${health.error}`);
    }

    logger.info('Database connection verified', { latency: health.latency });

    const store = new PostgresRowStore(db, config.database.tableName);
    await store.ensureTable();

    const uploader = new ImgbbUploadService(config.imageHost);
    if (!uploader.enabled) {
      logger.warn('IMGBB_API_KEY is not set, submitted images will not be hosted');
    }

    const workflow = new SubmissionWorkflow({
      store,
      uploader,
      gpsReader: new ExifGpsReader()
    });

    const app = createApp({
      config,
      store,
      uploader,
      workflow,
      metrics: new PrometheusMetricsService()
    });

    const server = app.listen(config.port, config.host, () => {
      logger.info('Road distress survey service started', {
        port: config.port,
        host: config.host,
        environment: config.environment,
        table: config.database.tableName
      });
    });

    server.keepAliveTimeout = 30000;
    server.headersTimeout = 35000;

    const gracefulShutdown = (signal: string) => {
      logger.info(`Received ${signal}, starting graceful shutdown`);

      server.close(() => {
        logger.info('HTTP server closed', { database: db.getMetrics() });

        db.close()
          .then(() => {
            logger.info('Database connections closed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error('Error during database shutdown', { error: errorMessage(error) });
            process.exit(1);
          });
      });

      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    await db.close().catch((closeError: unknown) => {
      logger.error('Error closing database pool', { error: errorMessage(closeError) });
    });
    process.exit(1);
  }
}

startServer().catch((error: unknown) => {
  logger.error('Unexpected startup failure', { error: errorMessage(error) });
  process.exit(1);
});

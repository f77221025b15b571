/**
 * Health Check Routes
 */

import { Router, Request, Response } from 'express';
import { ImageUploader } from '../services/imageUploadService';
import { RowStore } from '../services/surveyStore';
import { HealthCheckResponse } from '../types/api';
import { errorMessage } from '../utils/errors';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('HealthRoutes');

export function createHealthRoutes(store: RowStore, uploader: ImageUploader): Router {
  const router = Router();

  router.get('/health', async (req: Request, res: Response) => {
    const startTime = Date.now();

    let database: HealthCheckResponse['services']['database'];
    try {
      database = await store.healthCheck();
    } catch (error) {
      logger.error('Health check failed', { error: errorMessage(error) });
      database = { healthy: false, latency: Date.now() - startTime, error: errorMessage(error) };
    }

    const body: HealthCheckResponse = {
      status: database.healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      responseTime: `${Date.now() - startTime}ms`,
      services: {
        database,
        imageHost: {
          enabled: uploader.enabled
        }
      }
    };

    res.status(database.healthy ? 200 : 503).json(body);
  });

  return router;
}

/**
 * Prometheus Metrics Collection Middleware
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { PrometheusMetricsService } from '../services/prometheusMetrics';
import { errorMessage } from '../utils/errors';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('PrometheusMiddleware');

const KNOWN_ROUTES = [
  '/api/v1/submissions',
  '/api/v1/submissions/form-options',
  '/api/v1/health',
  '/metrics'
];

export function getRoutePattern(path: string): string {
  const normalized = path.length > 1 ? path.replace(/\/+$/, '') : path;
  return KNOWN_ROUTES.includes(normalized) ? normalized : 'unmatched';
}

/**
 * Record request count and duration once the response is sent
 */
export function createMetricsMiddleware(metrics: PrometheusMetricsService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();
    const route = getRoutePattern(req.path);

    res.on('finish', () => {
      metrics.recordHttpRequest(req.method, route, res.statusCode, Date.now() - startTime);
    });

    next();
  };
}

export function createMetricsHandler(metrics: PrometheusMetricsService): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      res.set('Content-Type', metrics.contentType);
      res.end(await metrics.getMetrics());
    } catch (error) {
      logger.error('Failed to render metrics', { error: errorMessage(error) });
      res.status(500).end();
    }
  };
}

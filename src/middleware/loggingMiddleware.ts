/**
 * Request Logging Middleware with Correlation IDs
 * Integrates with AsyncLocalStorage so service logs carry the request context
 */

import { Request, Response, NextFunction } from 'express';
import '../types/express';
import Logger, { requestContext } from '../utils/logger';

const SENSITIVE_KEYS = ['apiKey', 'key', 'password', 'token'];

/**
 * Middleware to initialize request context and correlation IDs
 */
export const initializeRequestContext = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = Logger.generateRequestId();
  req.requestId = requestId;
  req.startTime = Date.now();
  req.correlationId = req.header('x-correlation-id') || requestId;

  const context = {
    requestId,
    correlationId: req.correlationId,
    traceId: Logger.generateTraceId(),
    endpoint: req.path,
    method: req.method,
    ip: req.ip || req.socket.remoteAddress
  };

  res.setHeader('X-Correlation-ID', req.correlationId);
  res.setHeader('X-Request-ID', requestId);

  requestContext.run(context, () => {
    next();
  });
};

/**
 * Middleware to log incoming requests and their completion
 */
export const logRequestLifecycle = (req: Request, res: Response, next: NextFunction): void => {
  const logger = Logger.getInstance();

  logger.info('Incoming request', {
    method: req.method,
    path: req.path,
    userAgent: req.headers['user-agent'],
    contentLength: req.headers['content-length'],
    contentType: req.headers['content-type']
  });

  if (req.method !== 'GET' && req.body && Object.keys(req.body).length > 0) {
    logger.debug('Request body', { body: sanitizeRequestBody(req.body) });
  }

  res.on('finish', () => {
    const duration = Date.now() - (req.startTime ?? Date.now());
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

    logger.log(level, 'Request completed', {
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${duration}ms`
    });
  });

  next();
};

/**
 * Error logging middleware, passes the error on to the response handler
 */
export const errorLoggingMiddleware = (error: Error, req: Request, res: Response, next: NextFunction): void => {
  Logger.logError(error, {
    method: req.method,
    url: req.originalUrl,
    requestId: req.requestId
  });
  next(error);
};

/**
 * Strip image payloads and secrets before a body reaches the logs
 */
export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(sanitizeRequestBody);
  }

  if (typeof body !== 'object' || body === null) {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    if (SENSITIVE_KEYS.includes(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (key === 'data' && typeof value === 'string') {
      sanitized[key] = `[${value.length} chars]`;
    } else {
      sanitized[key] = sanitizeRequestBody(value);
    }
  }
  return sanitized;
}

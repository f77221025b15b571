import { Request, Response, NextFunction, RequestHandler } from 'express';
import '../types/express';
import { ApiError } from '../types/api';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('Auth');

export function createApiKeyAuth(apiKeys: string[]): RequestHandler {
  const validApiKeys = new Set(apiKeys);

  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = req.header('x-api-key');

    if (!apiKey) {
      const error: ApiError = {
        error: {
          code: 'MISSING_API_KEY',
          message: 'API key is required. Please provide X-API-Key header.',
          requestId: req.requestId ?? Logger.generateRequestId()
        }
      };
      res.status(401).json(error);
      return;
    }

    if (!validApiKeys.has(apiKey)) {
      logger.warn('Rejected request with invalid API key', { path: req.path });
      const error: ApiError = {
        error: {
          code: 'INVALID_API_KEY',
          message: 'Invalid API key provided.',
          requestId: req.requestId ?? Logger.generateRequestId()
        }
      };
      res.status(401).json(error);
      return;
    }

    req.clientId = `client_${apiKey.substring(0, 8)}`;
    next();
  };
}

import { Request, Response, NextFunction, RequestHandler } from 'express';
import '../types/express';
import { AppConfig } from '../config';
import { ApiError } from '../types/api';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('RateLimiter');

export type RateLimitConfig = AppConfig['rateLimit'];

interface ClientWindow {
  used: number;
  resetTime: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number;
}

/**
 * Fixed-window request budget per API client.
 * A window opens on a client's first request and lasts `windowMs`.
 */
export class RateLimiter {
  private readonly windows = new Map<string, ClientWindow>();

  constructor(private readonly config: RateLimitConfig) {
    setInterval(() => this.evictExpired(Date.now()), config.cleanupIntervalMs).unref();
  }

  get limit(): number {
    return this.config.maxRequests;
  }

  check(clientId: string, now: number = Date.now()): RateLimitResult {
    const window = this.currentWindow(clientId, now);
    const allowed = window.used < this.config.maxRequests;

    if (allowed) {
      window.used += 1;
    }

    return {
      allowed,
      remaining: Math.max(0, this.config.maxRequests - window.used),
      resetTime: window.resetTime
    };
  }

  private currentWindow(clientId: string, now: number): ClientWindow {
    const existing = this.windows.get(clientId);
    if (existing && existing.resetTime >= now) {
      return existing;
    }

    const fresh: ClientWindow = { used: 0, resetTime: now + this.config.windowMs };
    this.windows.set(clientId, fresh);
    return fresh;
  }

  private evictExpired(now: number): void {
    for (const [clientId, window] of this.windows) {
      if (window.resetTime < now) {
        this.windows.delete(clientId);
      }
    }
  }
}

export function createRateLimit(config: RateLimitConfig): RequestHandler {
  const limiter = new RateLimiter(config);

  return (req: Request, res: Response, next: NextFunction): void => {
    const clientId = req.clientId || 'unknown';
    const now = Date.now();
    const result = limiter.check(clientId, now);

    res.set({
      'X-RateLimit-Limit': String(limiter.limit),
      'X-RateLimit-Remaining': String(result.remaining),
      'X-RateLimit-Reset': String(Math.ceil(result.resetTime / 1000))
    });

    if (result.allowed) {
      next();
      return;
    }

    const retryAfterSeconds = Math.max(1, Math.ceil((result.resetTime - now) / 1000));
    logger.warn('Rate limit exceeded', { clientId, retryAfterSeconds });

    const error: ApiError = {
      error: {
        code: 'RATE_LIMIT_EXCEEDED',
        message: `Rate limit of ${limiter.limit} requests exceeded. Retry in ${retryAfterSeconds} seconds.`,
        details: {
          limit: limiter.limit,
          remaining: 0,
          resetTime: new Date(result.resetTime).toISOString()
        },
        requestId: req.requestId ?? Logger.generateRequestId()
      }
    };

    res.status(429).header('Retry-After', String(retryAfterSeconds)).json(error);
  };
}

import express from 'express';
import request from 'supertest';
import { createRateLimit, RateLimiter } from '../../src/middleware/rateLimiting';
import '../../src/types/express';

describe('RateLimiter', () => {
  const config = { maxRequests: 2, windowMs: 60000, cleanupIntervalMs: 60000 };

  it('should allow requests up to the limit within a window', () => {
    const limiter = new RateLimiter(config);

    expect(limiter.check('client-a', 1000)).toEqual({ allowed: true, remaining: 1, resetTime: 61000 });
    expect(limiter.check('client-a', 2000)).toEqual({ allowed: true, remaining: 0, resetTime: 61000 });
    expect(limiter.check('client-a', 3000)).toEqual({ allowed: false, remaining: 0, resetTime: 61000 });
  });

  it('should track clients independently', () => {
    const limiter = new RateLimiter({ ...config, maxRequests: 1 });

    limiter.check('client-a', 1000);

    expect(limiter.check('client-b', 1000).allowed).toBe(true);
    expect(limiter.check('client-a', 1000).allowed).toBe(false);
  });

  it('should start a new window once the previous one expires', () => {
    const limiter = new RateLimiter({ ...config, maxRequests: 1 });

    limiter.check('client-a', 1000);

    expect(limiter.check('client-a', 61001)).toEqual({ allowed: true, remaining: 0, resetTime: 121001 });
  });
});

describe('createRateLimit', () => {
  function buildApp() {
    const app = express();
    app.use((req, _res, next) => {
      req.clientId = 'client_test';
      next();
    });
    app.use(createRateLimit({ maxRequests: 1, windowMs: 60000, cleanupIntervalMs: 60000 }));
    app.get('/ping', (_req, res) => {
      res.status(200).json({ ok: true });
    });
    return app;
  }

  it('should set rate limit headers on allowed requests', async () => {
    const response = await request(buildApp()).get('/ping').expect(200);

    expect(response.headers['x-ratelimit-limit']).toBe('1');
    expect(response.headers['x-ratelimit-remaining']).toBe('0');
  });

  it('should reject requests over the limit with a retry hint', async () => {
    const app = buildApp();

    await request(app).get('/ping').expect(200);
    const response = await request(app).get('/ping').expect(429);

    expect(response.body.error.code).toBe('RATE_LIMIT_EXCEEDED');
    expect(response.body.error.details.limit).toBe(1);
    expect(Number(response.headers['retry-after'])).toBeGreaterThanOrEqual(1);
    expect(Number(response.headers['retry-after'])).toBeLessThanOrEqual(60);
  });
});

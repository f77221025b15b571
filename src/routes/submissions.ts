/**
 * Submission Routes
 */

import { Router } from 'express';
import { AppConfig } from '../config';
import { SubmissionController } from '../controllers/submissionController';
import { createApiKeyAuth } from '../middleware/auth';
import { createRateLimit } from '../middleware/rateLimiting';
import { createSubmissionValidator } from '../middleware/submissionValidation';

export function createSubmissionRoutes(controller: SubmissionController, config: AppConfig): Router {
  const router = Router();

  // Apply authentication and rate limiting to all submission routes
  router.use(createApiKeyAuth(config.apiKeys));
  router.use(createRateLimit(config.rateLimit));

  /**
   * POST /api/v1/submissions
   *
   * Request body:
   * {
   *   fields: { roadName, district, roadType, city?, distressType, severity,
   *             distressLength?, distressWidth?, additionalNotes? },
   *   location?: { method: 'manual' | 'device', latitude, longitude, accuracy? }
   *            | { method: 'image' | 'none' },
   *   image?: { data: string, filename?: string } // base64
   * }
   */
  router.post('/', createSubmissionValidator({ maxImageBytes: config.maxImageBytes }), controller.submit);

  router.get('/form-options', controller.formOptions);

  return router;
}

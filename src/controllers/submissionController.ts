/**
 * Submission Controller
 * Handles HTTP requests for road distress submissions
 */

import { Request, Response, NextFunction } from 'express';
import '../types/express';
import { PrometheusMetricsService } from '../services/prometheusMetrics';
import { describeValidationError, recordToObject, recordToRow } from '../services/submissionAssembler';
import { SubmissionWorkflow } from '../services/submissionWorkflow';
import { ApiError, FormOptionsResponse, SubmissionResponse } from '../types/api';
import {
  DISTRESS_TYPES,
  LOCATION_METHODS,
  ROAD_TYPES,
  SEVERITY_LEVELS,
  SUBMISSION_COLUMNS,
  ValidationError
} from '../types/survey';
import { UpstreamFailureError } from '../utils/errors';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('SubmissionController');

const VALIDATION_ERROR_CODES: Record<ValidationError['kind'], string> = {
  MissingRequiredField: 'MISSING_REQUIRED_FIELD',
  InvalidNumeric: 'INVALID_NUMERIC'
};

export class SubmissionController {
  constructor(
    private readonly workflow: SubmissionWorkflow,
    private readonly metrics: PrometheusMetricsService
  ) {}

  /**
   * POST /api/v1/submissions
   */
  submit = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const startTime = Date.now();
    const requestId = req.requestId ?? Logger.generateRequestId();
    const submission = req.submission;

    if (!submission) {
      const error: ApiError = {
        error: {
          code: 'INVALID_FIELDS',
          message: 'Submission request was not validated',
          requestId
        }
      };
      res.status(400).json(error);
      return;
    }

    try {
      const outcome = await this.workflow.submit(submission);

      if (!outcome.ok) {
        this.metrics.recordSubmission('rejected');
        const error: ApiError = {
          error: {
            code: VALIDATION_ERROR_CODES[outcome.error.kind],
            message: describeValidationError(outcome.error),
            field: outcome.error.field,
            requestId
          }
        };
        res.status(400).json(error);
        return;
      }

      this.metrics.recordSubmission('accepted');
      this.metrics.recordLocationResolution(outcome.location.method, outcome.location.coordinate !== null);
      if (outcome.uploadStatus !== 'none') {
        this.metrics.recordImageUpload(outcome.uploadStatus);
      }

      const responseTime = Date.now() - startTime;
      const body: SubmissionResponse = {
        success: true,
        data: {
          record: recordToObject(outcome.record),
          row: recordToRow(outcome.record),
          location: outcome.location,
          imageUrl: outcome.imageUrl,
          warnings: outcome.warnings
        },
        meta: {
          requestId,
          responseTime,
          timestamp: new Date().toISOString()
        }
      };

      res.status(201)
        .header('X-Response-Time', `${responseTime}ms`)
        .json(body);

      logger.info('Submission stored', {
        requestId,
        locationMethod: outcome.location.method,
        warnings: outcome.warnings,
        responseTime: `${responseTime}ms`
      });
    } catch (error) {
      if (error instanceof UpstreamFailureError) {
        this.metrics.recordSubmission('storage_failure');
        logger.error('Submission storage failed', { requestId, collaborator: error.collaborator, error: error.message });
        const apiError: ApiError = {
          error: {
            code: 'STORAGE_FAILURE',
            message: 'The submission could not be stored. Please try again later.',
            requestId
          }
        };
        res.status(502).json(apiError);
        return;
      }
      next(error);
    }
  };

  /**
   * GET /api/v1/submissions/form-options
   */
  formOptions = (req: Request, res: Response): void => {
    const options: FormOptionsResponse = {
      roadTypes: ROAD_TYPES,
      distressTypes: DISTRESS_TYPES,
      severityLevels: SEVERITY_LEVELS,
      locationMethods: LOCATION_METHODS,
      columns: SUBMISSION_COLUMNS,
      requiredColumns: ['Road Name', 'District', 'Road Type', 'Distress Type', 'Severity']
    };
    res.status(200).json(options);
  };
}

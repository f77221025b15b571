/**
 * Submission Request Validation Middleware
 * Checks the request shape and decodes the attached image before the workflow runs
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import '../types/express';
import { SubmissionRequest } from '../services/submissionWorkflow';
import { ApiError } from '../types/api';
import {
  ImageAttachment,
  LOCATION_METHODS,
  LocationInput,
  LocationMethod,
  NumericColumn,
  SubmissionFields
} from '../types/survey';
import { isValidCoordinate } from '../utils/coordinateNormalizer';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('SubmissionValidation');

const TEXT_FIELDS = ['roadName', 'district', 'roadType', 'city', 'distressType', 'severity', 'additionalNotes'] as const;

const NUMERIC_FIELDS: ReadonlyArray<['distressLength' | 'distressWidth', NumericColumn]> = [
  ['distressLength', 'Distress Length (m)'],
  ['distressWidth', 'Distress Width (m)']
];

const DATA_URL_PREFIX = /^data:[\w/+.-]+;base64,/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export class RequestValidationError extends Error {
  constructor(readonly code: string, message: string, readonly field?: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export interface SubmissionValidationOptions {
  maxImageBytes: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function parseFields(raw: unknown): SubmissionFields {
  if (!isRecord(raw)) {
    throw new RequestValidationError('INVALID_FIELDS', 'fields must be an object');
  }

  const fields: SubmissionFields = {};

  for (const key of TEXT_FIELDS) {
    const value = raw[key];
    if (isBlank(value)) {
      continue;
    }
    if (typeof value !== 'string') {
      throw new RequestValidationError('INVALID_FIELDS', `${key} must be a string`, key);
    }
    fields[key] = value;
  }

  for (const [key, column] of NUMERIC_FIELDS) {
    const value = raw[key];
    if (isBlank(value)) {
      continue;
    }
    const numeric = typeof value === 'string' ? Number(value.trim()) : value;
    if (typeof numeric !== 'number' || !Number.isFinite(numeric)) {
      throw new RequestValidationError('INVALID_NUMERIC', `${column} must be a number`, column);
    }
    fields[key] = numeric;
  }

  return fields;
}

function isLocationMethod(value: unknown): value is LocationMethod {
  return LOCATION_METHODS.some(method => method === value);
}

function parseLocation(raw: unknown): LocationInput {
  if (raw === undefined || raw === null) {
    return { method: 'none' };
  }

  if (!isRecord(raw) || !isLocationMethod(raw.method)) {
    throw new RequestValidationError(
      'INVALID_LOCATION',
      `location.method must be one of ${LOCATION_METHODS.join(', ')}`
    );
  }

  const method = raw.method;

  if (method === 'manual' || method === 'device') {
    const { latitude, longitude } = raw;

    if (typeof latitude !== 'number' || typeof longitude !== 'number' || !isValidCoordinate(latitude, longitude)) {
      throw new RequestValidationError(
        'INVALID_COORDINATES',
        'Coordinates must be numbers with latitude between -90 and 90 and longitude between -180 and 180'
      );
    }

    if (method === 'manual') {
      return { method, latitude, longitude };
    }

    const { accuracy } = raw;
    if (accuracy !== undefined && (typeof accuracy !== 'number' || !Number.isFinite(accuracy) || accuracy < 0)) {
      throw new RequestValidationError('INVALID_LOCATION', 'location.accuracy must be a non-negative number');
    }
    return accuracy === undefined ? { method, latitude, longitude } : { method, latitude, longitude, accuracy };
  }

  return { method };
}

function parseImage(raw: unknown, maxImageBytes: number): ImageAttachment | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }

  if (!isRecord(raw) || typeof raw.data !== 'string') {
    throw new RequestValidationError('INVALID_IMAGE', 'image.data must be a base64 string');
  }

  const encoded = raw.data.replace(DATA_URL_PREFIX, '').replace(/\s/g, '');
  if (!BASE64_PATTERN.test(encoded)) {
    throw new RequestValidationError('INVALID_IMAGE', 'image.data must be a base64 string');
  }

  const data = Buffer.from(encoded, 'base64');
  if (data.length === 0) {
    throw new RequestValidationError('INVALID_IMAGE', 'image.data is empty');
  }
  if (data.length > maxImageBytes) {
    throw new RequestValidationError('INVALID_IMAGE', `image exceeds the ${maxImageBytes} byte limit`);
  }

  const { filename } = raw;
  if (filename !== undefined && typeof filename !== 'string') {
    throw new RequestValidationError('INVALID_IMAGE', 'image.filename must be a string');
  }

  return filename === undefined ? { data } : { data, filename };
}

/**
 * Parse an untrusted request body into a submission request.
 */
export function parseSubmissionRequest(body: unknown, options: SubmissionValidationOptions): SubmissionRequest {
  if (!isRecord(body)) {
    throw new RequestValidationError('INVALID_FIELDS', 'Request body must be a JSON object');
  }

  const fields = parseFields(body.fields);
  const location = parseLocation(body.location);
  const image = parseImage(body.image, options.maxImageBytes);

  if (location.method === 'image' && !image) {
    throw new RequestValidationError('IMAGE_REQUIRED', 'An image is required when location.method is image');
  }

  return image ? { fields, location, image } : { fields, location };
}

export function createSubmissionValidator(options: SubmissionValidationOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = req.requestId ?? Logger.generateRequestId();

    try {
      req.submission = parseSubmissionRequest(req.body, options);
      logger.debug('Submission request validation passed', {
        requestId,
        locationMethod: req.submission.location.method,
        hasImage: req.submission.image !== undefined
      });
      next();
    } catch (error) {
      if (!(error instanceof RequestValidationError)) {
        next(error);
        return;
      }

      const apiError: ApiError = {
        error: {
          code: error.code,
          message: error.message,
          requestId
        }
      };
      if (error.field) {
        apiError.error.field = error.field;
      }
      res.status(400).json(apiError);
    }
  };
}

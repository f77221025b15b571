/**
 * Submission Workflow
 * Resolves the location, uploads the photograph and appends the assembled record
 */

import {
  ImageAttachment,
  LocationInput,
  ResolvedLocation,
  SubmissionFields,
  SubmissionRecord,
  SubmissionWarning,
  ValidationError
} from '../types/survey';
import { isValidCoordinate, resolveCoordinate, toDecimalPair } from '../utils/coordinateNormalizer';
import Logger from '../utils/logger';
import { GpsMetadataReader } from './exifGpsReader';
import { ImageUploader } from './imageUploadService';
import { assemble, validateFields } from './submissionAssembler';
import { RowStore } from './surveyStore';

const logger = Logger.createServiceLogger('SubmissionWorkflow');

export interface SubmissionRequest {
  fields: SubmissionFields;
  location: LocationInput;
  image?: ImageAttachment;
}

export type UploadStatus = 'uploaded' | 'failed' | 'skipped' | 'none';

export type SubmissionOutcome =
  | {
      ok: true;
      record: SubmissionRecord;
      location: ResolvedLocation;
      imageUrl: string | null;
      uploadStatus: UploadStatus;
      warnings: SubmissionWarning[];
    }
  | { ok: false; error: ValidationError };

export interface WorkflowDependencies {
  store: RowStore;
  uploader: ImageUploader;
  gpsReader: GpsMetadataReader;
}

interface LocationResult {
  location: ResolvedLocation;
  warnings: SubmissionWarning[];
}

export class SubmissionWorkflow {
  constructor(private readonly deps: WorkflowDependencies) {}

  /**
   * Validate, resolve location, upload and append one submission.
   * Field validation runs before any upload or storage call.
   * Row store failures propagate as UpstreamFailureError.
   */
  async submit(request: SubmissionRequest): Promise<SubmissionOutcome> {
    const validationError = validateFields(request.fields);
    if (validationError) {
      logger.info('Submission rejected', { reason: validationError.kind, field: validationError.field });
      return { ok: false, error: validationError };
    }

    const { location, warnings } = this.resolveLocation(request.location, request.image);

    let imageUrl: string | null = null;
    let uploadStatus: UploadStatus = 'none';

    if (request.image) {
      if (this.deps.uploader.enabled) {
        imageUrl = await this.deps.uploader.upload(request.image.data, request.image.filename);
        uploadStatus = imageUrl ? 'uploaded' : 'failed';
        if (!imageUrl) {
          warnings.push('IMAGE_UPLOAD_FAILED');
        }
      } else {
        uploadStatus = 'skipped';
        warnings.push('IMAGE_UPLOAD_DISABLED');
      }
    }

    const assembled = assemble(request.fields, location.coordinate, imageUrl);
    if (!assembled.ok) {
      return { ok: false, error: assembled.error };
    }

    logger.info('Submitting road distress record', {
      locationMethod: location.method,
      hasCoordinate: location.coordinate !== null,
      hasImageUrl: imageUrl !== null
    });

    await this.deps.store.appendRow(assembled.value);

    return {
      ok: true,
      record: assembled.value,
      location,
      imageUrl,
      uploadStatus,
      warnings
    };
  }

  private resolveLocation(input: LocationInput, image: ImageAttachment | undefined): LocationResult {
    switch (input.method) {
      case 'manual':
        return this.fromDecimal(input.method, input.latitude, input.longitude);
      case 'device': {
        const result = this.fromDecimal(input.method, input.latitude, input.longitude);
        if (result.location.coordinate && input.accuracy !== undefined) {
          result.location.accuracy = input.accuracy;
        }
        return result;
      }
      case 'image':
        return image ? this.fromImage(image) : { location: { method: 'image', coordinate: null }, warnings: ['NO_GPS_DATA'] };
      case 'none':
        return { location: { method: 'none', coordinate: null }, warnings: [] };
    }
  }

  private fromDecimal(method: 'manual' | 'device', latitude: number, longitude: number): LocationResult {
    if (!isValidCoordinate(latitude, longitude)) {
      logger.warn('Coordinates out of range', { method, latitude, longitude });
      return { location: { method, coordinate: null }, warnings: ['COORDINATES_OUT_OF_RANGE'] };
    }
    return { location: { method, coordinate: { latitude, longitude } }, warnings: [] };
  }

  private fromImage(image: ImageAttachment): LocationResult {
    const result = this.deps.gpsReader.read(image.data);

    if (result.status === 'unreadable') {
      return { location: { method: 'image', coordinate: null }, warnings: ['IMAGE_UNREADABLE'] };
    }

    if (result.status === 'missing') {
      return { location: { method: 'image', coordinate: null }, warnings: ['NO_GPS_DATA'] };
    }

    const { latitude, longitude } = result.tags;
    const pair = toDecimalPair(latitude.angle, latitude.ref, longitude.angle, longitude.ref);
    const coordinate = resolveCoordinate(pair);

    logger.info('Converted image GPS coordinates', { latitude: pair.latitude, longitude: pair.longitude });

    if (coordinate) {
      return { location: { method: 'image', coordinate }, warnings: [] };
    }

    let warning: SubmissionWarning = 'NO_GPS_DATA';
    if (pair.latitude !== null && pair.longitude !== null) {
      warning = 'COORDINATES_OUT_OF_RANGE';
    } else if (pair.latitude !== null || pair.longitude !== null) {
      warning = 'PARTIAL_GPS_DATA';
    }
    return { location: { method: 'image', coordinate: null }, warnings: [warning] };
  }
}

/**
 * EXIF GPS Reader
 * Extracts raw GPS angles and hemisphere markers from photo metadata
 */

import * as ExifReader from 'exifreader';
import { GpsAxisTag, GpsTags } from '../types/survey';
import { parseGeoAngle, parseHemisphereRef } from '../utils/coordinateNormalizer';
import { errorMessage } from '../utils/errors';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('ExifGpsReader');

export type GpsReadResult =
  | { status: 'found'; tags: GpsTags }
  | { status: 'missing' }
  | { status: 'unreadable'; error: string };

export type MetadataParser = (image: Buffer) => object;

export interface GpsMetadataReader {
  read(image: Buffer): GpsReadResult;
}

const GPS_TAG_NAMES = {
  LATITUDE: 'GPSLatitude',
  LATITUDE_REF: 'GPSLatitudeRef',
  LONGITUDE: 'GPSLongitude',
  LONGITUDE_REF: 'GPSLongitudeRef'
} as const;

// Copy into a standalone ArrayBuffer; pooled Buffers share a larger backing store
const parseWithExifReader: MetadataParser = (image) => ExifReader.load(Uint8Array.from(image).buffer);

function tagValue(tag: unknown): unknown {
  if (typeof tag === 'object' && tag !== null && 'value' in tag) {
    return tag.value;
  }
  return undefined;
}

export class ExifGpsReader implements GpsMetadataReader {
  constructor(private readonly parse: MetadataParser = parseWithExifReader) {}

  read(image: Buffer): GpsReadResult {
    logger.debug('Starting GPS extraction from image', { size: image.length });

    let tags: Map<string, unknown>;
    try {
      tags = new Map<string, unknown>(Object.entries(this.parse(image)));
    } catch (error) {
      if (error instanceof Error && error.name === 'MetadataMissingError') {
        logger.info('Image carries no metadata');
        return { status: 'missing' };
      }
      logger.warn('Failed to read image metadata', { error: errorMessage(error) });
      return { status: 'unreadable', error: errorMessage(error) };
    }

    const rawLatitude = tagValue(tags.get(GPS_TAG_NAMES.LATITUDE));
    const rawLongitude = tagValue(tags.get(GPS_TAG_NAMES.LONGITUDE));

    if (rawLatitude === undefined && rawLongitude === undefined) {
      logger.info('No GPS information found in image metadata');
      return { status: 'missing' };
    }

    const latitude: GpsAxisTag = {
      angle: parseGeoAngle(rawLatitude),
      ref: parseHemisphereRef(tagValue(tags.get(GPS_TAG_NAMES.LATITUDE_REF)))
    };
    const longitude: GpsAxisTag = {
      angle: parseGeoAngle(rawLongitude),
      ref: parseHemisphereRef(tagValue(tags.get(GPS_TAG_NAMES.LONGITUDE_REF)))
    };

    logger.debug('GPS tags extracted', {
      latitudeRef: latitude.ref,
      longitudeRef: longitude.ref,
      hasLatitude: latitude.angle !== null,
      hasLongitude: longitude.angle !== null
    });

    return { status: 'found', tags: { latitude, longitude } };
  }
}

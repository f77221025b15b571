/**
 * Road Distress Survey Type Definitions
 * Coordinate, record and validation types shared by the normalizer, assembler and workflow
 */

// Coordinate Types
export interface Rational {
  numerator: number;
  denominator: number;
}

/**
 * Degrees/minutes/seconds angle as stored in photo metadata.
 * Components are kept as rationals so metadata fractions stay exact until conversion.
 */
export interface GeoAngle {
  degrees: Rational;
  minutes: Rational;
  seconds: Rational;
}

export enum HemisphereRef {
  NORTH = 'N',
  SOUTH = 'S',
  EAST = 'E',
  WEST = 'W'
}

export interface DecimalCoordinate {
  latitude: number;
  longitude: number;
}

// Result of converting each axis on its own; either side may be missing
export interface DecimalCoordinatePair {
  latitude: number | null;
  longitude: number | null;
}

export interface GpsAxisTag {
  angle: GeoAngle | null;
  ref: HemisphereRef | null;
}

export interface GpsTags {
  latitude: GpsAxisTag;
  longitude: GpsAxisTag;
}

// Submission Types
export const SUBMISSION_COLUMNS = [
  'Road Name',
  'District',
  'Road Type',
  'City',
  'Distress Type',
  'Severity',
  'Distress Length (m)',
  'Distress Width (m)',
  'Latitude',
  'Longitude',
  'Additional Notes',
  'Image URL'
] as const;

export type SubmissionColumn = typeof SUBMISSION_COLUMNS[number];

export type RequiredColumn = 'Road Name' | 'District' | 'Road Type' | 'Distress Type' | 'Severity';

export type NumericColumn = 'Distress Length (m)' | 'Distress Width (m)';

export type CellValue = string | number;

export interface SubmissionFields {
  roadName?: string;
  district?: string;
  roadType?: string;
  city?: string;
  distressType?: string;
  severity?: string;
  distressLength?: number;
  distressWidth?: number;
  additionalNotes?: string;
}

export type SubmissionCell = readonly [SubmissionColumn, CellValue];

/**
 * Fixed-schema record, one cell per column in SUBMISSION_COLUMNS order.
 * Absent optional values are the empty string, never omitted.
 */
export interface SubmissionRecord {
  readonly cells: readonly SubmissionCell[];
}

export type ValidationError =
  | { kind: 'MissingRequiredField'; field: RequiredColumn }
  | { kind: 'InvalidNumeric'; field: NumericColumn };

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Form option lists offered to survey clients
export const ROAD_TYPES = ['Highway', 'Urban Road', 'Rural Road', 'State Highway', 'Other'] as const;
export const DISTRESS_TYPES = ['Pothole', 'Crack', 'Rutting', 'Deformation', 'Other'] as const;
export const SEVERITY_LEVELS = ['Low', 'Medium', 'High', 'Critical'] as const;

// Location Types
export type LocationMethod = 'manual' | 'device' | 'image' | 'none';

export const LOCATION_METHODS: readonly LocationMethod[] = ['manual', 'device', 'image', 'none'];

export type LocationInput =
  | { method: 'manual'; latitude: number; longitude: number }
  | { method: 'device'; latitude: number; longitude: number; accuracy?: number }
  | { method: 'image' }
  | { method: 'none' };

export interface ImageAttachment {
  data: Buffer;
  filename?: string;
}

export type SubmissionWarning =
  | 'NO_GPS_DATA'
  | 'PARTIAL_GPS_DATA'
  | 'IMAGE_UNREADABLE'
  | 'IMAGE_UPLOAD_FAILED'
  | 'IMAGE_UPLOAD_DISABLED'
  | 'COORDINATES_OUT_OF_RANGE';

export interface ResolvedLocation {
  method: LocationMethod;
  coordinate: DecimalCoordinate | null;
  accuracy?: number;
}

export const COORDINATE_BOUNDS = {
  MIN_LATITUDE: -90,
  MAX_LATITUDE: 90,
  MIN_LONGITUDE: -180,
  MAX_LONGITUDE: 180
} as const;

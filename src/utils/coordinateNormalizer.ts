import {
  COORDINATE_BOUNDS,
  DecimalCoordinate,
  DecimalCoordinatePair,
  GeoAngle,
  HemisphereRef,
  Rational
} from '../types/survey';

const MINUTES_PER_DEGREE = 60;
const SECONDS_PER_DEGREE = 3600;

const MAX_MARKER_BYTES = 32;

// Single letters as stored in the tag, plus the descriptions EXIF readers render them as
const HEMISPHERE_MARKERS: Record<string, HemisphereRef> = {
  'N': HemisphereRef.NORTH,
  'S': HemisphereRef.SOUTH,
  'E': HemisphereRef.EAST,
  'W': HemisphereRef.WEST,
  'NORTH LATITUDE': HemisphereRef.NORTH,
  'SOUTH LATITUDE': HemisphereRef.SOUTH,
  'EAST LONGITUDE': HemisphereRef.EAST,
  'WEST LONGITUDE': HemisphereRef.WEST
};

function rationalValue(rational: Rational): number | null {
  const { numerator, denominator } = rational;

  // EXIF GPS rationals are unsigned; the sign comes only from the hemisphere
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || numerator < 0 || denominator <= 0) {
    return null;
  }

  return numerator / denominator;
}

/**
 * Convert a DMS angle with its hemisphere marker into signed decimal degrees.
 * Returns null when either input is missing, a component is negative or a denominator is not positive.
 */
export function toDecimal(
  angle: GeoAngle | null | undefined,
  ref: HemisphereRef | null | undefined
): number | null {
  if (!angle || !ref) {
    return null;
  }

  const degrees = rationalValue(angle.degrees);
  const minutes = rationalValue(angle.minutes);
  const seconds = rationalValue(angle.seconds);

  if (degrees === null || minutes === null || seconds === null) {
    return null;
  }

  const decimal = degrees + minutes / MINUTES_PER_DEGREE + seconds / SECONDS_PER_DEGREE;

  return ref === HemisphereRef.SOUTH || ref === HemisphereRef.WEST ? -decimal : decimal;
}

/**
 * Convert latitude and longitude independently. A failing axis is null on its own.
 */
export function toDecimalPair(
  latAngle: GeoAngle | null | undefined,
  latRef: HemisphereRef | null | undefined,
  lonAngle: GeoAngle | null | undefined,
  lonRef: HemisphereRef | null | undefined
): DecimalCoordinatePair {
  return {
    latitude: toDecimal(latAngle, latRef),
    longitude: toDecimal(lonAngle, lonRef)
  };
}

export function isValidCoordinate(latitude: unknown, longitude: unknown): boolean {
  if (typeof latitude !== 'number' || typeof longitude !== 'number') {
    return false;
  }

  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return false;
  }

  return latitude >= COORDINATE_BOUNDS.MIN_LATITUDE && latitude <= COORDINATE_BOUNDS.MAX_LATITUDE &&
    longitude >= COORDINATE_BOUNDS.MIN_LONGITUDE && longitude <= COORDINATE_BOUNDS.MAX_LONGITUDE;
}

/**
 * Collapse a per-axis pair into a point. Partial or out-of-range pairs have no location.
 */
export function resolveCoordinate(pair: DecimalCoordinatePair): DecimalCoordinate | null {
  const { latitude, longitude } = pair;

  if (latitude === null || longitude === null) {
    return null;
  }

  if (!isValidCoordinate(latitude, longitude)) {
    return null;
  }

  return { latitude, longitude };
}

/**
 * Classify a raw hemisphere marker from metadata.
 * Accepts text ('S', 'South latitude'), single-element arrays, byte strings and character codes.
 */
export function parseHemisphereRef(raw: unknown): HemisphereRef | null {
  if (typeof raw === 'string') {
    const marker = raw.replace(/\0/g, '').trim().toUpperCase();
    return Object.prototype.hasOwnProperty.call(HEMISPHERE_MARKERS, marker) ? HEMISPHERE_MARKERS[marker] : null;
  }

  if (typeof raw === 'number') {
    return Number.isInteger(raw) ? parseHemisphereRef(String.fromCharCode(raw)) : null;
  }

  if (raw instanceof Uint8Array) {
    return raw.length <= MAX_MARKER_BYTES ? parseHemisphereRef(String.fromCharCode(...raw)) : null;
  }

  if (Array.isArray(raw) && raw.length > 0) {
    return parseHemisphereRef(raw[0]);
  }

  return null;
}

export function parseRational(raw: unknown): Rational | null {
  if (typeof raw === 'number') {
    return { numerator: raw, denominator: 1 };
  }

  if (Array.isArray(raw)) {
    const [numerator, denominator] = raw;
    if (raw.length === 2 && typeof numerator === 'number' && typeof denominator === 'number') {
      return { numerator, denominator };
    }
    return null;
  }

  if (typeof raw === 'object' && raw !== null && 'numerator' in raw && 'denominator' in raw) {
    const { numerator, denominator } = raw;
    if (typeof numerator === 'number' && typeof denominator === 'number') {
      return { numerator, denominator };
    }
  }

  return null;
}

/**
 * Classify a raw three-component DMS value, e.g. [[40, 1], [26, 1], [46, 1]].
 */
export function parseGeoAngle(raw: unknown): GeoAngle | null {
  if (!Array.isArray(raw) || raw.length !== 3) {
    return null;
  }

  const degrees = parseRational(raw[0]);
  const minutes = parseRational(raw[1]);
  const seconds = parseRational(raw[2]);

  if (!degrees || !minutes || !seconds) {
    return null;
  }

  return { degrees, minutes, seconds };
}

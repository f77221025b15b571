/**
 * Submission Assembler
 * Validates surveyor input and builds the fixed-schema record handed to the row store
 */

import {
  CellValue,
  DecimalCoordinate,
  NumericColumn,
  RequiredColumn,
  Result,
  SUBMISSION_COLUMNS,
  SubmissionCell,
  SubmissionColumn,
  SubmissionFields,
  SubmissionRecord,
  ValidationError
} from '../types/survey';

const REQUIRED_FIELDS: ReadonlyArray<[RequiredColumn, keyof SubmissionFields]> = [
  ['Road Name', 'roadName'],
  ['District', 'district'],
  ['Road Type', 'roadType'],
  ['Distress Type', 'distressType'],
  ['Severity', 'severity']
];

const NUMERIC_FIELDS: ReadonlyArray<[NumericColumn, 'distressLength' | 'distressWidth']> = [
  ['Distress Length (m)', 'distressLength'],
  ['Distress Width (m)', 'distressWidth']
];

const EMPTY_CELL = '';

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim().length === 0);
}

/**
 * Check required text fields and numeric measurements. Returns the first failure in column order.
 */
export function validateFields(fields: SubmissionFields): ValidationError | null {
  for (const [column, key] of REQUIRED_FIELDS) {
    if (isBlank(fields[key])) {
      return { kind: 'MissingRequiredField', field: column };
    }
  }

  for (const [column, key] of NUMERIC_FIELDS) {
    const value = fields[key];
    if (value === undefined) {
      continue;
    }
    if (!Number.isFinite(value) || value < 0) {
      return { kind: 'InvalidNumeric', field: column };
    }
  }

  return null;
}

export function assemble(
  fields: SubmissionFields,
  coordinate: DecimalCoordinate | null | undefined,
  imageUrl: string | null | undefined
): Result<SubmissionRecord, ValidationError> {
  const error = validateFields(fields);
  if (error) {
    return { ok: false, error };
  }

  const values: Record<SubmissionColumn, CellValue> = {
    'Road Name': fields.roadName?.trim() ?? EMPTY_CELL,
    'District': fields.district?.trim() ?? EMPTY_CELL,
    'Road Type': fields.roadType?.trim() ?? EMPTY_CELL,
    'City': fields.city?.trim() ?? EMPTY_CELL,
    'Distress Type': fields.distressType?.trim() ?? EMPTY_CELL,
    'Severity': fields.severity?.trim() ?? EMPTY_CELL,
    'Distress Length (m)': fields.distressLength ?? EMPTY_CELL,
    'Distress Width (m)': fields.distressWidth ?? EMPTY_CELL,
    'Latitude': coordinate?.latitude ?? EMPTY_CELL,
    'Longitude': coordinate?.longitude ?? EMPTY_CELL,
    'Additional Notes': fields.additionalNotes ?? EMPTY_CELL,
    'Image URL': imageUrl ?? EMPTY_CELL
  };

  const cells: SubmissionCell[] = SUBMISSION_COLUMNS.map(column => Object.freeze([column, values[column]] as const));

  return { ok: true, value: Object.freeze({ cells: Object.freeze(cells) }) };
}

export function recordToRow(record: SubmissionRecord): CellValue[] {
  return record.cells.map(([, value]) => value);
}

export function recordToObject(record: SubmissionRecord): Record<string, CellValue> {
  return Object.fromEntries(record.cells);
}

export function describeValidationError(error: ValidationError): string {
  switch (error.kind) {
    case 'MissingRequiredField':
      return `${error.field} is required`;
    case 'InvalidNumeric':
      return `${error.field} must be a non-negative number`;
  }
}

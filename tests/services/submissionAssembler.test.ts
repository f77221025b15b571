import {
  assemble,
  describeValidationError,
  recordToObject,
  recordToRow,
  validateFields
} from '../../src/services/submissionAssembler';
import { SUBMISSION_COLUMNS, SubmissionFields } from '../../src/types/survey';
import { validFields } from '../helpers/fakes';

describe('SubmissionAssembler', () => {
  const minimalFields: SubmissionFields = {
    roadName: 'Main St',
    district: 'Central',
    roadType: 'Highway',
    distressType: 'Pothole',
    severity: 'High'
  };

  describe('assemble', () => {
    it('should fill absent optional values with empty cells in column order', () => {
      const result = assemble(minimalFields, null, null);

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.value.cells.map(([column]) => column)).toEqual([...SUBMISSION_COLUMNS]);
      expect(recordToRow(result.value)).toEqual([
        'Main St', 'Central', 'Highway', '', 'Pothole', 'High', '', '', '', '', '', ''
      ]);
      expect(recordToObject(result.value)).toMatchObject({
        'Latitude': '',
        'Longitude': '',
        'Image URL': ''
      });
    });

    it('should place coordinate, measurements and image URL in their columns', () => {
      const result = assemble(
        validFields,
        { latitude: 40.446111, longitude: -79.982222 },
        'https://i.ibb.co/test/pothole.jpg'
      );

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(recordToRow(result.value)).toEqual([
        'Main St',
        'Central',
        'Highway',
        'Springfield',
        'Pothole',
        'High',
        1.5,
        0.75,
        40.446111,
        -79.982222,
        'Near the bus stop',
        'https://i.ibb.co/test/pothole.jpg'
      ]);
    });

    it('should keep zero measurements rather than blanking them', () => {
      const result = assemble({ ...minimalFields, distressLength: 0, distressWidth: 0 }, undefined, undefined);

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const record = recordToObject(result.value);
      expect(record['Distress Length (m)']).toBe(0);
      expect(record['Distress Width (m)']).toBe(0);
    });

    it('should trim required text values', () => {
      const result = assemble({ ...minimalFields, roadName: '  Main St  ' }, null, null);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(recordToObject(result.value)['Road Name']).toBe('Main St');
    });

    it('should produce a frozen record', () => {
      const result = assemble(minimalFields, null, null);

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(Object.isFrozen(result.value)).toBe(true);
      expect(Object.isFrozen(result.value.cells)).toBe(true);
      expect(Object.isFrozen(result.value.cells[0])).toBe(true);
    });

    it('should fail with MissingRequiredField for an empty road name', () => {
      const result = assemble({ ...minimalFields, roadName: '' }, null, null);

      expect(result).toEqual({ ok: false, error: { kind: 'MissingRequiredField', field: 'Road Name' } });
    });

    it('should fail with InvalidNumeric for a negative distress length', () => {
      const result = assemble({ ...minimalFields, distressLength: -1 }, null, null);

      expect(result).toEqual({ ok: false, error: { kind: 'InvalidNumeric', field: 'Distress Length (m)' } });
    });
  });

  describe('validateFields', () => {
    it('should accept complete fields', () => {
      expect(validateFields(validFields)).toBeNull();
    });

    it('should report each required field by column name', () => {
      const cases: Array<[keyof SubmissionFields, string]> = [
        ['roadName', 'Road Name'],
        ['district', 'District'],
        ['roadType', 'Road Type'],
        ['distressType', 'Distress Type'],
        ['severity', 'Severity']
      ];

      for (const [key, column] of cases) {
        const fields: SubmissionFields = { ...minimalFields, [key]: undefined };
        expect(validateFields(fields)).toEqual({ kind: 'MissingRequiredField', field: column });
      }
    });

    it('should treat whitespace-only values as missing', () => {
      expect(validateFields({ ...minimalFields, district: '   ' })).toEqual({
        kind: 'MissingRequiredField',
        field: 'District'
      });
    });

    it('should report required fields before numeric ones', () => {
      expect(validateFields({ ...minimalFields, severity: '', distressWidth: -2 })).toEqual({
        kind: 'MissingRequiredField',
        field: 'Severity'
      });
    });

    it('should reject a negative or non-finite width', () => {
      expect(validateFields({ ...minimalFields, distressWidth: -0.1 })).toEqual({
        kind: 'InvalidNumeric',
        field: 'Distress Width (m)'
      });
      expect(validateFields({ ...minimalFields, distressWidth: NaN })).toEqual({
        kind: 'InvalidNumeric',
        field: 'Distress Width (m)'
      });
    });

    it('should not require city, measurements or notes', () => {
      expect(validateFields(minimalFields)).toBeNull();
    });
  });

  describe('describeValidationError', () => {
    it('should describe both error kinds', () => {
      expect(describeValidationError({ kind: 'MissingRequiredField', field: 'Road Name' })).toBe('Road Name is required');
      expect(describeValidationError({ kind: 'InvalidNumeric', field: 'Distress Width (m)' }))
        .toBe('Distress Width (m) must be a non-negative number');
    });
  });
});

import { buildCreateTableSql, buildInsertSql, PostgresRowStore } from '../../src/services/surveyStore';
import { assemble } from '../../src/services/submissionAssembler';
import { UpstreamFailureError } from '../../src/utils/errors';
import { validFields } from '../helpers/fakes';

describe('SurveyStore', () => {
  let mockDb: { query: jest.Mock; healthCheck: jest.Mock };

  beforeEach(() => {
    mockDb = {
      query: jest.fn().mockResolvedValue({ rows: [] }),
      healthCheck: jest.fn().mockResolvedValue({ healthy: true, latency: 3 })
    };
  });

  function buildRecord() {
    const result = assemble(validFields, { latitude: -33.8688, longitude: 151.2093 }, null);
    if (!result.ok) {
      throw new Error('fixture record failed validation');
    }
    return result.value;
  }

  describe('SQL builders', () => {
    it('should create the table with the submission columns in order', () => {
      expect(buildCreateTableSql('road_distress_data')).toBe([
        'CREATE TABLE IF NOT EXISTS road_distress_data (',
        '  id BIGSERIAL PRIMARY KEY,',
        `  "Road Name" TEXT NOT NULL DEFAULT '',`,
        `  "District" TEXT NOT NULL DEFAULT '',`,
        `  "Road Type" TEXT NOT NULL DEFAULT '',`,
        `  "City" TEXT NOT NULL DEFAULT '',`,
        `  "Distress Type" TEXT NOT NULL DEFAULT '',`,
        `  "Severity" TEXT NOT NULL DEFAULT '',`,
        `  "Distress Length (m)" TEXT NOT NULL DEFAULT '',`,
        `  "Distress Width (m)" TEXT NOT NULL DEFAULT '',`,
        `  "Latitude" TEXT NOT NULL DEFAULT '',`,
        `  "Longitude" TEXT NOT NULL DEFAULT '',`,
        `  "Additional Notes" TEXT NOT NULL DEFAULT '',`,
        `  "Image URL" TEXT NOT NULL DEFAULT '',`,
        '  submitted_at TIMESTAMPTZ NOT NULL DEFAULT NOW()',
        ')'
      ].join('\n'));
    });

    it('should insert the twelve columns with positional parameters', () => {
      expect(buildInsertSql('road_distress_data')).toBe(
        'INSERT INTO road_distress_data ("Road Name", "District", "Road Type", "City", "Distress Type", ' +
        '"Severity", "Distress Length (m)", "Distress Width (m)", "Latitude", "Longitude", ' +
        '"Additional Notes", "Image URL") VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)'
      );
    });
  });

  describe('PostgresRowStore', () => {
    it('should reject unsafe table names', () => {
      expect(() => new PostgresRowStore(mockDb, 'data; DROP TABLE x')).toThrow('Invalid survey table name');
    });

    it('should create the table once and append rows in column order', async () => {
      const store = new PostgresRowStore(mockDb, 'road_distress_data');

      await store.appendRow(buildRecord());
      await store.appendRow(buildRecord());

      expect(mockDb.query).toHaveBeenCalledTimes(3);
      expect(mockDb.query.mock.calls[0][0]).toContain('CREATE TABLE IF NOT EXISTS road_distress_data');
      expect(mockDb.query.mock.calls[1]).toEqual([
        buildInsertSql('road_distress_data'),
        [
          'Main St',
          'Central',
          'Highway',
          'Springfield',
          'Pothole',
          'High',
          '1.5',
          '0.75',
          '-33.8688',
          '151.2093',
          'Near the bus stop',
          ''
        ]
      ]);
    });

    it('should wrap insert failures as upstream failures', async () => {
      const store = new PostgresRowStore(mockDb, 'road_distress_data');
      mockDb.query
        .mockResolvedValueOnce({ rows: [] })
        .mockRejectedValueOnce(new Error('connection terminated'));

      const append = store.appendRow(buildRecord());

      await expect(append).rejects.toBeInstanceOf(UpstreamFailureError);
      await expect(append).rejects.toThrow('Failed to append row to road_distress_data: connection terminated');
    });

    it('should retry table creation after a failed attempt', async () => {
      const store = new PostgresRowStore(mockDb, 'road_distress_data');
      mockDb.query.mockRejectedValueOnce(new Error('database is starting up'));

      await expect(store.ensureTable()).rejects.toThrow('Failed to prepare table road_distress_data: database is starting up');
      await expect(store.ensureTable()).resolves.toBeUndefined();
      expect(mockDb.query).toHaveBeenCalledTimes(2);
    });

    it('should delegate health checks to the database', async () => {
      const store = new PostgresRowStore(mockDb, 'road_distress_data');

      await expect(store.healthCheck()).resolves.toEqual({ healthy: true, latency: 3 });
    });
  });
});

/**
 * Survey Row Store
 * Appends assembled submissions to a PostgreSQL table whose columns follow the submission schema
 */

import { DatabaseHealth } from '../config/database';
import { SUBMISSION_COLUMNS, SubmissionRecord } from '../types/survey';
import { UpstreamFailureError, errorMessage } from '../utils/errors';
import Logger from '../utils/logger';

const logger = Logger.createServiceLogger('SurveyStore');

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface SqlExecutor {
  query(text: string, params?: unknown[]): Promise<unknown>;
  healthCheck(): Promise<DatabaseHealth>;
}

export interface RowStore {
  ensureTable(): Promise<void>;
  appendRow(record: SubmissionRecord): Promise<void>;
  healthCheck(): Promise<DatabaseHealth>;
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function buildCreateTableSql(tableName: string): string {
  const columns = SUBMISSION_COLUMNS.map(column => `  ${quoteIdentifier(column)} TEXT NOT NULL DEFAULT ''`);

  return [
    `CREATE TABLE IF NOT EXISTS ${tableName} (`,
    '  id BIGSERIAL PRIMARY KEY,',
    `${columns.join(',\n')},`,
    '  submitted_at TIMESTAMPTZ NOT NULL DEFAULT NOW()',
    ')'
  ].join('\n');
}

export function buildInsertSql(tableName: string): string {
  const columns = SUBMISSION_COLUMNS.map(quoteIdentifier).join(', ');
  const placeholders = SUBMISSION_COLUMNS.map((_, index) => `$${index + 1}`).join(', ');

  return `INSERT INTO ${tableName} (${columns}) VALUES (${placeholders})`;
}

export class PostgresRowStore implements RowStore {
  private readonly createTableSql: string;
  private readonly insertSql: string;
  private tableReady: Promise<void> | null = null;

  constructor(private readonly db: SqlExecutor, private readonly tableName: string) {
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new Error(`Invalid survey table name: ${tableName}`);
    }
    this.createTableSql = buildCreateTableSql(tableName);
    this.insertSql = buildInsertSql(tableName);
  }

  /**
   * Create the survey table with the submission columns if it does not exist yet.
   */
  ensureTable(): Promise<void> {
    if (!this.tableReady) {
      this.tableReady = this.db.query(this.createTableSql)
        .then(() => {
          logger.info('Survey table ready', { table: this.tableName });
        })
        .catch((error: unknown) => {
          this.tableReady = null;
          throw new UpstreamFailureError('row-store', `Failed to prepare table ${this.tableName}: ${errorMessage(error)}`, error);
        });
    }
    return this.tableReady;
  }

  async appendRow(record: SubmissionRecord): Promise<void> {
    await this.ensureTable();

    const values = SUBMISSION_COLUMNS.map(column => {
      const cell = record.cells.find(([name]) => name === column);
      return cell ? String(cell[1]) : '';
    });

    try {
      await this.db.query(this.insertSql, values);
    } catch (error) {
      throw new UpstreamFailureError('row-store', `Failed to append row to ${this.tableName}: ${errorMessage(error)}`, error);
    }

    logger.info('Submission row appended', { table: this.tableName });
  }

  healthCheck(): Promise<DatabaseHealth> {
    return this.db.healthCheck();
  }
}

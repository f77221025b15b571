/**
 * Database configuration with connection pooling for the survey row store
 */

import { Pool, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import Logger from '../utils/logger';
import { DatabaseConfig } from './index';

const logger = Logger.createServiceLogger('Database');

export interface DatabaseMetrics {
  totalConnections: number;
  idleConnections: number;
  waitingClients: number;
  totalQueries: number;
  avgQueryTime: number;
  slowQueries: number;
}

export interface DatabaseHealth {
  healthy: boolean;
  latency: number;
  error?: string;
}

export class DatabaseManager {
  private pool: Pool;
  private totalQueries = 0;
  private slowQueries = 0;
  private queryTimes: number[] = [];
  private readonly SLOW_QUERY_THRESHOLD = 2000; // 2 seconds

  constructor(config: DatabaseConfig) {
    if (!config.connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }

    const poolConfig: PoolConfig = {
      connectionString: config.connectionString,
      min: config.poolMin,
      max: config.poolMax,
      idleTimeoutMillis: config.idleTimeoutMillis,
      connectionTimeoutMillis: config.connectionTimeoutMillis,
      keepAlive: true,
      application_name: 'road-distress-survey-service'
    };

    this.pool = new Pool(poolConfig);

    logger.info('Database connection pool initialized', {
      min: poolConfig.min,
      max: poolConfig.max,
      idleTimeout: poolConfig.idleTimeoutMillis,
      connectionTimeout: poolConfig.connectionTimeoutMillis
    });

    this.pool.on('connect', () => {
      logger.debug('New database connection established');
    });

    this.pool.on('error', (error: Error) => {
      logger.error('Database pool error', { error: error.message });
    });
  }

  /**
   * Execute a query with performance tracking
   */
  async query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>> {
    const startTime = Date.now();

    try {
      const result = await this.pool.query<R>(text, params);
      const duration = Date.now() - startTime;

      this.trackQueryPerformance(duration);

      if (duration > this.SLOW_QUERY_THRESHOLD) {
        logger.warn('Slow query detected', {
          duration,
          query: text.substring(0, 200),
          params: params?.length ? `${params.length} parameters` : 'no parameters'
        });
      }

      return result;
    } catch (error) {
      logger.error('Query error', {
        duration: Date.now() - startTime,
        error: error instanceof Error ? error.message : 'Unknown error',
        query: text.substring(0, 200)
      });
      throw error;
    }
  }

  private trackQueryPerformance(duration: number): void {
    this.totalQueries++;
    this.queryTimes.push(duration);

    if (duration > this.SLOW_QUERY_THRESHOLD) {
      this.slowQueries++;
    }

    // Keep only last 1000 query times for rolling average
    if (this.queryTimes.length > 1000) {
      this.queryTimes = this.queryTimes.slice(-1000);
    }
  }

  getMetrics(): DatabaseMetrics {
    const avgQueryTime = this.queryTimes.length > 0
      ? this.queryTimes.reduce((sum, time) => sum + time, 0) / this.queryTimes.length
      : 0;

    return {
      totalConnections: this.pool.totalCount,
      idleConnections: this.pool.idleCount,
      waitingClients: this.pool.waitingCount,
      totalQueries: this.totalQueries,
      avgQueryTime,
      slowQueries: this.slowQueries
    };
  }

  /**
   * Health check for database connectivity
   */
  async healthCheck(): Promise<DatabaseHealth> {
    const startTime = Date.now();

    try {
      await this.query('SELECT 1 as health_check');
      return {
        healthy: true,
        latency: Date.now() - startTime
      };
    } catch (error) {
      return {
        healthy: false,
        latency: Date.now() - startTime,
        error: error instanceof Error ? error.message : 'Unknown error'
      };
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Database connection pool closed');
  }
}

export function createDatabase(config: DatabaseConfig): DatabaseManager {
  return new DatabaseManager(config);
}

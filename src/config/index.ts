/**
 * Application configuration read from the environment
 * dotenv is loaded by the entry point before this module is imported
 */

export interface DatabaseConfig {
  connectionString?: string;
  poolMin: number;
  poolMax: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  tableName: string;
}

export interface ImageHostConfig {
  apiKey: string;
  uploadUrl: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  environment: string;
  corsOrigin: string;
  apiKeys: string[];
  rateLimit: {
    maxRequests: number;
    windowMs: number;
    cleanupIntervalMs: number;
  };
  maxImageBytes: number;
  database: DatabaseConfig;
  imageHost: ImageHostConfig;
}

const DEFAULT_API_KEYS = ['dev-key-1', 'dev-key-2'];

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInt(env.PORT || '3001', 10),
    host: env.HOST || '0.0.0.0',
    environment: env.NODE_ENV || 'development',
    corsOrigin: env.CORS_ORIGIN || '*',
    apiKeys: parseList(env.API_KEYS, DEFAULT_API_KEYS),
    rateLimit: {
      maxRequests: parseInt(env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
      windowMs: parseInt(env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
      cleanupIntervalMs: parseInt(env.RATE_LIMIT_CLEANUP_INTERVAL || '300000', 10) // 5 minutes
    },
    maxImageBytes: parseInt(env.MAX_IMAGE_BYTES || '10485760', 10), // 10MB
    database: {
      connectionString: env.DATABASE_URL,
      poolMin: parseInt(env.DB_POOL_MIN || '1', 10),
      poolMax: parseInt(env.DB_POOL_MAX || '10', 10),
      idleTimeoutMillis: parseInt(env.DB_IDLE_TIMEOUT || '30000', 10),
      connectionTimeoutMillis: parseInt(env.DB_CONNECT_TIMEOUT || '10000', 10),
      tableName: env.SURVEY_TABLE || 'road_distress_data'
    },
    imageHost: {
      apiKey: env.IMGBB_API_KEY || '',
      uploadUrl: env.IMGBB_UPLOAD_URL || 'https://api.imgbb.com/1/upload',
      timeoutMs: parseInt(env.IMGBB_TIMEOUT_MS || '15000', 10)
    }
  };
}

import fs from 'fs';
import os from 'os';
import winston from 'winston';
import { v4 as uuidv4 } from 'uuid';
import { AsyncLocalStorage } from 'async_hooks';

export interface LogContext {
  requestId?: string;
  correlationId?: string;
  traceId?: string;
  endpoint?: string;
  method?: string;
  ip?: string;
}

const SERVICE_NAME = 'road-distress-survey-service';

// Keys already shown in the dev log prefix or carried on every entry
const DEV_LOG_HIDDEN_KEYS = ['timestamp', 'level', 'message', 'service', 'serviceContext', 'version', 'environment', 'hostname', 'pid'];

// AsyncLocalStorage for request context
export const requestContext = new AsyncLocalStorage<LogContext>();

class Logger {
  private static instance: winston.Logger;
  private static logLevel = process.env.LOG_LEVEL || 'info';
  private static isProduction = process.env.NODE_ENV === 'production';

  public static getInstance(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = winston.createLogger({
        level: Logger.logLevel,
        format: winston.format.combine(
          // Add request context to all log entries
          winston.format((info) => {
            const context = requestContext.getStore();
            return context ? Object.assign(info, context) : info;
          })(),
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
          winston.format.errors({ stack: true }),
          Logger.isProduction
            ? winston.format.json()
            : winston.format.combine(
                winston.format.colorize({ all: true }),
                winston.format.printf(Logger.formatDevLog)
              )
        ),
        transports: Logger.createTransports(),
        defaultMeta: {
          service: SERVICE_NAME,
          version: process.env.npm_package_version || '1.0.0',
          environment: process.env.NODE_ENV || 'development',
          hostname: process.env.HOSTNAME || os.hostname(),
          pid: process.pid
        }
      });
    }

    return Logger.instance;
  }

  private static createTransports(): winston.transport[] {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        level: Logger.logLevel
      })
    ];

    if (Logger.isProduction || process.env.LOG_TO_FILE === 'true') {
      if (!fs.existsSync('logs')) {
        fs.mkdirSync('logs');
      }

      transports.push(
        new winston.transports.File({
          filename: 'logs/application.log',
          level: 'info',
          maxsize: 50 * 1024 * 1024, // 50MB
          maxFiles: 5,
          tailable: true
        }),
        new winston.transports.File({
          filename: 'logs/error.log',
          level: 'error',
          maxsize: 50 * 1024 * 1024, // 50MB
          maxFiles: 5,
          tailable: true
        })
      );
    }

    return transports;
  }

  private static formatDevLog(info: winston.Logform.TransformableInfo): string {
    const { timestamp, level, message, service, requestId, ...meta } = info;

    let logLine = `${String(timestamp)} [${level}]`;

    if (typeof service === 'string' && service !== SERVICE_NAME) {
      logLine += ` [${service}]`;
    }

    if (typeof requestId === 'string') {
      logLine += ` [${requestId.substring(0, 8)}...]`;
    }

    logLine += ` ${String(message)}`;

    const cleanMeta = Object.keys(meta).reduce<Record<string, unknown>>((acc, key) => {
      if (!DEV_LOG_HIDDEN_KEYS.includes(key)) {
        acc[key] = meta[key];
      }
      return acc;
    }, {});

    if (Object.keys(cleanMeta).length > 0) {
      logLine += ` ${JSON.stringify(cleanMeta)}`;
    }

    return logLine;
  }

  public static createServiceLogger(serviceName: string): winston.Logger {
    return Logger.getInstance().child({
      service: serviceName,
      serviceContext: serviceName
    });
  }

  public static generateRequestId(): string {
    return uuidv4();
  }

  public static generateTraceId(): string {
    return uuidv4();
  }

  // Structured error logging
  public static logError(error: Error, context?: Record<string, unknown>): void {
    Logger.getInstance().error('Application error', {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
      ...context
    });
  }
}

export default Logger;

import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'auth', 'pwd'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: Record<string, unknown> = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = Logger.sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [new winston.transports.Console()],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  static sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else if (Array.isArray(value)) {
        sanitized[key] = value.map(item => (isPlainObject(item) ? Logger.sanitizeMeta(item) : item));
      } else if (isPlainObject(value)) {
        sanitized[key] = Logger.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logRunStart(runId: string, timestamp: string, databaseCount: number): void {
    this.info('Backup run started', {
      operation: 'run_start',
      runId,
      timestamp,
      databaseCount,
    });
  }

  logDatabaseStart(databaseName: string, meta?: LogMeta): void {
    this.info(`Processing database: ${databaseName}`, {
      operation: 'backup_start',
      databaseName,
      ...meta,
    });
  }

  logStageTransition(databaseName: string, stage: string): void {
    this.debug(`${databaseName}: ${stage}`, {
      operation: 'stage',
      databaseName,
      stage,
    });
  }

  logBackupComplete(databaseName: string, path: string, byteSize: number, duration: number): void {
    this.info(`Backup for '${databaseName}' finished successfully`, {
      operation: 'backup_complete',
      databaseName,
      path,
      byteSize,
      duration,
      fileSizeMB: Math.round((byteSize / 1024 / 1024) * 100) / 100,
    });
  }

  logBackupFailure(databaseName: string, stage: string, cause: string, meta?: LogMeta): void {
    this.winston.error(`Backup for '${databaseName}' failed at stage '${stage}'`, {
      operation: 'backup_error',
      databaseName,
      stage,
      cause,
      ...meta,
    });
  }

  logRetentionCleanup(databaseName: string, deletedCount: number, retentionDays: number): void {
    this.info('Retention cleanup completed', {
      operation: 'retention_cleanup',
      databaseName,
      deletedCount,
      retentionDays,
    });
  }

  logRunSummary(runId: string, status: string, meta?: LogMeta): void {
    const message = `Backup run ${runId} completed with status ${status}`;
    if (status === 'success') {
      this.info(message, { operation: 'run_summary', runId, status, ...meta });
    } else {
      this.warn(message, { operation: 'run_summary', runId, status, ...meta });
    }
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Agent starting with configuration', {
      operation: 'startup',
      config: Logger.sanitizeMeta(config),
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled backup execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
    });
  }

  /**
   * Parse a configured level, falling back to INFO
   */
  static parseLevel(value: string | undefined): LogLevel {
    const candidate = value?.toLowerCase();
    const match = Object.values(LogLevel).find(level => level === candidate);
    return match ?? LogLevel.INFO;
  }
}

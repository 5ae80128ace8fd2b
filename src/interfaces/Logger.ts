export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup operations
  logRunStart(runId: string, timestamp: string, databaseCount: number): void;
  logDatabaseStart(databaseName: string, meta?: LogMeta): void;
  logStageTransition(databaseName: string, stage: string): void;
  logBackupComplete(databaseName: string, path: string, byteSize: number, duration: number): void;
  logBackupFailure(databaseName: string, stage: string, cause: string, meta?: LogMeta): void;
  logRetentionCleanup(databaseName: string, deletedCount: number, retentionDays: number): void;
  logRunSummary(runId: string, status: string, meta?: LogMeta): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(cronExpression: string): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

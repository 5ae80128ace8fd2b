import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { BackupManager, RunReport } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { formatError } from '../errors';

export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

/**
 * Runs backups on a cron schedule. A tick that fires while a run is still in
 * progress is skipped.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private backupManager: BackupManager;
  private logger: Logger;
  private currentRun: Promise<void> | null = null;

  constructor(config: CronSchedulerConfig, backupManager: BackupManager, logger: Logger) {
    this.config = config;
    this.backupManager = backupManager;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    try {
      this.task = cron.schedule(
        this.config.cronExpression,
        () => {
          this.logger.logScheduledExecution(this.config.cronExpression);
          return this.triggerRun('scheduled');
        },
        {
          scheduled: false,
          timezone: this.config.timezone || 'UTC',
        }
      );
      this.task.start();
    } catch (error) {
      this.task = null;
      throw new CronSchedulerError(
        `Failed to start cron scheduler: ${formatError(error)}`,
        'start',
        error instanceof Error ? error : undefined
      );
    }

    this.logger.info(
      `CronScheduler started with expression: ${this.config.cronExpression} (timezone: ${this.config.timezone || 'UTC'})`
    );

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup on startup');
      setImmediate(() => this.triggerRun('startup'));
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  isBackupRunning(): boolean {
    return this.currentRun !== null;
  }

  validateCronExpression(expression: string): boolean {
    try {
      return cron.validate(expression);
    } catch (error) {
      this.logger.error('Cron expression validation error', error instanceof Error ? error : undefined);
      return false;
    }
  }

  /**
   * Resolves once the run in progress, if any, has finished
   */
  async waitForIdle(): Promise<void> {
    if (this.currentRun) {
      await this.currentRun;
    }
  }

  /**
   * Start a run unless one is already in progress. Returns the run's promise,
   * which never rejects.
   */
  triggerRun(reason: string): Promise<void> {
    if (this.currentRun) {
      this.logger.warn(`Backup is already running, skipping ${reason} execution`);
      return this.currentRun;
    }

    this.currentRun = this.executeScheduledBackup(reason).finally(() => {
      this.currentRun = null;
    });
    return this.currentRun;
  }

  private async executeScheduledBackup(reason: string): Promise<void> {
    const startTime = Date.now();
    try {
      this.logger.info(`Starting ${reason} backup run`);
      const report: RunReport = await this.backupManager.executeRun();
      const failed = report.results.filter(result => result.outcome.status === 'failure').length;
      const message = `Backup run ${report.runId} finished with status ${report.status} in ${Date.now() - startTime}ms`;
      if (failed > 0) {
        this.logger.warn(message, { failed, total: report.results.length });
      } else {
        this.logger.info(message, { total: report.results.length });
      }
    } catch (error) {
      this.logger.error(
        `Backup run failed unexpectedly after ${Date.now() - startTime}ms`,
        error instanceof Error ? error : undefined,
        { cronExpression: this.config.cronExpression, timezone: this.config.timezone || 'UTC' }
      );
    }
  }
}

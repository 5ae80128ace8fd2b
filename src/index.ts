#!/usr/bin/env node
import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { BackupManager } from './clients/BackupManager';
import { BackupWriter } from './clients/BackupWriter';
import { CronScheduler } from './clients/CronScheduler';
import { DockerRuntime } from './clients/DockerRuntime';
import { HealthchecksNotifier, NoopNotifier } from './clients/HealthchecksNotifier';
import { RetentionManager } from './clients/RetentionManager';
import { StrategyDispatcher, createDefaultStrategies } from './strategies/StrategyDispatcher';
import { HealthNotifier } from './interfaces/HealthNotifier';
import { formatError } from './errors';

export enum ExitCode {
  SUCCESS = 0,
  RUN_FAILED = 1,
  CONFIGURATION_ERROR = 2,
  INITIALIZATION_ERROR = 3,
  FATAL = 7,
}

export class InitializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InitializationError';
  }
}

type Environment = Record<string, string | undefined>;

/**
 * Main application class that initializes and coordinates all components
 */
class BackupAgentApplication {
  private logger: Logger;
  private env: Environment;
  private backupManager: BackupManager | null = null;
  private cronScheduler: CronScheduler | null = null;
  private isShuttingDown = false;

  constructor(env: Environment = process.env) {
    // Reconfigured once the configuration is loaded
    this.logger = new Logger(Logger.parseLevel(env['LOG_LEVEL']));
    this.env = env;
  }

  /**
   * Load configuration, wire components and check the container runtime.
   * Throws ConfigurationError or InitializationError.
   */
  async initialize(): Promise<void> {
    this.logger.info('Database backup agent starting...');

    const config = ConfigurationManager.loadConfiguration(this.env);

    this.logger = new Logger(Logger.parseLevel(config.logLevel));
    this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

    if (config.databases.length === 0) {
      this.logger.warn('No databases configured, runs will only report health');
    }

    const runtime = new DockerRuntime(config.dockerBinary);
    const dispatcher = new StrategyDispatcher(
      createDefaultStrategies({
        pollIntervalMs: config.snapshotPollIntervalMs,
        timeoutMs: config.snapshotTimeoutSeconds * 1000,
      })
    );
    const notifier: HealthNotifier = config.healthcheckUrl
      ? new HealthchecksNotifier(config.healthcheckUrl, this.logger)
      : new NoopNotifier();

    if (!config.healthcheckUrl) {
      this.logger.info('No health check URL configured, health pings are disabled');
    }

    this.backupManager = new BackupManager(config, {
      runtime,
      dispatcher,
      writer: new BackupWriter(this.logger),
      retentionManager: new RetentionManager(this.logger),
      notifier,
      logger: this.logger,
    });

    if (!(await this.backupManager.validateConfiguration())) {
      throw new InitializationError('Container runtime is not reachable');
    }

    if (config.schedule) {
      this.cronScheduler = new CronScheduler(
        { cronExpression: config.schedule, timezone: config.timezone, runOnInit: false },
        this.backupManager,
        this.logger
      );
    }

    this.logger.info('Application initialized successfully');
  }

  isScheduled(): boolean {
    return this.cronScheduler !== null;
  }

  /**
   * Execute a single run and map its status to an exit code
   */
  async runOnce(): Promise<ExitCode> {
    if (!this.backupManager) {
      throw new InitializationError('Application not initialized. Call initialize() first.');
    }

    const report = await this.backupManager.executeRun();
    return report.status === 'success' ? ExitCode.SUCCESS : ExitCode.RUN_FAILED;
  }

  /**
   * Start the scheduler and begin scheduled backups
   */
  start(): void {
    if (!this.cronScheduler) {
      throw new InitializationError('No schedule configured. Call runOnce() instead.');
    }

    this.cronScheduler.start();
    this.logger.info('Service is now running and will execute backups according to the configured schedule');
  }

  /**
   * Stop the scheduler and wait for a run in progress to finish
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.cronScheduler) {
      if (this.cronScheduler.isRunning()) {
        this.cronScheduler.stop();
      }
      if (this.cronScheduler.isBackupRunning()) {
        this.logger.info('Waiting for the backup run in progress to finish...');
      }
      await this.cronScheduler.waitForIdle();
    }

    this.logger.info('Database backup agent shutdown completed');
  }

  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.on(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        this.shutdown()
          .then(() => process.exit(ExitCode.SUCCESS))
          .catch(error => {
            this.logger.error('Error during shutdown', error instanceof Error ? error : undefined);
            process.exit(ExitCode.FATAL);
          });
      });
    });

    process.on('uncaughtException', error => {
      this.logger.error('Uncaught exception', error);
      process.exit(ExitCode.FATAL);
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', new Error(formatError(reason)));
      process.exit(ExitCode.FATAL);
    });
  }

  /**
   * Log a start-up failure and return the exit code it maps to
   */
  reportStartupFailure(error: unknown): ExitCode {
    if (error instanceof ConfigurationError) {
      this.logger.error('Configuration error', error, error.field ? { field: error.field } : undefined);
      return ExitCode.CONFIGURATION_ERROR;
    }
    this.logger.error('Failed to initialize application', error instanceof Error ? error : undefined);
    return ExitCode.INITIALIZATION_ERROR;
  }
}

/**
 * Main entry point. Resolves with the exit code in run-once mode and with
 * null once the scheduler is running.
 */
async function main(argv: string[] = process.argv.slice(2), env: Environment = process.env): Promise<ExitCode | null> {
  const app = new BackupAgentApplication(env);

  try {
    await app.initialize();
  } catch (error) {
    return app.reportStartupFailure(error);
  }

  if (argv.includes('--once') || !app.isScheduled()) {
    return app.runOnce();
  }

  app.setupSignalHandlers();
  app.start();
  return null;
}

export { BackupAgentApplication, main };

if (require.main === module) {
  main()
    .then(code => {
      if (code !== null) {
        process.exitCode = code;
      }
    })
    .catch(error => {
      console.error('Fatal error starting application:', error);
      process.exit(ExitCode.FATAL);
    });
}

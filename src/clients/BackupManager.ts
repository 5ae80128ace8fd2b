import { basename, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { AgentConfig, DatabaseConfig } from '../interfaces/BackupConfig';
import {
  BackupManager as IBackupManager,
  BackupOutcome,
  BackupSuccess,
  DatabaseResult,
  FailureStage,
  RunReport,
} from '../interfaces/BackupManager';
import { ContainerRuntime, ExecStream } from '../interfaces/ContainerRuntime';
import { HealthNotifier } from '../interfaces/HealthNotifier';
import { Logger } from '../interfaces/Logger';
import { RetentionManager } from '../interfaces/RetentionManager';
import { StrategyDispatcher } from '../strategies/StrategyDispatcher';
import { BackupWriter } from './BackupWriter';
import { RunTimeoutError, formatError, isTimeoutError } from '../errors';
import { formatBackupTimestamp } from '../utils/timestamp';

export interface BackupManagerDependencies {
  runtime: ContainerRuntime;
  dispatcher: StrategyDispatcher;
  writer: BackupWriter;
  retentionManager: RetentionManager;
  notifier: HealthNotifier;
  logger: Logger;
  now?: () => Date;
}

type PurgeAnnotation = Pick<BackupSuccess, 'purge' | 'purgeWarning'>;

function toMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}

/**
 * Human-readable run summary, used as the body of the final health ping
 */
export function summarizeRun(report: RunReport): string {
  let newCount = 0;
  let newBytes = 0;
  let purgedCount = 0;
  let purgedBytes = 0;
  for (const { outcome } of report.results) {
    if (outcome.status === 'success') {
      newCount++;
      newBytes += outcome.byteSize;
      purgedCount += outcome.purge?.deletedCount ?? 0;
      purgedBytes += outcome.purge?.deletedBytes ?? 0;
    }
  }

  const failures = report.results.length - newCount;
  const verdict =
    report.status === 'success'
      ? 'Backup run completed successfully'
      : `Backup run failed for ${failures} of ${report.results.length} database(s)`;
  return (
    `${verdict} at ${report.timestamp}. ` +
    `New: ${newCount} files (${toMegabytes(newBytes)} MB). ` +
    `Purged: ${purgedCount} files (${toMegabytes(purgedBytes)} MB).`
  );
}

/**
 * Orchestrates one backup run: dispatch, write and purge for every configured
 * database on a bounded worker pool. A database's failure is turned into its
 * own outcome and never reaches its siblings.
 */
export class BackupManager implements IBackupManager {
  private config: AgentConfig;
  private runtime: ContainerRuntime;
  private dispatcher: StrategyDispatcher;
  private writer: BackupWriter;
  private retentionManager: RetentionManager;
  private notifier: HealthNotifier;
  private logger: Logger;
  private now: () => Date;

  constructor(config: AgentConfig, dependencies: BackupManagerDependencies) {
    this.config = config;
    this.runtime = dependencies.runtime;
    this.dispatcher = dependencies.dispatcher;
    this.writer = dependencies.writer;
    this.retentionManager = dependencies.retentionManager;
    this.notifier = dependencies.notifier;
    this.logger = dependencies.logger;
    this.now = dependencies.now ?? (() => new Date());
  }

  async executeRun(): Promise<RunReport> {
    const startedAt = this.now();
    const runId = uuidv4();
    const timestamp = formatBackupTimestamp(startedAt, this.config.timezone);
    const databases = this.config.databases;

    this.logger.logRunStart(runId, timestamp, databases.length);
    await this.notify('start', () =>
      this.notifier.start(runId, `Starting backup run at ${timestamp} for ${databases.length} database(s).`)
    );

    const timeoutMs = this.config.runTimeoutSeconds * 1000;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      this.logger.warn(`Run ${runId} exceeded ${timeoutMs}ms, cancelling unfinished backups`);
      controller.abort(new RunTimeoutError(timeoutMs));
    }, timeoutMs);

    const results = await this.runPool(databases, async database => {
      const result = await this.processDatabase(database, timestamp, controller.signal);
      await this.notify('log', () => this.notifier.log(runId, database.name, result.outcome));
      return result;
    }).finally(() => clearTimeout(timer));

    const report: RunReport = {
      runId,
      timestamp,
      startedAt,
      finishedAt: this.now(),
      status: results.every(result => result.outcome.status === 'success') ? 'success' : 'failure',
      results,
    };

    this.logSummary(report);
    const summary = summarizeRun(report);
    await this.notify('finish', () => this.notifier.finish(runId, report.status, summary));

    return report;
  }

  async validateConfiguration(): Promise<boolean> {
    try {
      this.logger.info('Checking container runtime...');
      await this.runtime.ping();
      this.logger.info('Container runtime is reachable');
      return true;
    } catch (error) {
      this.logger.error('Container runtime check failed', error instanceof Error ? error : undefined);
      return false;
    }
  }

  /**
   * Run one database through dispatch, write and purge. Never rejects.
   */
  private async processDatabase(
    database: DatabaseConfig,
    timestamp: string,
    signal: AbortSignal
  ): Promise<DatabaseResult> {
    const startTime = Date.now();
    const targetDir = join(this.config.backupRootDir, database.type, database.name);
    const base = { name: database.name, type: database.type, kind: database.kind };
    let stage: FailureStage = 'dispatch';

    this.logger.logDatabaseStart(database.name, { type: database.type, target: database.target });

    try {
      if (signal.aborted) {
        return { ...base, outcome: this.failure(database, 'dispatch', signal.reason, startTime) };
      }

      this.logger.logStageTransition(database.name, 'dispatching');
      let source: ExecStream;
      try {
        source = await this.dispatch(database, signal);
      } catch (error) {
        const cause: unknown = signal.aborted ? signal.reason : error;
        return { ...base, outcome: this.failure(database, 'dispatch', cause, startTime) };
      }

      stage = 'stream';
      this.logger.logStageTransition(database.name, 'streaming');
      const committed = await this.writer.commit(source, {
        targetDir,
        baseName: database.name,
        timestamp,
        extension: this.dispatcher.extensionFor(database.kind),
        signal,
        onWriting: () => this.logger.logStageTransition(database.name, 'writing'),
      });

      if (committed.status === 'failure') {
        this.logger.logBackupFailure(database.name, committed.stage, committed.cause, {
          timedOut: committed.timedOut,
        });
        return { ...base, outcome: committed };
      }

      stage = 'purge';
      this.logger.logStageTransition(database.name, 'purging');
      const outcome: BackupOutcome = {
        ...committed,
        ...(await this.purge(database, targetDir)),
        duration: Date.now() - startTime,
      };

      this.logger.logBackupComplete(database.name, committed.path, committed.byteSize, outcome.duration);
      return { ...base, outcome };
    } catch (error) {
      return { ...base, outcome: this.failure(database, stage, error, startTime) };
    } finally {
      this.logger.logStageTransition(database.name, 'done');
    }
  }

  /**
   * Produce the database's stream, giving up as soon as the run is cancelled.
   * A stream that arrives after cancellation is destroyed.
   */
  private dispatch(database: DatabaseConfig, signal: AbortSignal): Promise<ExecStream> {
    const produced = this.dispatcher.produce(database, this.runtime, { logger: this.logger, signal });

    return new Promise<ExecStream>((resolve, reject) => {
      const onAbort = () => {
        reject(signal.reason);
        produced.then(
          late => late.stream.destroy(),
          error =>
            this.logger.debug(`Dispatch for '${database.name}' ended after cancellation`, {
              error: formatError(error),
            })
        );
      };
      signal.addEventListener('abort', onAbort, { once: true });

      produced.then(
        source => {
          signal.removeEventListener('abort', onAbort);
          resolve(source);
        },
        error => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Purge failures only annotate an otherwise successful backup
   */
  private async purge(database: DatabaseConfig, targetDir: string): Promise<PurgeAnnotation> {
    try {
      const result = await this.retentionManager.purge(targetDir, this.config.retentionDays);
      if (this.config.retentionDays > 0) {
        this.logger.logRetentionCleanup(database.name, result.deletedCount, this.config.retentionDays);
      }
      if (result.errors.length > 0) {
        return {
          purge: result,
          purgeWarning: `${result.errors.length} file(s) could not be purged: ${result.errors.join('; ')}`,
        };
      }
      return { purge: result };
    } catch (error) {
      const purgeWarning = formatError(error);
      this.logger.warn(`Purge for '${database.name}' failed, backup is kept`, { error: purgeWarning });
      return { purgeWarning };
    }
  }

  private failure(database: DatabaseConfig, stage: FailureStage, error: unknown, startTime: number): BackupOutcome {
    const timedOut = isTimeoutError(error);
    const outcome: BackupOutcome = {
      status: 'failure',
      stage: timedOut ? 'dispatch' : stage,
      cause: formatError(error),
      timedOut,
      duration: Date.now() - startTime,
    };
    this.logger.logBackupFailure(database.name, outcome.stage, outcome.cause, { timedOut });
    return outcome;
  }

  /**
   * Health reporting is best-effort and must not fail the run
   */
  private async notify(call: string, send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (error) {
      this.logger.warn(`Health notifier '${call}' call failed`, { error: formatError(error) });
    }
  }

  /**
   * Run `worker` over `items` with at most `concurrency` in flight; results keep
   * the order of `items`
   */
  private async runPool<T, R>(items: T[], worker: (item: T) => Promise<R>): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    const size = Math.max(1, Math.min(items.length, this.config.concurrency));
    let next = 0;

    const lanes = Array.from({ length: size }, async () => {
      while (next < items.length) {
        const index = next++;
        results[index] = await worker(items[index]);
      }
    });

    await Promise.all(lanes);
    return results;
  }

  private logSummary(report: RunReport): void {
    const created: string[] = [];
    const purged: string[] = [];
    const failed: string[] = [];

    for (const { name, outcome } of report.results) {
      if (outcome.status === 'success') {
        created.push(`${basename(outcome.path)} (${toMegabytes(outcome.byteSize)} MB)`);
        purged.push(...(outcome.purge?.deletedFiles ?? []).map(file => basename(file)));
      } else {
        failed.push(`${name} (${outcome.stage}: ${outcome.cause})`);
      }
    }

    this.logger.logRunSummary(report.runId, report.status, {
      timestamp: report.timestamp,
      durationMs: report.finishedAt.getTime() - report.startedAt.getTime(),
      newFiles: created,
      purgedFiles: purged,
      failures: failed,
    });
  }
}

import { DatabaseKind, DatabaseType } from './BackupConfig';
import { RetentionResult } from './RetentionManager';

/** Pipeline stage a per-database failure is attributed to */
export type FailureStage = 'dispatch' | 'stream' | 'write' | 'purge';

/**
 * Successful backup of one database
 */
export interface BackupSuccess {
  status: 'success';

  /** Final path of the committed backup file */
  path: string;

  /** Size of the compressed file in bytes */
  byteSize: number;

  /** Duration of the backup in milliseconds */
  duration: number;

  /** Result of the retention purge that followed the commit */
  purge?: RetentionResult;

  /** Set when the purge step failed or partially failed */
  purgeWarning?: string;
}

/**
 * Failed backup of one database
 */
export interface BackupFailure {
  status: 'failure';
  stage: FailureStage;
  cause: string;

  /** True when the failure came from a timeout (snapshot poll or run deadline) */
  timedOut: boolean;

  duration: number;
}

export type BackupOutcome = BackupSuccess | BackupFailure;

export interface DatabaseResult {
  name: string;
  type: DatabaseType;
  kind: DatabaseKind;
  outcome: BackupOutcome;
}

export type RunStatus = 'success' | 'failure';

/**
 * Aggregated result of one run over all configured databases
 */
export interface RunReport {
  /** Correlates the health-check pings of this run */
  runId: string;

  /** Timestamp string embedded in this run's backup filenames */
  timestamp: string;

  startedAt: Date;
  finishedAt: Date;
  status: RunStatus;

  /** One entry per database, in configuration order */
  results: DatabaseResult[];
}

/**
 * Interface for the run orchestrator
 */
export interface BackupManager {
  /** Back up every configured database once */
  executeRun(): Promise<RunReport>;

  /** Check that the container runtime is reachable */
  validateConfiguration(): Promise<boolean>;
}

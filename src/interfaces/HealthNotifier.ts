import { BackupOutcome, RunStatus } from './BackupManager';

/**
 * Best-effort reporting of run health to an external monitor.
 * Implementations never reject; delivery problems are logged as warnings.
 */
export interface HealthNotifier {
  /** Called once per run, before any `log` */
  start(runId: string, message: string): Promise<void>;

  /** Called once per database */
  log(runId: string, databaseName: string, outcome: BackupOutcome): Promise<void>;

  /** Called once per run, after every `log` */
  finish(runId: string, status: RunStatus, summary: string): Promise<void>;
}

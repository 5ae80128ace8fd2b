/**
 * Result of a retention cleanup operation
 */
export interface RetentionResult {
  /** Number of backups that were deleted */
  deletedCount: number;

  /** Total size of the deleted backups in bytes */
  deletedBytes: number;

  /** Paths of the deleted backups */
  deletedFiles: string[];

  /** Any errors encountered during deletion */
  errors: string[];
}

/**
 * Interface for managing backup retention and cleanup
 */
export interface RetentionManager {
  /**
   * Delete backups in `dir` whose modification time is older than
   * `retentionDays`. A retention of 0 disables purging.
   */
  purge(dir: string, retentionDays: number): Promise<RetentionResult>;

  /** Check if a file modified at `modifiedAt` is past the retention threshold */
  isBackupExpired(modifiedAt: Date, retentionDays: number): boolean;
}

import { promises as fs } from 'fs';
import { join } from 'path';
import {
  RetentionManager as IRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { Logger } from '../interfaces/Logger';
import { PurgeError, errorCode, formatError, toError } from '../errors';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Deletes backups in one database's directory once their modification time is
 * past the retention threshold. Only regular files directly inside the
 * directory are considered.
 */
export class RetentionManager implements IRetentionManager {
  private logger: Logger;
  private now: () => Date;

  constructor(logger: Logger, now: () => Date = () => new Date()) {
    this.logger = logger;
    this.now = now;
  }

  async purge(dir: string, retentionDays: number): Promise<RetentionResult> {
    const result: RetentionResult = {
      deletedCount: 0,
      deletedBytes: 0,
      deletedFiles: [],
      errors: [],
    };

    if (retentionDays <= 0) {
      this.logger.debug('Backup purging is disabled', { dir, retentionDays });
      return result;
    }

    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.logger.debug(`Backup directory ${dir} does not exist, nothing to purge`);
        return result;
      }
      throw new PurgeError(`Failed to list backups in ${dir}: ${formatError(error)}`, dir, toError(error));
    }

    this.logger.debug(`Purging backups older than ${retentionDays} days`, {
      dir,
      cutoff: this.cutoffFor(retentionDays).toISOString(),
    });

    for (const entry of entries) {
      const filePath = join(dir, entry);
      try {
        const stats = await fs.stat(filePath);
        if (!stats.isFile() || !this.isBackupExpired(stats.mtime, retentionDays)) {
          continue;
        }

        await fs.unlink(filePath);
        result.deletedCount++;
        result.deletedBytes += stats.size;
        result.deletedFiles.push(filePath);
        this.logger.info(`Purged old backup: ${entry}`, {
          path: filePath,
          modifiedAt: stats.mtime.toISOString(),
        });
      } catch (error) {
        const message = `Failed to purge ${filePath}: ${formatError(error)}`;
        result.errors.push(message);
        this.logger.warn(message);
      }
    }

    return result;
  }

  /**
   * Strictly older than the cutoff; a file exactly at the cutoff is kept
   */
  isBackupExpired(modifiedAt: Date, retentionDays: number): boolean {
    if (retentionDays <= 0) {
      return false;
    }
    return modifiedAt.getTime() < this.cutoffFor(retentionDays).getTime();
  }

  private cutoffFor(retentionDays: number): Date {
    return new Date(this.now().getTime() - retentionDays * DAY_MS);
  }
}

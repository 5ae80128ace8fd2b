import { createWriteStream, promises as fs } from 'fs';
import { join } from 'path';
import { pipeline } from 'stream/promises';
import { createGzip } from 'zlib';
import { v4 as uuidv4 } from 'uuid';
import { BackupOutcome, FailureStage } from '../interfaces/BackupManager';
import { ExecStream } from '../interfaces/ContainerRuntime';
import { Logger } from '../interfaces/Logger';
import {
  WriteError,
  errorCode,
  formatError,
  isStreamError,
  isTimeoutError,
  toError,
} from '../errors';
import { buildBackupFileName } from '../utils/timestamp';

export interface CommitRequest {
  /** Directory the backup is committed to; created when missing */
  targetDir: string;

  /** Database name, first part of the filename */
  baseName: string;

  /** Run timestamp, `YYYYMMDD_HHMMSS_TZ` */
  timestamp: string;

  /** Artifact extension before `.gz` */
  extension: string;

  signal?: AbortSignal;

  /** Called once the temporary file is open and bytes start landing on disk */
  onWriting?: () => void;
}

/**
 * Compresses a backup stream into a temporary file next to its final location
 * and renames it into place once the producer exited cleanly.
 */
export class BackupWriter {
  private logger: Logger;
  private compressionLevel: number;

  constructor(logger: Logger, compressionLevel: number = 6) {
    this.logger = logger;
    this.compressionLevel = compressionLevel;
  }

  async commit(source: ExecStream, request: CommitRequest): Promise<BackupOutcome> {
    const startTime = Date.now();
    const fileName = buildBackupFileName(request.baseName, request.timestamp, request.extension);
    const finalPath = join(request.targetDir, fileName);
    const tempPath = join(request.targetDir, `.${fileName}.${uuidv4()}.tmp`);

    // pipeline destroys every stream with the first error, so only the first
    // stream to emit tells which side failed
    const firstError: { side?: 'source' | 'sink' } = {};
    const markFailed = (side: 'source' | 'sink') => () => {
      if (!firstError.side) {
        firstError.side = side;
      }
    };
    const gzip = createGzip({ level: this.compressionLevel });
    source.stream.once('error', markFailed('source'));
    gzip.once('error', markFailed('sink'));

    try {
      try {
        await fs.mkdir(request.targetDir, { recursive: true });
      } catch (error) {
        throw new WriteError(
          `Failed to create backup directory ${request.targetDir}: ${formatError(error)}`,
          request.targetDir,
          toError(error)
        );
      }

      const file = createWriteStream(tempPath, { flags: 'wx' });
      file.once('error', markFailed('sink'));
      file.once('open', () => request.onWriting?.());

      await pipeline(source.stream, gzip, file, { signal: request.signal });

      // A dump tool that dies mid-way still closes stdout cleanly
      await source.wait();

      await fs.rename(tempPath, finalPath);
      const stats = await fs.stat(finalPath);
      const duration = Date.now() - startTime;

      this.logger.debug(`Committed ${finalPath}`, { byteSize: stats.size, duration });

      return {
        status: 'success',
        path: finalPath,
        byteSize: stats.size,
        duration,
      };
    } catch (error) {
      if (!source.stream.destroyed) {
        source.stream.destroy();
      }
      await this.cleanupTempFile(tempPath);

      if (request.signal?.aborted) {
        return this.failure('dispatch', formatError(request.signal.reason), startTime, true);
      }
      if (isTimeoutError(error)) {
        return this.failure('dispatch', formatError(error), startTime, true);
      }

      const fromSource =
        firstError.side === 'source' ||
        isStreamError(error) ||
        (firstError.side === undefined && errorCode(error) === 'ERR_STREAM_PREMATURE_CLOSE');
      const stage: FailureStage = fromSource ? 'stream' : 'write';
      return this.failure(stage, formatError(error), startTime, false);
    }
  }

  private failure(stage: FailureStage, cause: string, startTime: number, timedOut: boolean): BackupOutcome {
    return {
      status: 'failure',
      stage,
      cause,
      timedOut,
      duration: Date.now() - startTime,
    };
  }

  /**
   * Remove a temporary file; a file that was never created is fine
   */
  private async cleanupTempFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      this.logger.debug(`Cleaned up temporary file: ${filePath}`);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.warn(`Failed to cleanup temporary file ${filePath}`, { error: formatError(error) });
      }
    }
  }
}

import { DatabaseKind, SQLiteDatabaseConfig } from '../interfaces/BackupConfig';
import { BackupStrategy, StrategyContext } from '../interfaces/BackupStrategy';
import { ContainerRuntime, ExecStream } from '../interfaces/ContainerRuntime';

/**
 * SQLite backup: the database file itself is the artifact, copied out as-is.
 */
export class SQLiteStrategy implements BackupStrategy<SQLiteDatabaseConfig> {
  readonly kind = DatabaseKind.EMBEDDED_FILE;
  readonly extension = 'db';

  async produce(
    config: SQLiteDatabaseConfig,
    runtime: ContainerRuntime,
    context: StrategyContext
  ): Promise<ExecStream> {
    context.logger.info(`Copying '${config.pathInContainer}' from container '${config.target}'`, {
      databaseName: config.name,
    });

    return runtime.extractFile(config.target, config.pathInContainer, { signal: context.signal });
  }
}

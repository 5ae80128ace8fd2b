import { DatabaseKind, MySQLDatabaseConfig } from '../interfaces/BackupConfig';
import { BackupStrategy, StrategyContext } from '../interfaces/BackupStrategy';
import { ContainerRuntime, ExecStream } from '../interfaces/ContainerRuntime';

/**
 * MariaDB/MySQL backup through mysqldump inside the database container.
 * The default `--single-transaction` gives a consistent dump without locking.
 */
export class MySQLStrategy implements BackupStrategy<MySQLDatabaseConfig> {
  readonly kind = DatabaseKind.MYSQL_FAMILY;
  readonly extension = 'sql';

  async produce(
    config: MySQLDatabaseConfig,
    runtime: ContainerRuntime,
    context: StrategyContext
  ): Promise<ExecStream> {
    const args = [...config.dumpArgs, '-u', config.user, config.database];
    context.logger.info(`Executing ${config.dumpCommand} in container '${config.target}'`, {
      databaseName: config.name,
      args: args.join(' '),
    });

    return runtime.execStream(config.target, config.dumpCommand, args, {
      env: { MYSQL_PWD: config.password },
      signal: context.signal,
    });
  }
}

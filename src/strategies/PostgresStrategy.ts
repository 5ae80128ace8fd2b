import { DatabaseKind, PostgresDatabaseConfig } from '../interfaces/BackupConfig';
import { BackupStrategy, StrategyContext } from '../interfaces/BackupStrategy';
import { ContainerRuntime, ExecStream } from '../interfaces/ContainerRuntime';

/**
 * PostgreSQL backup through pg_dump inside the database container.
 * pg_dump always works from a single snapshot, so the dump is consistent
 * while the server keeps serving.
 */
export class PostgresStrategy implements BackupStrategy<PostgresDatabaseConfig> {
  readonly kind = DatabaseKind.POSTGRES;
  readonly extension = 'dump';

  async produce(
    config: PostgresDatabaseConfig,
    runtime: ContainerRuntime,
    context: StrategyContext
  ): Promise<ExecStream> {
    const args = [
      `--format=${config.format}`,
      ...config.dumpArgs,
      '-U',
      config.user,
      '-d',
      config.database,
    ];
    context.logger.info(`Executing ${config.dumpCommand} in container '${config.target}'`, {
      databaseName: config.name,
      args: args.join(' '),
    });

    return runtime.execStream(config.target, config.dumpCommand, args, {
      env: { PGPASSWORD: config.password },
      signal: context.signal,
    });
  }
}

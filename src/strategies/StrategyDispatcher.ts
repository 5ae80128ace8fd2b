import { DatabaseConfig, DatabaseKind } from '../interfaces/BackupConfig';
import { StrategyContext, StrategyFor } from '../interfaces/BackupStrategy';
import { ContainerRuntime, ExecStream } from '../interfaces/ContainerRuntime';
import { MySQLStrategy } from './MySQLStrategy';
import { PostgresStrategy } from './PostgresStrategy';
import { RedisStrategy, SnapshotOptions } from './RedisStrategy';
import { SQLiteStrategy } from './SQLiteStrategy';

export type StrategyMap = { [K in DatabaseKind]: StrategyFor<K> };

export function createDefaultStrategies(snapshot: SnapshotOptions): StrategyMap {
  return {
    [DatabaseKind.MYSQL_FAMILY]: new MySQLStrategy(),
    [DatabaseKind.POSTGRES]: new PostgresStrategy(),
    [DatabaseKind.EMBEDDED_FILE]: new SQLiteStrategy(),
    [DatabaseKind.MEMORY_SNAPSHOT]: new RedisStrategy(snapshot),
  };
}

/**
 * Selects the strategy for a database's kind
 */
export class StrategyDispatcher {
  private strategies: StrategyMap;

  constructor(strategies: StrategyMap) {
    this.strategies = strategies;
  }

  produce(config: DatabaseConfig, runtime: ContainerRuntime, context: StrategyContext): Promise<ExecStream> {
    switch (config.kind) {
      case DatabaseKind.MYSQL_FAMILY:
        return this.strategies[DatabaseKind.MYSQL_FAMILY].produce(config, runtime, context);
      case DatabaseKind.POSTGRES:
        return this.strategies[DatabaseKind.POSTGRES].produce(config, runtime, context);
      case DatabaseKind.EMBEDDED_FILE:
        return this.strategies[DatabaseKind.EMBEDDED_FILE].produce(config, runtime, context);
      case DatabaseKind.MEMORY_SNAPSHOT:
        return this.strategies[DatabaseKind.MEMORY_SNAPSHOT].produce(config, runtime, context);
      default:
        return assertNever(config);
    }
  }

  extensionFor(kind: DatabaseKind): string {
    return this.strategies[kind].extension;
  }
}

function assertNever(value: never): never {
  throw new Error(`Unsupported database kind: ${JSON.stringify(value)}`);
}

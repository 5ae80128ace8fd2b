import { DatabaseConfig, DatabaseKind } from './BackupConfig';
import { ContainerRuntime, ExecStream } from './ContainerRuntime';
import { Logger } from './Logger';

export interface StrategyContext {
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Turns the configuration of one database kind into a live byte stream
 */
export interface BackupStrategy<C extends DatabaseConfig = DatabaseConfig> {
  readonly kind: C['kind'];

  /** File extension of the artifact, before `.gz` */
  readonly extension: string;

  produce(config: C, runtime: ContainerRuntime, context: StrategyContext): Promise<ExecStream>;
}

export type StrategyFor<K extends DatabaseKind> = BackupStrategy<Extract<DatabaseConfig, { kind: K }>>;

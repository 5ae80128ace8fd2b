/**
 * Database kinds the agent knows how to back up. Each kind maps to exactly one
 * backup strategy.
 */
export enum DatabaseKind {
  MYSQL_FAMILY = 'mysql-family',
  POSTGRES = 'postgres',
  EMBEDDED_FILE = 'embedded-file',
  MEMORY_SNAPSHOT = 'memory-snapshot',
}

/** Database `type` values accepted in the configuration file */
export const DATABASE_TYPES = ['mariadb', 'mysql', 'postgres', 'sqlite', 'valkey', 'redis'] as const;

export type DatabaseType = (typeof DATABASE_TYPES)[number];

export type PostgresFormat = 'custom' | 'plain' | 'tar';

interface BaseDatabaseConfig {
  /** Unique across the configuration; also the backup subdirectory */
  name: string;

  /** Type as written in the configuration, used as the `<kind>` directory */
  type: DatabaseType;

  /** Container name or id the database runs in */
  target: string;
}

export interface MySQLDatabaseConfig extends BaseDatabaseConfig {
  kind: DatabaseKind.MYSQL_FAMILY;
  user: string;
  password: string;
  database: string;
  dumpArgs: string[];
  dumpCommand: string;
}

export interface PostgresDatabaseConfig extends BaseDatabaseConfig {
  kind: DatabaseKind.POSTGRES;
  user: string;
  password: string;
  database: string;
  format: PostgresFormat;
  dumpArgs: string[];
  dumpCommand: string;
}

export interface SQLiteDatabaseConfig extends BaseDatabaseConfig {
  kind: DatabaseKind.EMBEDDED_FILE;
  pathInContainer: string;
}

export interface RedisDatabaseConfig extends BaseDatabaseConfig {
  kind: DatabaseKind.MEMORY_SNAPSHOT;
  password?: string;
  snapshotPath: string;
  cliCommand: string;
}

export type DatabaseConfig =
  | MySQLDatabaseConfig
  | PostgresDatabaseConfig
  | SQLiteDatabaseConfig
  | RedisDatabaseConfig;

export interface AgentConfig {
  backupRootDir: string;
  /** Days to keep backups; 0 disables purging */
  retentionDays: number;
  healthcheckUrl?: string;
  /** IANA timezone used for backup filenames and the cron schedule */
  timezone: string;
  /** Cron expression; when absent the agent runs once and exits */
  schedule?: string;
  logLevel: string;
  dockerBinary: string;
  concurrency: number;
  runTimeoutSeconds: number;
  snapshotPollIntervalMs: number;
  snapshotTimeoutSeconds: number;
  databases: DatabaseConfig[];
}

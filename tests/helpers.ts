import { Readable } from 'stream';
import { Logger } from '../src/interfaces/Logger';
import { ExecStream } from '../src/interfaces/ContainerRuntime';
import {
  DatabaseKind,
  MySQLDatabaseConfig,
  PostgresDatabaseConfig,
  RedisDatabaseConfig,
  SQLiteDatabaseConfig,
} from '../src/interfaces/BackupConfig';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logRunStart: jest.fn(),
    logDatabaseStart: jest.fn(),
    logStageTransition: jest.fn(),
    logBackupComplete: jest.fn(),
    logBackupFailure: jest.fn(),
    logRetentionCleanup: jest.fn(),
    logRunSummary: jest.fn(),
    logConfigurationStart: jest.fn(),
    logScheduledExecution: jest.fn(),
  };
}

/**
 * ExecStream over fixed bytes; `exitError` is what wait() rejects with
 */
export function execOf(data: string | Buffer, exitError?: Error): ExecStream {
  const chunks = data.length > 0 ? [Buffer.from(data)] : [];
  return {
    stream: Readable.from(chunks),
    wait: async () => {
      if (exitError) {
        throw exitError;
      }
    },
  };
}

export function mysqlConfig(overrides: Partial<MySQLDatabaseConfig> = {}): MySQLDatabaseConfig {
  return {
    name: 'shop',
    type: 'mariadb',
    kind: DatabaseKind.MYSQL_FAMILY,
    target: 'shop-db',
    user: 'backup',
    password: 'test-secret',
    database: 'shop',
    dumpArgs: ['--single-transaction', '--skip-dump-date'],
    dumpCommand: 'mysqldump',
    ...overrides,
  };
}

export function postgresConfig(overrides: Partial<PostgresDatabaseConfig> = {}): PostgresDatabaseConfig {
  return {
    name: 'test_db',
    type: 'postgres',
    kind: DatabaseKind.POSTGRES,
    target: 'pg-container',
    user: 'postgres',
    password: 'test-secret',
    database: 'app',
    format: 'custom',
    dumpArgs: [],
    dumpCommand: 'pg_dump',
    ...overrides,
  };
}

export function sqliteConfig(overrides: Partial<SQLiteDatabaseConfig> = {}): SQLiteDatabaseConfig {
  return {
    name: 'notes',
    type: 'sqlite',
    kind: DatabaseKind.EMBEDDED_FILE,
    target: 'notes-app',
    pathInContainer: '/data/notes.db',
    ...overrides,
  };
}

export function redisConfig(overrides: Partial<RedisDatabaseConfig> = {}): RedisDatabaseConfig {
  return {
    name: 'cache',
    type: 'valkey',
    kind: DatabaseKind.MEMORY_SNAPSHOT,
    target: 'cache-container',
    snapshotPath: '/data/dump.rdb',
    cliCommand: 'valkey-cli',
    ...overrides,
  };
}

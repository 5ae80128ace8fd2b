import { existsSync, readFileSync } from 'fs';
import * as cron from 'node-cron';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { AgentConfig, DatabaseConfig, DatabaseKind } from '../interfaces/BackupConfig';
import { isValidTimezone } from '../utils/timestamp';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_CONFIG_FILE_PATH = '/app/config.yaml';

const DEFAULT_MYSQL_DUMP_ARGS = ['--single-transaction', '--skip-dump-date'];

const nameSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must start with a letter or digit and contain only letters, digits, ".", "_" or "-"');

const dumpArgsSchema = z.union([z.string(), z.array(z.string())]).optional();

const targetFields = {
  name: nameSchema,
  container_name: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
};

const mysqlEntrySchema = z.object({
  type: z.enum(['mariadb', 'mysql']),
  ...targetFields,
  user: z.string().min(1),
  password: z.string().min(1),
  database: z.string().min(1),
  dump_args: dumpArgsSchema,
  dump_command: z.string().min(1).optional(),
});

const postgresEntrySchema = z.object({
  type: z.literal('postgres'),
  ...targetFields,
  user: z.string().min(1),
  password: z.string().min(1),
  database: z.string().min(1),
  format: z.enum(['custom', 'plain', 'tar']).optional(),
  dump_args: dumpArgsSchema,
  dump_command: z.string().min(1).optional(),
});

const sqliteEntrySchema = z.object({
  type: z.literal('sqlite'),
  ...targetFields,
  path_in_container: z.string().min(1),
});

const redisEntrySchema = z.object({
  type: z.enum(['valkey', 'redis']),
  ...targetFields,
  password: z.string().optional(),
  rdb_path_in_container: z.string().min(1).optional(),
  cli_command: z.string().min(1).optional(),
});

const databaseEntrySchema = z.discriminatedUnion('type', [
  mysqlEntrySchema,
  postgresEntrySchema,
  sqliteEntrySchema,
  redisEntrySchema,
]);

type DatabaseEntry = z.infer<typeof databaseEntrySchema>;

const configFileSchema = z
  .object({
    backup_dir: z.string().min(1).optional(),
    timezone: z.string().min(1).optional(),
    purge_days: z.number().int().nonnegative().optional(),
    healthcheck_url: z.string().url().nullish(),
    schedule: z.string().min(1).optional(),
    log_level: z.string().optional(),
    docker_binary: z.string().min(1).optional(),
    concurrency: z.number().int().min(1).max(32).optional(),
    run_timeout_seconds: z.number().int().positive().optional(),
    snapshot_poll_interval_ms: z.number().int().positive().optional(),
    snapshot_timeout_seconds: z.number().int().positive().optional(),
    databases: z.array(databaseEntrySchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.databases.forEach((entry, index) => {
      if (!entry.container_name && !entry.host) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['databases', index, 'container_name'],
          message: `'${entry.name}' needs container_name or host`,
        });
      }
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['databases', index, 'name'],
          message: `duplicate database name '${entry.name}'`,
        });
      }
      seen.add(entry.name);
    });
  });

type Environment = Record<string, string | undefined>;

/**
 * Loads the agent configuration: environment variables give defaults, the
 * YAML file overrides them.
 */
export class ConfigurationManager {
  static loadConfiguration(env: Environment = process.env): AgentConfig {
    const filePath = env['CONFIG_FILE_PATH'] || DEFAULT_CONFIG_FILE_PATH;

    if (!existsSync(filePath)) {
      throw new ConfigurationError(`Configuration file not found at ${filePath}`, 'CONFIG_FILE_PATH');
    }

    let content: string;
    try {
      content = readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        'CONFIG_FILE_PATH'
      );
    }

    return ConfigurationManager.parseConfiguration(content, env);
  }

  static parseConfiguration(content: string, env: Environment = process.env): AgentConfig {
    let document: unknown;
    try {
      document = parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(
        `Error parsing YAML configuration: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = configFileSchema.safeParse(document ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.join('.');
      throw new ConfigurationError(
        `Invalid configuration: ${parsed.error.issues
          .map(item => `${item.path.join('.') || '(root)'}: ${item.message}`)
          .join('; ')}`,
        field || undefined
      );
    }
    const file = parsed.data;

    const timezone = file.timezone ?? (env['TIMEZONE'] || 'UTC');
    if (!isValidTimezone(timezone)) {
      throw new ConfigurationError(`Unknown timezone '${timezone}'`, 'timezone');
    }

    const schedule = file.schedule ?? (env['CRON_SCHEDULE'] || undefined);
    if (schedule !== undefined && !cron.validate(schedule)) {
      throw new ConfigurationError(`Schedule must be a valid cron expression: '${schedule}'`, 'schedule');
    }

    const healthcheckUrl = file.healthcheck_url ?? (env['HEALTHCHECK_URL'] || undefined);

    const config: AgentConfig = {
      backupRootDir: file.backup_dir ?? (env['BACKUP_DIR'] || '/backups'),
      retentionDays: file.purge_days ?? ConfigurationManager.parseRetentionDays(env['PURGE_DAYS']),
      timezone,
      logLevel: file.log_level ?? (env['LOG_LEVEL'] || 'info'),
      dockerBinary: file.docker_binary ?? (env['DOCKER_BINARY'] || 'docker'),
      concurrency: file.concurrency ?? 4,
      runTimeoutSeconds: file.run_timeout_seconds ?? 3600,
      snapshotPollIntervalMs: file.snapshot_poll_interval_ms ?? 1000,
      snapshotTimeoutSeconds: file.snapshot_timeout_seconds ?? 300,
      databases: file.databases.map(entry => ConfigurationManager.toDatabaseConfig(entry)),
    };

    // Add optional properties only if they exist
    if (healthcheckUrl) {
      config.healthcheckUrl = healthcheckUrl;
    }
    if (schedule) {
      config.schedule = schedule;
    }

    return config;
  }

  /**
   * Copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: AgentConfig): Record<string, unknown> {
    return {
      ...config,
      healthcheckUrl: config.healthcheckUrl ? '[REDACTED]' : undefined,
      databases: config.databases.map(database =>
        'password' in database && database.password !== undefined
          ? { ...database, password: '[REDACTED]' }
          : database
      ),
    };
  }

  private static parseRetentionDays(value: string | undefined): number {
    if (value === undefined || value === '') {
      return 7;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new ConfigurationError('PURGE_DAYS must be a non-negative integer', 'PURGE_DAYS');
    }
    return parsed;
  }

  private static toDatabaseConfig(entry: DatabaseEntry): DatabaseConfig {
    const target = entry.container_name ?? entry.host ?? '';
    const base = { name: entry.name, target };

    switch (entry.type) {
      case 'mariadb':
      case 'mysql':
        return {
          ...base,
          type: entry.type,
          kind: DatabaseKind.MYSQL_FAMILY,
          user: entry.user,
          password: entry.password,
          database: entry.database,
          dumpArgs: splitArgs(entry.dump_args, DEFAULT_MYSQL_DUMP_ARGS),
          dumpCommand: entry.dump_command ?? 'mysqldump',
        };
      case 'postgres':
        return {
          ...base,
          type: entry.type,
          kind: DatabaseKind.POSTGRES,
          user: entry.user,
          password: entry.password,
          database: entry.database,
          format: entry.format ?? 'custom',
          dumpArgs: splitArgs(entry.dump_args, []),
          dumpCommand: entry.dump_command ?? 'pg_dump',
        };
      case 'sqlite':
        return {
          ...base,
          type: entry.type,
          kind: DatabaseKind.EMBEDDED_FILE,
          pathInContainer: entry.path_in_container,
        };
      case 'valkey':
      case 'redis':
        return {
          ...base,
          type: entry.type,
          kind: DatabaseKind.MEMORY_SNAPSHOT,
          password: entry.password || undefined,
          snapshotPath: entry.rdb_path_in_container ?? '/data/dump.rdb',
          cliCommand: entry.cli_command ?? (entry.type === 'valkey' ? 'valkey-cli' : 'redis-cli'),
        };
    }
  }
}

function splitArgs(value: string | string[] | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return [...fallback];
  }
  return Array.isArray(value) ? value : value.split(/\s+/).filter(arg => arg.length > 0);
}

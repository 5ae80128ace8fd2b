import { MySQLStrategy } from '../src/strategies/MySQLStrategy';
import { PostgresStrategy } from '../src/strategies/PostgresStrategy';
import { SQLiteStrategy } from '../src/strategies/SQLiteStrategy';
import { RedisStrategy } from '../src/strategies/RedisStrategy';
import { StrategyDispatcher, createDefaultStrategies } from '../src/strategies/StrategyDispatcher';
import { ContainerRuntime } from '../src/interfaces/ContainerRuntime';
import { DatabaseKind } from '../src/interfaces/BackupConfig';
import { DumpToolError, RunTimeoutError, SnapshotTimeoutError } from '../src/errors';
import { readText } from '../src/utils/streams';
import {
  createMockLogger,
  execOf,
  mysqlConfig,
  postgresConfig,
  redisConfig,
  sqliteConfig,
} from './helpers';

function createRuntime(): jest.Mocked<ContainerRuntime> {
  return {
    ping: jest.fn(),
    execStream: jest.fn(),
    extractFile: jest.fn(),
  };
}

/**
 * Runtime answering valkey-cli commands from scripted replies
 */
function createCliRuntime(replies: { LASTSAVE: string[]; BGSAVE: string }): jest.Mocked<ContainerRuntime> {
  const runtime = createRuntime();
  const lastSaves = [...replies.LASTSAVE];
  runtime.execStream.mockImplementation(async (_target, _command, args) => {
    if (args[0] === 'BGSAVE') {
      return execOf(`${replies.BGSAVE}\n`);
    }
    const reply = lastSaves.length > 1 ? lastSaves.shift() : lastSaves[0];
    return execOf(`${reply ?? ''}\n`);
  });
  runtime.extractFile.mockResolvedValue(execOf('REDIS0011'));
  return runtime;
}

describe('backup strategies', () => {
  const logger = createMockLogger();
  const context = { logger };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('MySQLStrategy', () => {
    it('should run mysqldump with the password in MYSQL_PWD', async () => {
      const runtime = createRuntime();
      runtime.execStream.mockResolvedValue(execOf('-- dump'));

      const exec = await new MySQLStrategy().produce(mysqlConfig(), runtime, context);

      expect(await readText(exec.stream)).toBe('-- dump');
      expect(runtime.execStream).toHaveBeenCalledWith(
        'shop-db',
        'mysqldump',
        ['--single-transaction', '--skip-dump-date', '-u', 'backup', 'shop'],
        { env: { MYSQL_PWD: 'test-secret' }, signal: undefined }
      );
    });

    it('should use the configured dump command', async () => {
      const runtime = createRuntime();
      runtime.execStream.mockResolvedValue(execOf(''));

      await new MySQLStrategy().produce(
        mysqlConfig({ dumpCommand: 'mariadb-dump', dumpArgs: [] }),
        runtime,
        context
      );

      expect(runtime.execStream).toHaveBeenCalledWith(
        'shop-db',
        'mariadb-dump',
        ['-u', 'backup', 'shop'],
        expect.objectContaining({ env: { MYSQL_PWD: 'test-secret' } })
      );
    });
  });

  describe('PostgresStrategy', () => {
    it('should run pg_dump in the configured format', async () => {
      const runtime = createRuntime();
      runtime.execStream.mockResolvedValue(execOf('PGDMP'));

      await new PostgresStrategy().produce(postgresConfig({ dumpArgs: ['--no-owner'] }), runtime, context);

      expect(runtime.execStream).toHaveBeenCalledWith(
        'pg-container',
        'pg_dump',
        ['--format=custom', '--no-owner', '-U', 'postgres', '-d', 'app'],
        { env: { PGPASSWORD: 'test-secret' }, signal: undefined }
      );
    });
  });

  describe('SQLiteStrategy', () => {
    it('should extract the database file', async () => {
      const runtime = createRuntime();
      runtime.extractFile.mockResolvedValue(execOf('SQLite format 3'));

      const exec = await new SQLiteStrategy().produce(sqliteConfig(), runtime, context);

      expect(await readText(exec.stream)).toBe('SQLite format 3');
      expect(runtime.extractFile).toHaveBeenCalledWith('notes-app', '/data/notes.db', { signal: undefined });
      expect(runtime.execStream).not.toHaveBeenCalled();
    });
  });

  describe('RedisStrategy', () => {
    it('should trigger BGSAVE, wait for LASTSAVE to move and copy the snapshot', async () => {
      const runtime = createCliRuntime({
        LASTSAVE: ['1700000000', '1700000000', '1700000005'],
        BGSAVE: 'Background saving started',
      });
      const strategy = new RedisStrategy({ pollIntervalMs: 1, timeoutMs: 5000 });

      const exec = await strategy.produce(redisConfig(), runtime, context);

      expect(await readText(exec.stream)).toBe('REDIS0011');
      expect(runtime.execStream.mock.calls.map(call => call[2][0])).toEqual([
        'LASTSAVE',
        'BGSAVE',
        'LASTSAVE',
        'LASTSAVE',
      ]);
      expect(runtime.extractFile).toHaveBeenCalledWith('cache-container', '/data/dump.rdb', {
        signal: undefined,
      });
    });

    it('should pass the password as REDISCLI_AUTH', async () => {
      const runtime = createCliRuntime({
        LASTSAVE: ['100', '101'],
        BGSAVE: 'Background saving started',
      });
      const strategy = new RedisStrategy({ pollIntervalMs: 1, timeoutMs: 5000 });

      await strategy.produce(redisConfig({ password: 'test-secret' }), runtime, context);

      expect(runtime.execStream).toHaveBeenCalledWith('cache-container', 'valkey-cli', ['BGSAVE'], {
        env: { REDISCLI_AUTH: 'test-secret' },
        signal: undefined,
      });
    });

    it('should wait for a background save that is already running', async () => {
      const runtime = createCliRuntime({
        LASTSAVE: ['(integer) 100', '(integer) 101'],
        BGSAVE: 'ERR Background save already in progress',
      });
      const strategy = new RedisStrategy({ pollIntervalMs: 1, timeoutMs: 5000 });

      await strategy.produce(redisConfig(), runtime, context);

      expect(runtime.extractFile).toHaveBeenCalledTimes(1);
    });

    it('should fail when BGSAVE is rejected', async () => {
      const runtime = createCliRuntime({
        LASTSAVE: ['100'],
        BGSAVE: 'MISCONF Errors writing to the AOF file',
      });
      const strategy = new RedisStrategy({ pollIntervalMs: 1, timeoutMs: 5000 });

      const produced = strategy.produce(redisConfig(), runtime, context);

      await expect(produced).rejects.toBeInstanceOf(DumpToolError);
      await expect(produced).rejects.toThrow(
        "BGSAVE in 'cache-container' was rejected: MISCONF Errors writing to the AOF file"
      );
      expect(runtime.extractFile).not.toHaveBeenCalled();
    });

    it('should fail on an unexpected LASTSAVE reply', async () => {
      const runtime = createCliRuntime({ LASTSAVE: ['NOAUTH Authentication required.'], BGSAVE: 'OK' });
      const strategy = new RedisStrategy({ pollIntervalMs: 1, timeoutMs: 5000 });

      await expect(strategy.produce(redisConfig(), runtime, context)).rejects.toThrow(
        "Unexpected LASTSAVE reply from 'cache-container': NOAUTH Authentication required."
      );
    });

    it('should time out when the snapshot never completes', async () => {
      const runtime = createCliRuntime({ LASTSAVE: ['100'], BGSAVE: 'Background saving started' });
      let clock = 0;
      const strategy = new RedisStrategy({
        pollIntervalMs: 1,
        timeoutMs: 250,
        now: () => (clock += 100),
      });

      const produced = strategy.produce(redisConfig(), runtime, context);

      await expect(produced).rejects.toBeInstanceOf(SnapshotTimeoutError);
      await expect(produced).rejects.toThrow("Snapshot in 'cache-container' did not complete within 250ms");
      // baseline, BGSAVE and three polls
      expect(runtime.execStream).toHaveBeenCalledTimes(5);
      expect(runtime.extractFile).not.toHaveBeenCalled();
    });

    it('should stop polling when the run is cancelled', async () => {
      const runtime = createCliRuntime({ LASTSAVE: ['100'], BGSAVE: 'Background saving started' });
      const strategy = new RedisStrategy({ pollIntervalMs: 1, timeoutMs: 5000 });
      const controller = new AbortController();
      controller.abort(new RunTimeoutError(10));

      await expect(
        strategy.produce(redisConfig(), runtime, { logger, signal: controller.signal })
      ).rejects.toMatchObject({ name: 'AbortError' });
      expect(runtime.extractFile).not.toHaveBeenCalled();
    });
  });

  describe('StrategyDispatcher', () => {
    const dispatcher = new StrategyDispatcher(createDefaultStrategies({ pollIntervalMs: 1, timeoutMs: 1000 }));

    it('should route each kind to its strategy', async () => {
      const runtime = createRuntime();
      runtime.execStream.mockResolvedValue(execOf(''));
      runtime.extractFile.mockResolvedValue(execOf(''));

      await dispatcher.produce(mysqlConfig(), runtime, context);
      await dispatcher.produce(postgresConfig(), runtime, context);
      await dispatcher.produce(sqliteConfig(), runtime, context);

      expect(runtime.execStream.mock.calls.map(call => call[1])).toEqual(['mysqldump', 'pg_dump']);
      expect(runtime.extractFile).toHaveBeenCalledTimes(1);
    });

    it('should route mysql and mariadb types alike', async () => {
      const runtime = createRuntime();
      runtime.execStream.mockResolvedValue(execOf(''));

      await dispatcher.produce(mysqlConfig({ type: 'mysql' }), runtime, context);

      expect(runtime.execStream.mock.calls[0][1]).toBe('mysqldump');
    });

    it('should know the artifact extension of each kind', () => {
      expect(dispatcher.extensionFor(DatabaseKind.MYSQL_FAMILY)).toBe('sql');
      expect(dispatcher.extensionFor(DatabaseKind.POSTGRES)).toBe('dump');
      expect(dispatcher.extensionFor(DatabaseKind.EMBEDDED_FILE)).toBe('db');
      expect(dispatcher.extensionFor(DatabaseKind.MEMORY_SNAPSHOT)).toBe('rdb');
    });
  });
});

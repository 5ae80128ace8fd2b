import { DatabaseKind, RedisDatabaseConfig } from '../interfaces/BackupConfig';
import { BackupStrategy, StrategyContext } from '../interfaces/BackupStrategy';
import { ContainerRuntime, ExecStream } from '../interfaces/ContainerRuntime';
import { DumpToolError, SnapshotTimeoutError } from '../errors';
import { readText, sleep } from '../utils/streams';

export interface SnapshotOptions {
  /** Delay between two LASTSAVE polls */
  pollIntervalMs: number;

  /** Upper bound for the snapshot to complete after BGSAVE */
  timeoutMs: number;

  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}

/**
 * Valkey/Redis backup. Two-phase: trigger BGSAVE, poll LASTSAVE until it moves
 * past the value seen before the trigger, then copy the RDB file out.
 */
export class RedisStrategy implements BackupStrategy<RedisDatabaseConfig> {
  readonly kind = DatabaseKind.MEMORY_SNAPSHOT;
  readonly extension = 'rdb';

  private options: SnapshotOptions;
  private now: () => number;

  constructor(options: SnapshotOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  async produce(
    config: RedisDatabaseConfig,
    runtime: ContainerRuntime,
    context: StrategyContext
  ): Promise<ExecStream> {
    const baseline = await this.lastSave(config, runtime, context);

    const reply = await this.runCli(config, runtime, context, 'BGSAVE');
    if (/already in progress/i.test(reply)) {
      context.logger.info(`Background save already running in '${config.target}', waiting for it`, {
        databaseName: config.name,
      });
    } else if (/^(ERR|NOAUTH|WRONGPASS|MISCONF)/i.test(reply)) {
      throw new DumpToolError(`BGSAVE in '${config.target}' was rejected: ${reply}`, undefined, reply);
    } else {
      context.logger.info(`Background save triggered in '${config.target}'`, {
        databaseName: config.name,
        lastSave: baseline,
      });
    }

    await this.waitForSnapshot(config, runtime, context, baseline);

    context.logger.info(`Copying '${config.snapshotPath}' from container '${config.target}'`, {
      databaseName: config.name,
    });
    return runtime.extractFile(config.target, config.snapshotPath, { signal: context.signal });
  }

  private async waitForSnapshot(
    config: RedisDatabaseConfig,
    runtime: ContainerRuntime,
    context: StrategyContext,
    baseline: number
  ): Promise<void> {
    const deadline = this.now() + this.options.timeoutMs;

    for (;;) {
      await sleep(this.options.pollIntervalMs, context.signal);

      const current = await this.lastSave(config, runtime, context);
      if (current > baseline) {
        context.logger.debug(`Snapshot completed in '${config.target}'`, {
          databaseName: config.name,
          lastSave: current,
        });
        return;
      }

      if (this.now() >= deadline) {
        throw new SnapshotTimeoutError(config.target, this.options.timeoutMs);
      }
    }
  }

  private async lastSave(
    config: RedisDatabaseConfig,
    runtime: ContainerRuntime,
    context: StrategyContext
  ): Promise<number> {
    const reply = await this.runCli(config, runtime, context, 'LASTSAVE');
    const match = reply.match(/^(?:\(integer\)\s*)?(\d+)$/);
    if (!match) {
      throw new DumpToolError(`Unexpected LASTSAVE reply from '${config.target}': ${reply}`, undefined, reply);
    }
    return Number(match[1]);
  }

  private async runCli(
    config: RedisDatabaseConfig,
    runtime: ContainerRuntime,
    context: StrategyContext,
    command: string
  ): Promise<string> {
    const env: Record<string, string> = {};
    if (config.password) {
      env.REDISCLI_AUTH = config.password;
    }

    const exec = await runtime.execStream(config.target, config.cliCommand, [command], {
      env,
      signal: context.signal,
    });
    const output = await readText(exec.stream);
    await exec.wait();
    return output.trim();
  }
}

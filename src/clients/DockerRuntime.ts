import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { posix } from 'path';
import { PassThrough, Readable } from 'stream';
import { extract } from 'tar-stream';
import {
  ContainerRuntime,
  ExecOptions,
  ExecStream,
  ExtractOptions,
} from '../interfaces/ContainerRuntime';
import {
  ContainerError,
  ContainerNotFoundError,
  ContainerUnreachableError,
  DumpToolError,
  PathNotFoundError,
  formatError,
  toError,
} from '../errors';

/** Only the tail of stderr is kept for error messages */
const STDERR_LIMIT = 4096;

/** The part of a child process the adapter relies on */
export interface DockerProcess extends EventEmitter {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(): boolean;
}

export interface SpawnOptions {
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

export type DockerSpawner = (binary: string, args: string[], options: SpawnOptions) => DockerProcess;

export const spawnDockerProcess: DockerSpawner = (binary, args, options) =>
  spawn(binary, args, {
    stdio: ['ignore', 'pipe', 'pipe'],
    env: options.env,
    signal: options.signal,
  });

interface ProcessExit {
  code: number | null;
  stderr: string;
  error?: Error;
}

interface ProcessOutput extends ProcessExit {
  stdout: string;
}

/**
 * ContainerRuntime backed by the docker CLI. Commands run through `docker exec`
 * and files are read with `docker cp <target>:<path> -`, whose tar output is
 * unpacked on the fly.
 */
export class DockerRuntime implements ContainerRuntime {
  private binary: string;
  private spawner: DockerSpawner;

  constructor(binary: string = 'docker', spawner: DockerSpawner = spawnDockerProcess) {
    this.binary = binary;
    this.spawner = spawner;
  }

  async ping(): Promise<void> {
    const result = await this.run(['version', '--format', '{{.Server.Version}}']);
    if (result.error) {
      throw new ContainerUnreachableError('docker daemon', formatError(result.error), result.error);
    }
    if (result.code !== 0) {
      throw new ContainerUnreachableError(
        'docker daemon',
        result.stderr.trim() || `docker version exited with code ${result.code}`
      );
    }
  }

  async execStream(
    target: string,
    command: string,
    args: string[],
    options: ExecOptions = {}
  ): Promise<ExecStream> {
    await this.ensureContainer(target, true);

    const env = options.env ?? {};
    // -e NAME without a value makes docker read the value from its own environment
    const envArgs = Object.keys(env).flatMap(name => ['-e', name]);
    const child = this.spawnDocker(['exec', ...envArgs, target, command, ...args], env, options.signal);
    const exit = this.watchExit(child);

    return {
      stream: child.stdout,
      wait: async () => {
        const result = await exit;
        if (result.error) {
          throw result.error;
        }
        if (result.code !== 0) {
          throw this.classifyExecFailure(target, command, result);
        }
      },
    };
  }

  async extractFile(target: string, filePath: string, options: ExtractOptions = {}): Promise<ExecStream> {
    await this.ensureContainer(target, false);

    const child = this.spawnDocker(['cp', `${target}:${filePath}`, '-'], {}, options.signal);
    const exit = this.watchExit(child);
    const output = new PassThrough();
    const fileName = posix.basename(filePath);
    const extractor = extract();
    let found = false;
    let extracting = true;

    const settle = async (archiveError?: Error): Promise<void> => {
      extracting = false;
      const failure = await this.extractFailure(target, filePath, exit, found, archiveError);
      if (failure) {
        output.destroy(failure);
      } else {
        output.end();
      }
    };

    // The consumer went away mid-transfer: stop unpacking and end docker cp
    output.once('close', () => {
      if (!extracting) {
        return;
      }
      extracting = false;
      child.stdout.unpipe(extractor);
      extractor.destroy();
      child.stdout.resume();
      child.kill();
    });

    extractor.on('entry', (header, entry, next) => {
      const matches =
        !found &&
        header.type === 'file' &&
        (header.name === fileName || header.name.endsWith(`/${fileName}`));

      entry.on('end', () => next());
      entry.on('error', (error: unknown) => {
        if (extracting) {
          output.destroy(toError(error));
        }
      });

      if (!matches) {
        entry.resume();
        return;
      }

      found = true;
      entry.on('data', (chunk: unknown) => {
        if (output.destroyed) {
          return;
        }
        const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        if (!output.write(data)) {
          entry.pause();
          output.once('drain', () => entry.resume());
        }
      });
    });

    extractor.on('finish', () => {
      settle().catch(error => output.destroy(toError(error)));
    });
    extractor.on('error', (error: Error) => {
      if (!extracting) {
        return;
      }
      child.stdout.unpipe(extractor);
      child.stdout.resume();
      settle(error).catch(settleError => output.destroy(toError(settleError)));
    });

    child.stdout.pipe(extractor);

    return {
      stream: output,
      wait: async () => {
        const failure = await this.extractFailure(target, filePath, exit, found);
        if (failure) {
          throw failure;
        }
      },
    };
  }

  /**
   * Verify the target exists and, for exec, that it is running
   */
  private async ensureContainer(target: string, requireRunning: boolean): Promise<void> {
    const result = await this.run([
      'inspect',
      '--type',
      'container',
      '--format',
      '{{.State.Running}}',
      target,
    ]);

    if (result.error) {
      throw new ContainerUnreachableError(target, formatError(result.error), result.error);
    }

    if (result.code !== 0) {
      if (/no such (object|container)/i.test(result.stderr)) {
        throw new ContainerNotFoundError(target);
      }
      throw new ContainerUnreachableError(
        target,
        result.stderr.trim() || `docker inspect exited with code ${result.code}`
      );
    }

    if (requireRunning && result.stdout.trim() !== 'true') {
      throw new ContainerUnreachableError(target, 'container is not running');
    }
  }

  private async extractFailure(
    target: string,
    filePath: string,
    exit: Promise<ProcessExit>,
    found: boolean,
    archiveError?: Error
  ): Promise<Error | undefined> {
    const result = await exit;
    if (result.error) {
      return result.error;
    }
    if (result.code === null) {
      return new DumpToolError(`docker cp of '${filePath}' was terminated before it finished`, undefined, result.stderr);
    }
    if (result.code !== 0) {
      if (/no such container/i.test(result.stderr)) {
        return new ContainerNotFoundError(target);
      }
      if (/could not find the file|no such file/i.test(result.stderr)) {
        return new PathNotFoundError(target, filePath);
      }
      return new DumpToolError(
        `docker cp of '${filePath}' exited with code ${result.code}: ${result.stderr.trim()}`,
        result.code,
        result.stderr
      );
    }
    if (archiveError) {
      return new DumpToolError(
        `Failed to unpack archive of '${filePath}' from '${target}': ${archiveError.message}`,
        undefined,
        '',
        archiveError
      );
    }
    if (!found) {
      return new PathNotFoundError(target, filePath);
    }
    return undefined;
  }

  private classifyExecFailure(target: string, command: string, result: ProcessExit): ContainerError | DumpToolError {
    if (/no such container/i.test(result.stderr)) {
      return new ContainerNotFoundError(target);
    }
    if (/is not running/i.test(result.stderr)) {
      return new ContainerUnreachableError(target, 'container is not running');
    }
    const details = result.stderr.trim() || 'No additional error information available';
    return new DumpToolError(
      `${command} in '${target}' exited with code ${result.code}: ${details}`,
      result.code ?? undefined,
      result.stderr
    );
  }

  private spawnDocker(args: string[], env: Record<string, string>, signal?: AbortSignal): DockerProcess {
    return this.spawner(this.binary, args, { env: { ...process.env, ...env }, signal });
  }

  private watchExit(child: DockerProcess): Promise<ProcessExit> {
    return new Promise(resolve => {
      let stderr = '';
      let spawnError: Error | undefined;

      child.stderr.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_LIMIT);
      });

      child.on('error', (error: Error) => {
        spawnError = error;
        resolve({ code: null, stderr, error });
      });

      child.on('close', (code: number | null) => {
        resolve({ code, stderr, error: spawnError });
      });
    });
  }

  /**
   * Run a short docker command and buffer its output
   */
  private async run(args: string[]): Promise<ProcessOutput> {
    const child = this.spawnDocker(args, {});
    let stdout = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    const exit = await this.watchExit(child);
    return { ...exit, stdout };
  }
}

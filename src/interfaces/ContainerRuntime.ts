import { Readable } from 'stream';

/**
 * Live output of a command or file extraction in a container
 */
export interface ExecStream {
  /** Raw bytes as they are produced; never buffered whole */
  stream: Readable;

  /**
   * Resolves once the producer exited cleanly. Rejects with a DumpToolError
   * (or the abort reason) otherwise. Call after the stream has been consumed.
   */
  wait(): Promise<void>;
}

export interface ExecOptions {
  /** Environment for the command; values never appear on an argument list */
  env?: Record<string, string>;

  signal?: AbortSignal;
}

export interface ExtractOptions {
  signal?: AbortSignal;
}

/**
 * Interface for the container runtime the databases live in
 */
export interface ContainerRuntime {
  /** Check that the runtime daemon answers */
  ping(): Promise<void>;

  /** Run a command inside a running container and stream its stdout */
  execStream(
    target: string,
    command: string,
    args: string[],
    options?: ExecOptions
  ): Promise<ExecStream>;

  /** Stream the raw bytes of a single file from a container's filesystem */
  extractFile(target: string, path: string, options?: ExtractOptions): Promise<ExecStream>;
}

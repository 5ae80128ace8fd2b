/**
 * Error classes for the backup engine. Every per-database error ends up as a
 * BackupFailure; none of them aborts the run.
 */
export class BackupError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ContainerError extends BackupError {
  constructor(
    message: string,
    public readonly target: string,
    cause?: Error
  ) {
    super(message, 'container', cause);
    this.name = 'ContainerError';
  }
}

export class ContainerNotFoundError extends ContainerError {
  constructor(target: string, cause?: Error) {
    super(`Target container '${target}' not found`, target, cause);
    this.name = 'ContainerNotFoundError';
  }
}

export class ContainerUnreachableError extends ContainerError {
  constructor(target: string, reason: string, cause?: Error) {
    super(`Container '${target}' is unreachable: ${reason}`, target, cause);
    this.name = 'ContainerUnreachableError';
  }
}

export class PathNotFoundError extends ContainerError {
  constructor(
    target: string,
    public readonly path: string,
    cause?: Error
  ) {
    super(`Path '${path}' not found in container '${target}'`, target, cause);
    this.name = 'PathNotFoundError';
  }
}

export class DumpToolError extends BackupError {
  constructor(
    message: string,
    public readonly exitCode?: number,
    public readonly stderr: string = '',
    cause?: Error
  ) {
    super(message, 'dump', cause);
    this.name = 'DumpToolError';
  }
}

export class SnapshotTimeoutError extends BackupError {
  constructor(
    public readonly target: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Snapshot in '${target}' did not complete within ${timeoutMs}ms`,
      'snapshot'
    );
    this.name = 'SnapshotTimeoutError';
  }
}

export class RunTimeoutError extends BackupError {
  constructor(public readonly timeoutMs: number) {
    super(`Run timed out after ${timeoutMs}ms`, 'run');
    this.name = 'RunTimeoutError';
  }
}

export class WriteError extends BackupError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error
  ) {
    super(message, 'write', cause);
    this.name = 'WriteError';
  }
}

export class PurgeError extends BackupError {
  constructor(
    message: string,
    public readonly dir: string,
    cause?: Error
  ) {
    super(message, 'purge', cause);
    this.name = 'PurgeError';
  }
}

/** Errors raised by the producing side of a backup stream */
export function isStreamError(error: unknown): boolean {
  return error instanceof ContainerError || error instanceof DumpToolError;
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof SnapshotTimeoutError || error instanceof RunTimeoutError;
}

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Node system error code, if any */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

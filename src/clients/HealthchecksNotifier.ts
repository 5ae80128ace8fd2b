import axios from 'axios';
import { BackupOutcome, RunStatus } from '../interfaces/BackupManager';
import { HealthNotifier } from '../interfaces/HealthNotifier';
import { Logger } from '../interfaces/Logger';
import { formatError } from '../errors';

export type PingEndpoint = 'start' | 'success' | 'fail' | 'log';

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Render a per-database outcome as the text body of a log ping
 */
export function describeOutcome(databaseName: string, outcome: BackupOutcome): string {
  if (outcome.status === 'success') {
    const warning = outcome.purgeWarning ? ` Purge warning: ${outcome.purgeWarning}` : '';
    return `SUCCESS: Backup for ${databaseName} completed (${outcome.path}, ${outcome.byteSize} bytes).${warning}`;
  }
  return `FAILURE: Backup for ${databaseName} failed at stage ${outcome.stage}: ${outcome.cause}`;
}

/**
 * Healthchecks.io style notifier. One check URL receives `/start`, `/log`,
 * the bare URL on success and `/fail` on failure, all tagged with `rid`.
 */
export class HealthchecksNotifier implements HealthNotifier {
  private baseUrl: string;
  private logger: Logger;
  private timeoutMs: number;

  constructor(baseUrl: string, logger: Logger, timeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.logger = logger;
    this.timeoutMs = timeoutMs;
  }

  async start(runId: string, message: string): Promise<void> {
    await this.ping('start', runId, message);
  }

  async log(runId: string, databaseName: string, outcome: BackupOutcome): Promise<void> {
    await this.ping('log', runId, describeOutcome(databaseName, outcome));
  }

  async finish(runId: string, status: RunStatus, summary: string): Promise<void> {
    await this.ping(status === 'success' ? 'success' : 'fail', runId, summary);
  }

  buildUrl(endpoint: PingEndpoint): string {
    return endpoint === 'success' ? this.baseUrl : `${this.baseUrl}/${endpoint}`;
  }

  private async ping(endpoint: PingEndpoint, runId: string, body: string): Promise<void> {
    const url = this.buildUrl(endpoint);
    try {
      await axios.post(url, body, {
        params: { rid: runId },
        headers: { 'Content-Type': 'text/plain; charset=utf-8' },
        timeout: this.timeoutMs,
      });
      this.logger.debug(`Health check '${endpoint}' ping sent`, { url, runId });
    } catch (error) {
      this.logger.warn(`Health check '${endpoint}' ping failed`, {
        url,
        runId,
        error: formatError(error),
      });
    }
  }
}

/**
 * Used when no health check URL is configured
 */
export class NoopNotifier implements HealthNotifier {
  async start(): Promise<void> {}

  async log(): Promise<void> {}

  async finish(): Promise<void> {}
}

import { Readable } from 'stream';
import { setTimeout as delay } from 'timers/promises';

/**
 * Read a (short) stream to the end as UTF-8 text
 */
export async function readText(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Sleep for specified milliseconds; rejects early when `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

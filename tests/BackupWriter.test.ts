import { mkdtempSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { gunzipSync } from 'zlib';
import { BackupWriter, CommitRequest } from '../src/clients/BackupWriter';
import { DumpToolError, RunTimeoutError } from '../src/errors';
import { ExecStream } from '../src/interfaces/ContainerRuntime';
import { createMockLogger, execOf } from './helpers';

describe('BackupWriter', () => {
  let root: string;
  let writer: BackupWriter;

  const request = (overrides: Partial<CommitRequest> = {}): CommitRequest => ({
    targetDir: join(root, 'postgres', 'test_db'),
    baseName: 'test_db',
    timestamp: '20240115_143045_UTC',
    extension: 'dump',
    ...overrides,
  });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'backup-writer-'));
    writer = new BackupWriter(createMockLogger());
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should compress the stream into the canonical file', async () => {
    const onWriting = jest.fn();

    const outcome = await writer.commit(execOf('PGDMP custom archive'), request({ onWriting }));

    const expectedPath = join(root, 'postgres', 'test_db', 'test_db-20240115_143045_UTC.dump.gz');
    expect(outcome).toMatchObject({ status: 'success', path: expectedPath });
    expect(gunzipSync(readFileSync(expectedPath)).toString()).toBe('PGDMP custom archive');
    expect(outcome.status === 'success' && outcome.byteSize).toBe(statSync(expectedPath).size);
    expect(onWriting).toHaveBeenCalledTimes(1);
  });

  it('should report writing while the temporary file is still in place', async () => {
    const dir = join(root, 'postgres', 'test_db');
    const seen: string[][] = [];

    await writer.commit(
      execOf('PGDMP'),
      request({ onWriting: () => seen.push(readdirSync(dir)) })
    );

    expect(seen).toHaveLength(1);
    expect(seen[0]).toHaveLength(1);
    expect(seen[0][0]).toMatch(/^\.test_db-20240115_143045_UTC\.dump\.gz\.[0-9a-f-]+\.tmp$/);
  });

  it('should leave only the final file in the directory', async () => {
    await writer.commit(execOf('data'), request());

    expect(readdirSync(join(root, 'postgres', 'test_db'))).toEqual(['test_db-20240115_143045_UTC.dump.gz']);
  });

  it('should commit an empty stream as a valid empty archive', async () => {
    const outcome = await writer.commit(execOf(''), request());

    expect(outcome.status).toBe('success');
    if (outcome.status === 'success') {
      expect(gunzipSync(readFileSync(outcome.path)).length).toBe(0);
    }
  });

  it('should fail at the stream stage when the producer exits non-zero', async () => {
    const source = execOf('partial dump', new DumpToolError('pg_dump exited with code 1', 1));

    const outcome = await writer.commit(source, request());

    expect(outcome).toMatchObject({
      status: 'failure',
      stage: 'stream',
      cause: 'DumpToolError: pg_dump exited with code 1',
      timedOut: false,
    });
    expect(readdirSync(join(root, 'postgres', 'test_db'))).toEqual([]);
  });

  it('should fail at the stream stage when the source errors mid-way', async () => {
    const stream = new Readable({
      read() {
        this.destroy(new DumpToolError('connection lost'));
      },
    });
    const source: ExecStream = { stream, wait: async () => undefined };

    const outcome = await writer.commit(source, request());

    expect(outcome).toMatchObject({ status: 'failure', stage: 'stream', cause: 'DumpToolError: connection lost' });
    expect(readdirSync(join(root, 'postgres', 'test_db'))).toEqual([]);
  });

  it('should fail at the write stage when the directory cannot be created', async () => {
    const blocker = join(root, 'postgres');
    writeFileSync(blocker, 'not a directory');

    const outcome = await writer.commit(execOf('data'), request());

    expect(outcome.status).toBe('failure');
    if (outcome.status === 'failure') {
      expect(outcome.stage).toBe('write');
      expect(outcome.cause).toMatch(/^WriteError: Failed to create backup directory /);
      expect(outcome.timedOut).toBe(false);
    }
  });

  it('should report a cancelled run as a timed out dispatch', async () => {
    const controller = new AbortController();
    controller.abort(new RunTimeoutError(1000));

    const outcome = await writer.commit(execOf('data'), request({ signal: controller.signal }));

    expect(outcome).toMatchObject({
      status: 'failure',
      stage: 'dispatch',
      cause: 'RunTimeoutError: Run timed out after 1000ms',
      timedOut: true,
    });
    expect(readdirSync(join(root, 'postgres', 'test_db'))).toEqual([]);
  });
});

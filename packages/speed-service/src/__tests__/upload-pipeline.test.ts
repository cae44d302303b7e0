import * as crypto from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { ExponentialBackoff, OutageMonitor } from '@speed-rpc/broker-rpc';
import { UploadPipeline, hashContent } from '../upload/upload-pipeline.js';
import { StorageError } from '../upload/errors.js';
import {
  MemoryStorageProvider,
  RecordingNotifier,
  noSleep,
  silentLogger,
} from './helpers/index.js';

interface SetupOptions {
  maxAttempts?: number;
  attemptTimeoutMs?: number;
  monitor?: OutageMonitor;
}

function setup(options: SetupOptions = {}) {
  const provider = new MemoryStorageProvider();
  const pipeline = new UploadPipeline(provider, {
    logger: silentLogger(),
    policy: new ExponentialBackoff({
      maxAttempts: options.maxAttempts ?? 10,
      baseDelayMs: 1,
      jitter: 'none',
    }),
    attemptTimeoutMs: options.attemptTimeoutMs,
    monitor: options.monitor,
    sleep: noSleep,
  });
  return { provider, pipeline };
}

describe('hashContent', () => {
  it('returns the sha256 hex digest', () => {
    const expected = crypto.createHash('sha256').update('hello').digest('hex');
    expect(hashContent(Buffer.from('hello'))).toBe(expected);
  });
});

describe('UploadPipeline', () => {
  it('stores content on the first attempt', async () => {
    const { provider, pipeline } = setup();

    const result = await pipeline.upload('hello', 'reports/a.csv');

    expect(result).toEqual({
      status: 'stored',
      attempts: 1,
      reused: false,
      reference: {
        provider: 'memory',
        bucket: 'test-bucket',
        key: 'reports/a.csv',
        url: 'https://storage.test/reports/a.csv',
        contentHash: hashContent(Buffer.from('hello')),
        sizeBytes: 5,
        versionId: 'v1',
      },
    });
    expect(provider.objects.get('reports/a.csv')?.contentType).toBe('text/csv');
  });

  it('returns a frozen reference', async () => {
    const { pipeline } = setup();
    const result = await pipeline.upload('hello', 'a.txt');
    if (result.status !== 'stored') throw new Error('expected stored');
    expect(Object.isFrozen(result.reference)).toBe(true);
  });

  it('uses an explicit content type over the inferred one', async () => {
    const { provider, pipeline } = setup();
    await pipeline.upload('hello', 'a.txt', { contentType: 'application/x-custom' });
    expect(provider.objects.get('a.txt')?.contentType).toBe('application/x-custom');
  });

  it('succeeds on the tenth attempt after nine transient failures', async () => {
    const { provider, pipeline } = setup();
    provider.failNext(
      ...Array.from({ length: 9 }, () => new StorageError('transient', 'Service Unavailable')),
    );

    const result = await pipeline.upload('data', 'reports/r.xlsx');

    expect(result.status).toBe('stored');
    expect(result.attempts).toBe(10);
    expect(provider.putCalls).toBe(10);
  });

  it('fails with storage_exhausted after ten transient failures', async () => {
    const { provider, pipeline } = setup();
    provider.failNext(
      ...Array.from({ length: 10 }, () => new StorageError('transient', 'Service Unavailable')),
    );

    const result = await pipeline.upload('data', 'reports/r.xlsx');

    expect(result).toEqual({
      status: 'failed',
      reason: 'storage_exhausted',
      attempts: 10,
      message: 'Upload of reports/r.xlsx failed after 10 attempt(s): Service Unavailable',
    });
    expect(provider.putCalls).toBe(10);
    expect(provider.objects.size).toBe(0);
  });

  it('never exceeds the attempt budget', async () => {
    const { provider, pipeline } = setup({ maxAttempts: 3 });
    provider.failNext(...Array.from({ length: 5 }, () => new StorageError('transient', 'down')));

    const result = await pipeline.upload('data', 'r.txt');

    expect(result.attempts).toBe(3);
    expect(provider.putCalls).toBe(3);
    expect(pipeline.maxAttempts).toBe(3);
  });

  it('retries errors that are not StorageErrors', async () => {
    const { provider, pipeline } = setup();
    provider.failNext(new Error('socket hang up'));

    const result = await pipeline.upload('data', 'r.txt');

    expect(result.status).toBe('stored');
    expect(result.attempts).toBe(2);
  });

  it('reuses the stored object when the same content is uploaded again', async () => {
    const { provider, pipeline } = setup();
    const first = await pipeline.upload('same bytes', 'reports/r.txt');
    const second = await pipeline.upload('same bytes', 'reports/r.txt');

    if (first.status !== 'stored' || second.status !== 'stored') throw new Error('expected stored');
    expect(second.reused).toBe(true);
    expect(second.attempts).toBe(1);
    expect(second.reference.key).toBe(first.reference.key);
    expect(second.reference.contentHash).toBe(first.reference.contentHash);
    expect(provider.objects.size).toBe(1);
  });

  it('fails with storage_conflict when the destination holds other content', async () => {
    const { provider, pipeline } = setup();
    await pipeline.upload('first', 'reports/r.txt');

    const result = await pipeline.upload('second', 'reports/r.txt');

    expect(result).toEqual({
      status: 'failed',
      reason: 'storage_conflict',
      attempts: 1,
      message: 'Destination reports/r.txt already holds different content',
    });
    expect(provider.objects.get('reports/r.txt')?.body.toString()).toBe('first');
  });

  it('keeps the existing object under ifExists reuse even when content differs', async () => {
    const { provider, pipeline } = setup();
    await pipeline.upload('first', 'reports/r.txt');

    const result = await pipeline.upload('second run', 'reports/r.txt', { ifExists: 'reuse' });

    expect(result).toEqual({
      status: 'stored',
      attempts: 1,
      reused: true,
      reference: {
        provider: 'memory',
        bucket: 'test-bucket',
        key: 'reports/r.txt',
        url: 'https://storage.test/reports/r.txt',
        contentHash: hashContent(Buffer.from('first')),
        sizeBytes: 5,
      },
    });
    expect(provider.objects.get('reports/r.txt')?.body.toString()).toBe('first');
  });

  it('does not retry rejected content', async () => {
    const { provider, pipeline } = setup();
    provider.failNext(new StorageError('rejected', 'Access Denied', { statusCode: 403 }));

    const result = await pipeline.upload('data', 'r.txt');

    expect(result).toEqual({
      status: 'failed',
      reason: 'content_rejected',
      attempts: 1,
      message: 'Access Denied',
    });
    expect(provider.putCalls).toBe(1);
  });

  it('rejects empty content without touching storage', async () => {
    const { provider, pipeline } = setup();

    const result = await pipeline.upload(Buffer.alloc(0), 'r.txt');

    expect(result).toEqual({
      status: 'failed',
      reason: 'content_rejected',
      attempts: 0,
      message: 'Content is empty',
    });
    expect(provider.putCalls).toBe(0);
  });

  it('abandons an attempt that exceeds its timeout and retries', async () => {
    const { provider, pipeline } = setup({ attemptTimeoutMs: 20 });
    provider.hangNext(1);

    const result = await pipeline.upload('data', 'r.txt');

    expect(result.status).toBe('stored');
    expect(result.attempts).toBe(2);
  });

  it('alerts on exhaustion and again on recovery', async () => {
    const notifier = new RecordingNotifier();
    const monitor = new OutageMonitor({ name: 'storage', notifier, logger: silentLogger() });
    const { provider, pipeline } = setup({ maxAttempts: 2, monitor });
    provider.failNext(new StorageError('transient', 'down'), new StorageError('transient', 'down'));

    await pipeline.upload('data', 'a.txt');
    await pipeline.upload('data', 'b.txt');
    await monitor.flush();

    expect(notifier.alerts.map((a) => a.name)).toEqual(['storage_outage', 'storage_recovered']);
    expect(notifier.alerts[0]?.message).toBe('storage unavailable: down');
  });
});

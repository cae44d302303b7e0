import { describe, it, expect, afterEach } from 'vitest';
import { MemoryBroker, RpcClient } from '@speed-rpc/broker-rpc';
import type { MemoryTransport } from '@speed-rpc/broker-rpc';
import { SpeedWorkerApp } from '../app/speed-worker-app.js';
import { SpeedClient } from '../client/speed-client.js';
import { buildServiceConfig } from '../config.js';
import type { ServiceConfig } from '../config.js';
import { SpeedReportWorker } from '../report/speed-report-worker.js';
import { StorageError } from '../upload/errors.js';
import {
  MemoryStorageProvider,
  RecordingNotifier,
  fakeFetch,
  noSleep,
  silentLogger,
} from './helpers/index.js';

const NOW = new Date('2024-05-15T10:00:00Z');

const running: SpeedWorkerApp[] = [];

afterEach(async () => {
  await Promise.all(running.splice(0).map((app) => app.stop()));
});

interface SetupOptions {
  reportStatus?: number;
  reportBody?: () => string;
  config?: Partial<ServiceConfig>;
}

async function setup(options: SetupOptions = {}) {
  const broker = new MemoryBroker();
  const storage = new MemoryStorageProvider();
  const notifier = new RecordingNotifier();
  const { fetchFn } = fakeFetch(() =>
    options.reportStatus && options.reportStatus >= 400
      ? new Response('error', { status: options.reportStatus, statusText: 'Internal Server Error' })
      : new Response(options.reportBody?.() ?? 'xlsx-bytes'),
  );
  const logger = silentLogger();
  let transport: MemoryTransport | null = null;

  const app = new SpeedWorkerApp({
    config: buildServiceConfig({
      logLevel: 'silent',
      baseUrl: 'http://reports.test',
      s3KeyPrefix: 'reports',
      ...options.config,
    }),
    logger,
    connect: async () => {
      transport = await broker.connect();
      return transport;
    },
    storage,
    worker: new SpeedReportWorker({
      baseUrl: 'http://reports.test',
      logger,
      fetchFn,
      now: () => NOW,
    }),
    notifier,
    sleep: noSleep,
  });
  running.push(app);

  const rpc = new RpcClient(await broker.connect(), { logger });
  const client = new SpeedClient(rpc, { logger, timeoutMs: 2000 });

  return {
    broker,
    storage,
    notifier,
    app,
    rpc,
    client,
    transport: () => transport,
  };
}

describe('SpeedWorkerApp', () => {
  it('answers a measure call with a link to the stored report', async () => {
    const { app, rpc, client, storage } = await setup();
    await app.start();
    await rpc.start();

    const outcome = await client.requestReport();
    const key = `reports/${outcome.correlationId}/report_from 2024-05-15.xlsx`;

    expect(outcome).toMatchObject({
      status: 'ready',
      fileName: 'report_from 2024-05-15.xlsx',
      url: `https://storage.test/${key}`,
    });
    expect(storage.objects.get(key)?.body.toString()).toBe('xlsx-bytes');
    expect(app.state).toBe('running');
  });

  it('serves two requests for the same day with newer data the second time', async () => {
    const bodies = ['xlsx-v1', 'xlsx-v2'];
    const { app, rpc, client, storage } = await setup({
      reportBody: () => bodies.shift() ?? 'xlsx-late',
    });
    await app.start();
    await rpc.start();

    const first = await client.requestReport({ reportType: 'day' });
    const second = await client.requestReport({ reportType: 'day' });

    expect(first.status).toBe('ready');
    expect(second.status).toBe('ready');
    expect(second.correlationId).not.toBe(first.correlationId);
    const firstKey = `reports/${first.correlationId}/report_from 2024-05-15.xlsx`;
    const secondKey = `reports/${second.correlationId}/report_from 2024-05-15.xlsx`;
    expect(storage.objects.get(firstKey)?.body.toString()).toBe('xlsx-v1');
    expect(storage.objects.get(secondKey)?.body.toString()).toBe('xlsx-v2');
  });

  it('replies worker_error when the report service fails', async () => {
    const { app, rpc, client, storage } = await setup({ reportStatus: 500 });
    await app.start();
    await rpc.start();

    const outcome = await client.requestReport();

    expect(outcome).toMatchObject({
      status: 'failed',
      reason: 'worker_error',
      message: 'Report service responded 500 Internal Server Error',
    });
    expect(storage.putCalls).toBe(0);
  });

  it('stores the report on the tenth attempt after nine storage failures', async () => {
    const { app, rpc, client, storage } = await setup();
    storage.failNext(
      ...Array.from({ length: 9 }, () => new StorageError('transient', 'Slow Down')),
    );
    await app.start();
    await rpc.start();

    const outcome = await client.requestReport();

    expect(outcome.status).toBe('ready');
    expect(storage.putCalls).toBe(10);
  });

  it('replies storage_exhausted after ten storage failures', async () => {
    const { app, rpc, client, storage } = await setup();
    storage.failNext(
      ...Array.from({ length: 10 }, () => new StorageError('transient', 'Slow Down')),
    );
    await app.start();
    await rpc.start();

    const outcome = await client.requestReport();

    expect(outcome).toMatchObject({ status: 'failed', reason: 'storage_exhausted' });
    expect(storage.putCalls).toBe(10);
  });

  it('refuses to start with an invalid configuration', async () => {
    const { app } = await setup({ config: { rabbitPort: 0 } });

    await expect(app.start()).rejects.toThrow(
      'Invalid configuration: rabbitPort must be between 1 and 65535',
    );
    expect(app.state).toBe('idle');
  });

  it('gives up on an unreachable broker and alerts once', async () => {
    const { app, broker, notifier } = await setup();
    broker.setAvailable(false);

    await expect(app.start()).rejects.toThrow(
      'Broker unreachable after 10 attempt(s): Broker unavailable: connection refused',
    );
    expect(app.state).toBe('stopped');
    expect(notifier.alerts.map((a) => a.name)).toEqual(['transport_outage']);
  });

  it('stops consuming on stop', async () => {
    const { app, broker } = await setup();
    await app.start();
    expect(broker.consumerCount('rpc_queue')).toBe(1);

    await app.stop();

    expect(app.state).toBe('stopped');
    expect(broker.consumerCount('rpc_queue')).toBe(0);
  });

  it('emits connection_lost when the broker connection drops', async () => {
    const { app, transport, notifier } = await setup();
    await app.start();
    const lost: Error[] = [];
    app.on('connection_lost', (err) => lost.push(err));

    await transport()?.close();
    await app.transportMonitor.flush();

    expect(lost.map((e) => e.message)).toEqual(['Broker connection closed unexpectedly']);
    expect(app.state).toBe('stopped');
    expect(notifier.alerts.map((a) => a.name)).toEqual(['transport_outage']);
  });
});

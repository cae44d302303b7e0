/**
 * Speed Worker Application
 *
 * Wires one ServiceConfig into a running worker:
 * 1. Connect to the broker (bounded retries)
 * 2. Build the Worker, the Upload Pipeline and the admin notifier
 * 3. Serve the speed queue with the measurement handler
 *
 * Broker and storage outages go to the admin notifier once per outage.
 * If the broker connection drops while running, the app emits
 * `connection_lost`; the process owner decides whether to restart.
 *
 * @module app/speed-worker-app
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import {
  AmqpTransport,
  ExponentialBackoff,
  OutageMonitor,
  RpcServer,
  connectWithRetry,
  errorMessage,
} from '@speed-rpc/broker-rpc';
import type { AdminNotifier, SleepFn, Transport } from '@speed-rpc/broker-rpc';
import { adminChatEnabled, brokerUrl, validateServiceConfig } from '../config.js';
import type { ServiceConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { LogAdminNotifier, TelegramAdminNotifier } from '../notify/index.js';
import { SpeedReportWorker } from '../report/speed-report-worker.js';
import type { ReportWorker } from '../report/types.js';
import { S3StorageProvider } from '../upload/s3-storage.js';
import { UploadPipeline } from '../upload/upload-pipeline.js';
import type { StorageProvider } from '../upload/types.js';
import { createMeasurementHandler } from './measurement-handler.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AppState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

export interface SpeedWorkerAppOptions {
  config: Readonly<ServiceConfig>;

  /** Defaults to a pino logger at `config.logLevel` */
  logger?: Logger;

  /** Opens the broker connection (default: AMQP at brokerUrl(config)) */
  connect?: () => Promise<Transport>;

  /** Default: S3 bucket from config */
  storage?: StorageProvider;

  /** Default: SpeedReportWorker against `config.baseUrl` */
  worker?: ReportWorker;

  /** Default: chat bot when configured, otherwise the log */
  notifier?: AdminNotifier;

  /** Broker connection attempts before giving up (default: 10) */
  connectAttempts?: number;

  sleep?: SleepFn;
}

export interface SpeedWorkerAppEvents {
  /** The broker connection dropped while serving */
  connection_lost: (error: Error) => void;
}

export interface TypedSpeedWorkerAppEmitter {
  on<K extends keyof SpeedWorkerAppEvents>(event: K, listener: SpeedWorkerAppEvents[K]): this;
  off<K extends keyof SpeedWorkerAppEvents>(event: K, listener: SpeedWorkerAppEvents[K]): this;
  emit<K extends keyof SpeedWorkerAppEvents>(
    event: K,
    ...args: Parameters<SpeedWorkerAppEvents[K]>
  ): boolean;
}

// ---------------------------------------------------------------------------
// SpeedWorkerApp
// ---------------------------------------------------------------------------

export class SpeedWorkerApp extends EventEmitter implements TypedSpeedWorkerAppEmitter {
  readonly config: Readonly<ServiceConfig>;
  readonly logger: Logger;
  readonly transportMonitor: OutageMonitor;
  readonly storageMonitor: OutageMonitor;
  readonly pipeline: UploadPipeline;

  private readonly connect: () => Promise<Transport>;
  private readonly worker: ReportWorker;
  private readonly connectAttempts: number;
  private readonly sleep?: SleepFn;

  private _state: AppState = 'idle';
  private transport: Transport | null = null;
  private _server: RpcServer | null = null;

  private readonly onTransportError = (err: Error): void => {
    this.logger.error({ error: err.message }, 'Broker connection error');
    this.transportMonitor.recordFailure(err);
  };

  private readonly onTransportClose = (): void => {
    if (this._state !== 'running') return;
    const err = new Error('Broker connection closed unexpectedly');
    this.logger.error(err.message);
    this.transportMonitor.recordFailure(err);
    this._state = 'stopped';
    this.emit('connection_lost', err);
  };

  constructor(options: SpeedWorkerAppOptions) {
    super();
    const { config } = options;
    this.config = config;
    this.logger = options.logger ?? createLogger(config.logLevel);
    this.connectAttempts = options.connectAttempts ?? 10;
    this.sleep = options.sleep;

    const notifier =
      options.notifier ??
      (adminChatEnabled(config)
        ? new TelegramAdminNotifier({
            botToken: config.tgBotToken,
            chatId: config.tgAdminId,
            logger: this.logger,
          })
        : new LogAdminNotifier(this.logger));

    this.transportMonitor = new OutageMonitor({ name: 'transport', notifier, logger: this.logger });
    this.storageMonitor = new OutageMonitor({
      name: 'storage',
      notifier,
      logger: this.logger,
      threshold: 3,
    });

    this.connect =
      options.connect ??
      (() => AmqpTransport.connect({ url: brokerUrl(config, true), logger: this.logger }));

    this.worker =
      options.worker ??
      new SpeedReportWorker({
        baseUrl: config.baseUrl,
        reportPath: config.reportPath,
        timeoutMs: config.reportTimeoutMs,
        logger: this.logger,
      });

    const storage =
      options.storage ??
      new S3StorageProvider(
        {
          bucketName: config.s3BucketName,
          region: config.s3Region,
          publicBaseUrl: config.storagePublicBaseUrl,
        },
        this.logger,
      );

    this.pipeline = new UploadPipeline(storage, {
      logger: this.logger,
      policy: new ExponentialBackoff({
        maxAttempts: config.uploadMaxAttempts,
        baseDelayMs: config.uploadBaseDelayMs,
        maxDelayMs: config.uploadMaxDelayMs,
      }),
      attemptTimeoutMs: config.uploadAttemptTimeoutMs,
      monitor: this.storageMonitor,
      sleep: options.sleep,
    });
  }

  get state(): AppState {
    return this._state;
  }

  /** The RPC server, once started */
  get server(): RpcServer | null {
    return this._server;
  }

  /**
   * Validate config, connect and start serving.
   *
   * @throws Error on invalid configuration; TransportError if the broker
   *   stays unreachable.
   */
  async start(): Promise<void> {
    if (this._state !== 'idle') {
      throw new Error(`Cannot start from state: ${this._state}`);
    }

    const errors = validateServiceConfig(this.config);
    if (errors.length > 0) {
      throw new Error(`Invalid configuration: ${errors.join('; ')}`);
    }

    this._state = 'starting';
    this.logger.info(
      {
        broker: brokerUrl(this.config),
        queue: this.config.rpcQueueName,
        bucket: this.config.s3BucketName,
      },
      'Starting speed worker',
    );

    try {
      const transport = await connectWithRetry(this.connect, {
        policy: new ExponentialBackoff({
          maxAttempts: this.connectAttempts,
          baseDelayMs: 1000,
          maxDelayMs: 30_000,
        }),
        logger: this.logger,
        monitor: this.transportMonitor,
        sleep: this.sleep,
      });
      transport.on('error', this.onTransportError);
      transport.on('close', this.onTransportClose);
      this.transport = transport;

      const handler = createMeasurementHandler({
        worker: this.worker,
        pipeline: this.pipeline,
        keyPrefix: this.config.s3KeyPrefix,
        logger: this.logger,
      });

      this._server = new RpcServer(transport, handler, {
        queueName: this.config.rpcQueueName,
        prefetch: this.config.rpcPrefetch,
        publishPolicy: new ExponentialBackoff({
          maxAttempts: this.config.rpcPublishMaxAttempts,
          baseDelayMs: 200,
        }),
        monitor: this.transportMonitor,
        logger: this.logger,
        sleep: this.sleep,
      });
      await this._server.serve();
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, 'Speed worker failed to start');
      await this.release();
      this._state = 'stopped';
      throw err;
    }

    this._state = 'running';
    this.logger.info('Speed worker running');
  }

  /**
   * Finish in-flight calls, close the connection and deliver pending alerts.
   */
  async stop(): Promise<void> {
    if (this._state !== 'running' && this._state !== 'stopped') return;
    if (this._state === 'running') {
      this._state = 'stopping';
      await this._server?.stop();
    }

    await this.release();
    this._state = 'stopped';
    this.logger.info(this._server?.stats ?? {}, 'Speed worker stopped');
  }

  private async release(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      transport.off('close', this.onTransportClose);
      transport.off('error', this.onTransportError);
      try {
        await transport.close();
      } catch (err) {
        this.logger.warn({ error: errorMessage(err) }, 'Error closing broker connection');
      }
    }
    await Promise.all([this.transportMonitor.flush(), this.storageMonitor.flush()]);
  }
}

/**
 * Service configuration.
 *
 * Read from environment variables once at process start. Overrides win
 * over the environment, the environment wins over defaults.
 *
 * @module config
 */

import {
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_PREFETCH,
  DEFAULT_REQUEST_QUEUE,
} from '@speed-rpc/broker-rpc';

export interface ServiceConfig {
  /** Deployment environment, used in the default bucket name */
  nodeEnv: string;

  /** pino level: fatal, error, warn, info, debug, trace or silent */
  logLevel: string;

  // Broker
  rabbitUser: string;
  rabbitPassword: string;
  rabbitHost: string;
  rabbitPort: number;
  rabbitVhost: string;

  // RPC
  rpcQueueName: string;
  rpcPrefetch: number;
  rpcTimeoutMs: number;
  rpcPublishMaxAttempts: number;

  // Companion report service
  baseUrl: string;
  reportPath: string;
  reportTimeoutMs: number;

  // Storage
  s3BucketName: string;
  s3Region: string;
  s3KeyPrefix: string;
  storagePublicBaseUrl: string;

  // Upload retries
  uploadMaxAttempts: number;
  uploadBaseDelayMs: number;
  uploadMaxDelayMs: number;
  uploadAttemptTimeoutMs: number;

  // Administrative notification
  tgBotToken: string;
  tgAdminId: number;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build service config from environment variables and optional overrides.
 *
 * Environment variables:
 * - LOG_LEVEL (default: info)
 * - RABBIT_USER, RABBIT_PASSWORD, RABBIT_HOST, RABBIT_PORT, RABBIT_VHOST
 * - RPC_QUEUE_NAME (default: rpc_queue), RPC_PREFETCH, RPC_TIMEOUT_MS, RPC_PUBLISH_MAX_ATTEMPTS
 * - BASE_URL, REPORT_PATH, REPORT_TIMEOUT_MS: companion report service
 * - S3_BUCKET_NAME (default: speed-reports-{NODE_ENV}), S3_REGION, S3_KEY_PREFIX
 * - STORAGE_PUBLIC_BASE_URL (default: the bucket's virtual-hosted S3 URL)
 * - UPLOAD_MAX_ATTEMPTS (default: 10), UPLOAD_BASE_DELAY_MS, UPLOAD_MAX_DELAY_MS,
 *   UPLOAD_ATTEMPT_TIMEOUT_MS
 * - TG_BOT_TOKEN, TG_ADMIN_ID (default: -1, disabled)
 *
 * The result is frozen.
 */
export function buildServiceConfig(overrides?: Partial<ServiceConfig>): Readonly<ServiceConfig> {
  const nodeEnv = overrides?.nodeEnv ?? getEnv('NODE_ENV', 'development');
  const s3BucketName =
    overrides?.s3BucketName ?? getEnv('S3_BUCKET_NAME', `speed-reports-${nodeEnv}`);
  const s3Region = overrides?.s3Region ?? getEnv('S3_REGION', 'us-east-1');

  return Object.freeze({
    nodeEnv,
    logLevel: overrides?.logLevel ?? getEnv('LOG_LEVEL', 'info'),

    rabbitUser: overrides?.rabbitUser ?? getEnv('RABBIT_USER', 'guest'),
    rabbitPassword: overrides?.rabbitPassword ?? getEnv('RABBIT_PASSWORD', 'guest'),
    rabbitHost: overrides?.rabbitHost ?? getEnv('RABBIT_HOST', 'localhost'),
    rabbitPort: overrides?.rabbitPort ?? getEnvNumber('RABBIT_PORT', 5672),
    rabbitVhost: overrides?.rabbitVhost ?? getEnv('RABBIT_VHOST', '/'),

    rpcQueueName: overrides?.rpcQueueName ?? getEnv('RPC_QUEUE_NAME', DEFAULT_REQUEST_QUEUE),
    rpcPrefetch: overrides?.rpcPrefetch ?? getEnvNumber('RPC_PREFETCH', DEFAULT_PREFETCH),
    rpcTimeoutMs:
      overrides?.rpcTimeoutMs ?? getEnvNumber('RPC_TIMEOUT_MS', DEFAULT_CALL_TIMEOUT_MS),
    rpcPublishMaxAttempts:
      overrides?.rpcPublishMaxAttempts ?? getEnvNumber('RPC_PUBLISH_MAX_ATTEMPTS', 5),

    baseUrl: overrides?.baseUrl ?? getEnv('BASE_URL', 'http://localhost:8010'),
    reportPath: overrides?.reportPath ?? getEnv('REPORT_PATH', '/analysis/report'),
    reportTimeoutMs: overrides?.reportTimeoutMs ?? getEnvNumber('REPORT_TIMEOUT_MS', 60_000),

    s3BucketName,
    s3Region,
    s3KeyPrefix: overrides?.s3KeyPrefix ?? getEnv('S3_KEY_PREFIX', 'reports'),
    storagePublicBaseUrl:
      overrides?.storagePublicBaseUrl ??
      getEnv('STORAGE_PUBLIC_BASE_URL', `https://${s3BucketName}.s3.${s3Region}.amazonaws.com`),

    uploadMaxAttempts: overrides?.uploadMaxAttempts ?? getEnvNumber('UPLOAD_MAX_ATTEMPTS', 10),
    uploadBaseDelayMs: overrides?.uploadBaseDelayMs ?? getEnvNumber('UPLOAD_BASE_DELAY_MS', 500),
    uploadMaxDelayMs: overrides?.uploadMaxDelayMs ?? getEnvNumber('UPLOAD_MAX_DELAY_MS', 30_000),
    uploadAttemptTimeoutMs:
      overrides?.uploadAttemptTimeoutMs ?? getEnvNumber('UPLOAD_ATTEMPT_TIMEOUT_MS', 30_000),

    tgBotToken: overrides?.tgBotToken ?? getEnv('TG_BOT_TOKEN', ''),
    tgAdminId: overrides?.tgAdminId ?? getEnvNumber('TG_ADMIN_ID', -1),
  });
}

/**
 * Validate a service configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateServiceConfig(config: ServiceConfig): string[] {
  const errors: string[] = [];

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  if (!config.rabbitHost) {
    errors.push('rabbitHost is required');
  }

  if (config.rabbitPort < 1 || config.rabbitPort > 65_535) {
    errors.push('rabbitPort must be between 1 and 65535');
  }

  if (!config.rpcQueueName) {
    errors.push('rpcQueueName is required');
  }

  if (config.rpcPrefetch < 1) {
    errors.push('rpcPrefetch must be at least 1');
  }

  if (config.rpcTimeoutMs < 1000) {
    errors.push('rpcTimeoutMs must be at least 1000 (1 second)');
  }

  if (config.rpcPublishMaxAttempts < 1) {
    errors.push('rpcPublishMaxAttempts must be at least 1');
  }

  if (!URL.canParse(config.baseUrl)) {
    errors.push(`baseUrl is not a valid URL: ${config.baseUrl}`);
  }

  if (!config.reportPath.startsWith('/')) {
    errors.push('reportPath must start with /');
  }

  if (config.reportTimeoutMs < 1000) {
    errors.push('reportTimeoutMs must be at least 1000 (1 second)');
  }

  if (!config.s3BucketName) {
    errors.push('s3BucketName is required');
  }

  if (!URL.canParse(config.storagePublicBaseUrl)) {
    errors.push(`storagePublicBaseUrl is not a valid URL: ${config.storagePublicBaseUrl}`);
  }

  if (config.uploadMaxAttempts < 1) {
    errors.push('uploadMaxAttempts must be at least 1');
  }

  if (config.uploadBaseDelayMs < 0) {
    errors.push('uploadBaseDelayMs must not be negative');
  }

  if (config.uploadMaxDelayMs < config.uploadBaseDelayMs) {
    errors.push('uploadMaxDelayMs must not be less than uploadBaseDelayMs');
  }

  if (config.uploadAttemptTimeoutMs < 100) {
    errors.push('uploadAttemptTimeoutMs must be at least 100');
  }

  return errors;
}

/**
 * Render the AMQP connection URL. The password is masked unless
 * `showSecret` is set.
 */
export function brokerUrl(config: ServiceConfig, showSecret = false): string {
  const password = showSecret ? encodeURIComponent(config.rabbitPassword) : '****';
  const user = encodeURIComponent(config.rabbitUser);
  const vhost = encodeURIComponent(config.rabbitVhost);
  return `amqp://${user}:${password}@${config.rabbitHost}:${config.rabbitPort}/${vhost}`;
}

/** Whether alerts can go to the chat bot */
export function adminChatEnabled(config: ServiceConfig): boolean {
  return config.tgBotToken.length > 0 && config.tgAdminId !== -1;
}

/**
 * S3 storage provider.
 *
 * Uses AWS SDK v3 PutObjectCommand for small bodies and
 * @aws-sdk/lib-storage Upload for multipart uploads. Every write is
 * conditional (`If-None-Match: *`), so an existing key is never replaced;
 * the pipeline decides what an existing key means.
 */

import {
  S3Client,
  PutObjectCommand,
  HeadObjectCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import type { Logger } from 'pino';
import { errorMessage } from '@speed-rpc/broker-rpc';
import { StorageError } from './errors.js';
import type {
  PutObjectOutcome,
  PutObjectRequest,
  StorageProvider,
  StoredObjectInfo,
} from './types.js';

export interface S3StorageConfig {
  bucketName: string;
  region: string;

  /** Base URL under which keys resolve publicly */
  publicBaseUrl: string;

  /** Bodies larger than this go through multipart upload (default: 5 MB) */
  multipartThresholdBytes?: number;

  /** Multipart part size (default: 5 MB) */
  multipartPartSizeBytes?: number;
}

/** Statuses worth another attempt even though they are 4xx */
const RETRYABLE_CLIENT_STATUSES = new Set([408, 409, 429]);

const FIVE_MB = 5 * 1024 * 1024;

/**
 * Map an SDK failure onto a StorageError.
 */
export function classifyS3Error(err: unknown, action: string): StorageError {
  if (err instanceof StorageError) return err;

  if (err instanceof S3ServiceException) {
    const statusCode = err.$metadata.httpStatusCode;
    const rejected =
      statusCode !== undefined &&
      statusCode >= 400 &&
      statusCode < 500 &&
      !RETRYABLE_CLIENT_STATUSES.has(statusCode);
    const message = `${action} failed: ${err.name}: ${err.message}`;
    return new StorageError(rejected ? 'rejected' : 'transient', message, {
      cause: err,
      statusCode,
    });
  }

  return new StorageError('transient', `${action} failed: ${errorMessage(err)}`, { cause: err });
}

function isPreconditionFailed(err: unknown): boolean {
  return (
    err instanceof S3ServiceException &&
    (err.$metadata.httpStatusCode === 412 || err.name === 'PreconditionFailed')
  );
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof S3ServiceException &&
    (err.$metadata.httpStatusCode === 404 || err.name === 'NotFound' || err.name === 'NoSuchKey')
  );
}

export class S3StorageProvider implements StorageProvider {
  readonly name = 's3';
  readonly bucket: string;
  private readonly client: S3Client;
  private readonly publicBaseUrl: string;
  private readonly multipartThresholdBytes: number;
  private readonly multipartPartSizeBytes: number;
  private readonly logger: Logger;

  constructor(config: S3StorageConfig, logger: Logger, client?: S3Client) {
    this.bucket = config.bucketName;
    this.publicBaseUrl = config.publicBaseUrl.replace(/\/+$/, '');
    this.multipartThresholdBytes = config.multipartThresholdBytes ?? FIVE_MB;
    this.multipartPartSizeBytes = config.multipartPartSizeBytes ?? FIVE_MB;
    this.logger = logger.child({ component: 's3-storage', bucket: config.bucketName });
    this.client = client ?? new S3Client({ region: config.region });
  }

  async put(request: PutObjectRequest): Promise<PutObjectOutcome> {
    const metadata: Record<string, string> = {
      'content-hash': request.contentHash,
      'hash-algorithm': 'sha256',
      'file-size': String(request.body.length),
    };

    try {
      const versionId =
        request.body.length > this.multipartThresholdBytes
          ? await this.multipartUpload(request, metadata)
          : await this.simpleUpload(request, metadata);

      this.logger.debug(
        { key: request.key, size: request.body.length, versionId },
        'Object stored',
      );
      return { created: true, versionId };
    } catch (err) {
      if (isPreconditionFailed(err)) {
        this.logger.debug({ key: request.key }, 'Object already exists');
        return { created: false };
      }
      throw classifyS3Error(err, `Upload of ${request.key}`);
    }
  }

  async head(key: string, signal: AbortSignal): Promise<StoredObjectInfo | null> {
    try {
      const command = new HeadObjectCommand({ Bucket: this.bucket, Key: key });
      const response = await this.client.send(command, { abortSignal: signal });
      return {
        contentHash: response.Metadata?.['content-hash'],
        sizeBytes: response.ContentLength,
        versionId: response.VersionId,
      };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw classifyS3Error(err, `Head of ${key}`);
    }
  }

  urlFor(key: string): string {
    const path = key.split('/').map(encodeURIComponent).join('/');
    return `${this.publicBaseUrl}/${path}`;
  }

  /**
   * Simple PutObject upload for bodies below the multipart threshold.
   */
  private async simpleUpload(
    request: PutObjectRequest,
    metadata: Record<string, string>,
  ): Promise<string | undefined> {
    const response = await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: request.key,
        Body: request.body,
        Metadata: metadata,
        ContentType: request.contentType,
        IfNoneMatch: '*',
      }),
      { abortSignal: request.signal },
    );
    return response.VersionId;
  }

  /**
   * Multipart upload for large bodies using @aws-sdk/lib-storage.
   */
  private async multipartUpload(
    request: PutObjectRequest,
    metadata: Record<string, string>,
  ): Promise<string | undefined> {
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucket,
        Key: request.key,
        Body: request.body,
        Metadata: metadata,
        ContentType: request.contentType,
        IfNoneMatch: '*',
      },
      queueSize: 4,
      partSize: this.multipartPartSizeBytes,
      leavePartsOnError: false,
    });

    const onAbort = (): void => {
      upload.abort().catch((err: unknown) => {
        this.logger.warn(
          { key: request.key, error: errorMessage(err) },
          'Failed to abort multipart upload',
        );
      });
    };
    request.signal.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await upload.done();
      return result.VersionId;
    } finally {
      request.signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Upload Pipeline
 *
 * Persists a computed result to external storage and returns a durable
 * reference. Each `upload()` call owns one UploadJob:
 *
 * 1. Reject empty content up front
 * 2. Hash the content (sha256)
 * 3. Conditional put, bounded by a per-attempt timeout
 * 4. If the key exists: same hash -> reuse it, different hash -> conflict,
 *    or under `ifExists: 'reuse'` keep whatever is there
 * 5. Transient failures back off and retry until `maxAttempts`
 *
 * `upload()` never throws; every ending is an UploadResult.
 *
 * @module upload/upload-pipeline
 */

import * as crypto from 'node:crypto';
import type { Logger } from 'pino';
import { RetryExhaustedError, errorMessage, retry } from '@speed-rpc/broker-rpc';
import type { OutageMonitor, RetryPolicy, SleepFn } from '@speed-rpc/broker-rpc';
import { StorageConflictError, StorageError } from './errors.js';
import { inferContentType } from './keys.js';
import type {
  StorageProvider,
  StorageReference,
  StoredObjectInfo,
  UploadJob,
  UploadOptions,
  UploadPipelineOptions,
  UploadResult,
} from './types.js';

const DEFAULT_ATTEMPT_TIMEOUT_MS = 30_000;

/** Everything except rejections and conflicts is worth another attempt */
function isRetryable(err: unknown): boolean {
  if (err instanceof StorageConflictError) return false;
  if (err instanceof StorageError) return err.retryable;
  return true;
}

export function hashContent(content: Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

export class UploadPipeline {
  private readonly provider: StorageProvider;
  private readonly policy: RetryPolicy;
  private readonly attemptTimeoutMs: number;
  private readonly monitor?: OutageMonitor;
  private readonly logger: Logger;
  private readonly sleep?: SleepFn;

  constructor(provider: StorageProvider, options: UploadPipelineOptions) {
    this.provider = provider;
    this.policy = options.policy;
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
    this.monitor = options.monitor;
    this.logger = options.logger.child({ component: 'upload-pipeline', provider: provider.name });
    this.sleep = options.sleep;
  }

  /** Attempt budget per job */
  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  /**
   * Store `content` at `destination`.
   */
  async upload(
    content: Buffer | string,
    destination: string,
    options?: UploadOptions,
  ): Promise<UploadResult> {
    const body = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
    const log = this.logger.child({ key: destination });

    if (body.length === 0) {
      log.warn('Refusing to upload empty content');
      return {
        status: 'failed',
        reason: 'content_rejected',
        attempts: 0,
        message: 'Content is empty',
      };
    }

    const job: UploadJob = {
      content: body,
      destination,
      contentType: options?.contentType ?? inferContentType(destination),
      contentHash: hashContent(body),
      ifExists: options?.ifExists ?? 'compare',
      attemptsMade: 0,
      maxAttempts: this.policy.maxAttempts,
    };
    const startedAt = Date.now();

    try {
      const { reference, reused } = await retry(
        async () => {
          job.attemptsMade++;
          return this.attempt(job);
        },
        {
          policy: this.policy,
          sleep: this.sleep,
          shouldRetry: (err) => isRetryable(err),
          onRetry: (err, attempt, delayMs) => {
            log.warn(
              { attempt, maxAttempts: job.maxAttempts, delayMs, error: errorMessage(err) },
              'Upload attempt failed, retrying',
            );
          },
        },
      );

      log.info(
        {
          attempts: job.attemptsMade,
          size: body.length,
          reused,
          durationMs: Date.now() - startedAt,
        },
        'Upload complete',
      );
      this.monitor?.recordSuccess();
      return { status: 'stored', reference, attempts: job.attemptsMade, reused };
    } catch (err) {
      return this.toFailure(job, err, log);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async attempt(job: UploadJob): Promise<{ reference: StorageReference; reused: boolean }> {
    return this.withTimeout(job, async (signal) => {
      const put = await this.provider.put({
        key: job.destination,
        body: job.content,
        contentHash: job.contentHash,
        contentType: job.contentType,
        signal,
      });

      if (put.created) {
        return { reference: this.reference(job, { versionId: put.versionId }), reused: false };
      }

      const existing = await this.provider.head(job.destination, signal);
      if (existing === null) {
        // Deleted between the conditional put and the head
        throw new StorageError(
          'transient',
          `Object ${job.destination} vanished after a conflicting write`,
        );
      }
      if (job.ifExists === 'compare' && existing.contentHash !== job.contentHash) {
        throw new StorageConflictError(
          job.destination,
          `Destination ${job.destination} already holds different content`,
        );
      }
      return { reference: this.reference(job, existing), reused: true };
    });
  }

  /**
   * Run one attempt under its own deadline. The provider sees the abort
   * signal; the attempt is abandoned even if the provider ignores it.
   */
  private withTimeout<T>(job: UploadJob, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          new StorageError(
            'transient',
            `Attempt ${job.attemptsMade} for ${job.destination} ` +
              `timed out after ${this.attemptTimeoutMs}ms`,
          ),
        );
      }, this.attemptTimeoutMs);

      run(controller.signal).then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }

  /** Reference to the object at the job's key; `stored` wins over the job's own bytes */
  private reference(job: UploadJob, stored: StoredObjectInfo): StorageReference {
    const { versionId } = stored;
    return Object.freeze({
      provider: this.provider.name,
      bucket: this.provider.bucket,
      key: job.destination,
      url: this.provider.urlFor(job.destination),
      contentHash: stored.contentHash ?? job.contentHash,
      sizeBytes: stored.sizeBytes ?? job.content.length,
      ...(versionId !== undefined ? { versionId } : {}),
    });
  }

  private toFailure(job: UploadJob, err: unknown, log: Logger): UploadResult {
    if (err instanceof StorageConflictError) {
      log.error({ attempts: job.attemptsMade }, err.message);
      return {
        status: 'failed',
        reason: 'storage_conflict',
        attempts: job.attemptsMade,
        message: err.message,
      };
    }

    if (err instanceof StorageError && !err.retryable) {
      log.error(
        { attempts: job.attemptsMade, statusCode: err.statusCode, error: err.message },
        'Upload rejected',
      );
      return {
        status: 'failed',
        reason: 'content_rejected',
        attempts: job.attemptsMade,
        message: err.message,
      };
    }

    const last = err instanceof RetryExhaustedError ? err.lastError : err;
    const message =
      `Upload of ${job.destination} failed after ${job.attemptsMade} attempt(s): ` +
      errorMessage(last);
    log.error(
      { attempts: job.attemptsMade, error: errorMessage(last) },
      'Upload retries exhausted',
    );
    this.monitor?.recordFailure(last, { key: job.destination, attempts: job.attemptsMade });
    return { status: 'failed', reason: 'storage_exhausted', attempts: job.attemptsMade, message };
  }
}

/**
 * Types for the upload module.
 *
 * An UploadJob moves one computed result into external storage, retrying
 * transient failures up to a fixed attempt budget.
 */

import type { RetryPolicy, SleepFn, OutageMonitor } from '@speed-rpc/broker-rpc';
import type { Logger } from 'pino';

/** Hash algorithm recorded with every stored object */
export type HashAlgorithm = 'sha256';

/** Durable pointer to a stored result */
export interface StorageReference {
  /** Provider that holds the object, e.g. `s3` */
  provider: string;
  bucket: string;
  key: string;
  /** Public link under STORAGE_PUBLIC_BASE_URL */
  url: string;
  /** Hex digest of the stored bytes */
  contentHash: string;
  sizeBytes: number;
  versionId?: string;
}

/** One upload, owned by a single `upload()` call */
export interface UploadJob {
  content: Buffer;
  destination: string;
  contentType: string;
  contentHash: string;
  ifExists: ExistingObjectPolicy;
  attemptsMade: number;
  maxAttempts: number;
}

/**
 * What to do when the destination key already holds an object:
 * `compare` reuses it only if its hash matches, `reuse` keeps it as is.
 */
export type ExistingObjectPolicy = 'compare' | 'reuse';

/** Why an upload failed */
export type UploadFailureReason = 'storage_exhausted' | 'content_rejected' | 'storage_conflict';

export type UploadResult =
  | {
      status: 'stored';
      reference: StorageReference;
      attempts: number;
      /** The destination already held an object, which was kept */
      reused: boolean;
    }
  | {
      status: 'failed';
      reason: UploadFailureReason;
      attempts: number;
      message: string;
    };

// ---------------------------------------------------------------------------
// Provider contract
// ---------------------------------------------------------------------------

export interface PutObjectRequest {
  key: string;
  body: Buffer;
  contentHash: string;
  contentType: string;
  /** Aborted when the attempt times out */
  signal: AbortSignal;
}

/** `created: false` means the key already exists and nothing was written */
export type PutObjectOutcome = { created: true; versionId?: string } | { created: false };

export interface StoredObjectInfo {
  contentHash?: string;
  sizeBytes?: number;
  versionId?: string;
}

/**
 * External storage. Writes are conditional: `put()` never overwrites an
 * existing key. Errors are thrown as StorageError.
 */
export interface StorageProvider {
  readonly name: string;
  readonly bucket: string;

  put(request: PutObjectRequest): Promise<PutObjectOutcome>;

  /** Metadata of an existing object, or null if the key is absent */
  head(key: string, signal: AbortSignal): Promise<StoredObjectInfo | null>;

  /** Public link for a key */
  urlFor(key: string): string;
}

// ---------------------------------------------------------------------------
// Pipeline options
// ---------------------------------------------------------------------------

export interface UploadPipelineOptions {
  logger: Logger;

  /** Backoff between attempts; its maxAttempts is the job's attempt budget */
  policy: RetryPolicy;

  /** Upper bound for a single attempt, in ms (default: 30000) */
  attemptTimeoutMs?: number;

  /** Told when jobs exhaust their retries and when storage recovers */
  monitor?: OutageMonitor;

  sleep?: SleepFn;
}

export interface UploadOptions {
  /** Overrides the type inferred from the destination's extension */
  contentType?: string;

  /** Default: compare */
  ifExists?: ExistingObjectPolicy;
}

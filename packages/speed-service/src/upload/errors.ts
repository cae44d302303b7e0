/**
 * Storage errors, classified by whether another attempt could succeed.
 */

export type StorageErrorKind = 'transient' | 'rejected';

export class StorageError extends Error {
  override readonly name = 'StorageError';

  readonly kind: StorageErrorKind;

  /** HTTP status reported by the provider, when there was one */
  readonly statusCode?: number;

  constructor(
    kind: StorageErrorKind,
    message: string,
    options?: { cause?: unknown; statusCode?: number },
  ) {
    super(message, { cause: options?.cause });
    this.kind = kind;
    this.statusCode = options?.statusCode;
  }

  get retryable(): boolean {
    return this.kind === 'transient';
  }
}

/** The destination holds different content; never retried */
export class StorageConflictError extends Error {
  override readonly name = 'StorageConflictError';

  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.key = key;
  }
}

export { UploadPipeline, hashContent } from './upload-pipeline.js';
export { S3StorageProvider, classifyS3Error } from './s3-storage.js';
export type { S3StorageConfig } from './s3-storage.js';
export { StorageError, StorageConflictError } from './errors.js';
export type { StorageErrorKind } from './errors.js';
export { buildDestination, inferContentType } from './keys.js';
export type {
  HashAlgorithm,
  StorageReference,
  UploadJob,
  ExistingObjectPolicy,
  UploadFailureReason,
  UploadResult,
  PutObjectRequest,
  PutObjectOutcome,
  StoredObjectInfo,
  StorageProvider,
  UploadPipelineOptions,
  UploadOptions,
} from './types.js';

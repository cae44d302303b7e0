/**
 * Measurement Handler
 *
 * The RPC handler behind the speed queue:
 *   validate payload -> Worker -> Upload Pipeline -> reply
 *
 * The upload runs only after the Worker succeeds. A failed upload still
 * reports that the report was produced, so the caller can tell a storage
 * problem from a measurement problem.
 *
 * Each call stores under its own key, `<prefix>/<correlationId>/<fileName>`.
 * A redelivered call that finds its key taken keeps the stored object, even
 * if the re-run Worker produced different bytes.
 *
 * @module app/measurement-handler
 */

import type { Logger } from 'pino';
import { REASON_INVALID_REQUEST, REASON_WORKER_ERROR, errorMessage } from '@speed-rpc/broker-rpc';
import type { CallContext, HandlerReply, RpcHandler } from '@speed-rpc/broker-rpc';
import { measureRequestSchema, ReportError } from '../report/types.js';
import type { ReportWorker, WorkerResult } from '../report/types.js';
import { buildDestination } from '../upload/keys.js';
import type { UploadPipeline } from '../upload/upload-pipeline.js';
import type { MeasurementReply } from './types.js';

export interface MeasurementHandlerOptions {
  worker: ReportWorker;
  pipeline: UploadPipeline;

  /** Key prefix for stored reports */
  keyPrefix: string;

  logger: Logger;
}

export function createMeasurementHandler(
  options: MeasurementHandlerOptions,
): RpcHandler<unknown, MeasurementReply> {
  const { worker, pipeline, keyPrefix } = options;
  const logger = options.logger.child({ component: 'measurement-handler' });

  return async (
    payload: unknown,
    context: CallContext,
  ): Promise<HandlerReply<MeasurementReply>> => {
    const log = logger.child({ correlationId: context.correlationId });

    const parsed = measureRequestSchema.safeParse(payload);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((i) => `${i.path.join('.') || 'payload'}: ${i.message}`)
        .join('; ');
      log.warn({ issues: parsed.error.issues.length }, 'Rejected invalid measurement request');
      return {
        status: 'failed',
        reason: REASON_INVALID_REQUEST,
        message: `Invalid request: ${message}`,
      };
    }

    let result: WorkerResult;
    try {
      result = await worker.execute(parsed.data);
    } catch (err) {
      if (err instanceof ReportError && err.code === 'invalid_period') {
        log.warn({ error: err.message }, 'Rejected measurement request');
        return { status: 'failed', reason: REASON_INVALID_REQUEST, message: err.message };
      }
      log.error({ error: errorMessage(err) }, 'Worker failed');
      return { status: 'failed', reason: REASON_WORKER_ERROR, message: errorMessage(err) };
    }

    const { metadata } = result;
    const destination = buildDestination(
      keyPrefix,
      `${context.correlationId}/${metadata.fileName}`,
    );
    const upload = await pipeline.upload(result.content, destination, {
      contentType: metadata.contentType,
      ifExists: 'reuse',
    });

    if (upload.status === 'failed') {
      log.error(
        { reason: upload.reason, attempts: upload.attempts },
        'Report produced but not stored',
      );
      return {
        status: 'failed',
        reason: upload.reason,
        message:
          `Report ${metadata.fileName} was produced but could not be stored: ` + upload.message,
      };
    }

    log.info(
      { key: upload.reference.key, attempts: upload.attempts, reused: upload.reused },
      'Report stored',
    );
    return {
      status: 'ok',
      payload: {
        reference: upload.reference,
        fileName: metadata.fileName,
        period: metadata.period,
      },
    };
  };
}

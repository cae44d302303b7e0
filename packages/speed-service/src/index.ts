/**
 * @speed-rpc/speed-service
 *
 * The speed report worker behind the RPC queue, the upload pipeline that
 * stores its reports, and the client facade a front end calls.
 *
 * @module speed-service
 */

export {
  buildServiceConfig,
  validateServiceConfig,
  brokerUrl,
  adminChatEnabled,
} from './config.js';
export type { ServiceConfig } from './config.js';
export { createLogger } from './logger.js';

export * from './upload/index.js';
export * from './report/index.js';
export * from './notify/index.js';
export * from './app/index.js';
export * from './client/index.js';

export { createMeasurementHandler } from './measurement-handler.js';
export type { MeasurementHandlerOptions } from './measurement-handler.js';
export { SpeedWorkerApp } from './speed-worker-app.js';
export type { AppState, SpeedWorkerAppOptions, SpeedWorkerAppEvents } from './speed-worker-app.js';
export { measurementReplySchema, storageReferenceSchema } from './types.js';
export type { MeasurementReply, MeasurementFailureReason } from './types.js';

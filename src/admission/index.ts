export { groupPending, compareRequests, toQueueView } from './admission-grouper.js';
export { toAdmissionRequest, type WorkloadReaderOptions } from './workload-reader.js';
export { AdmissionService } from './admission-service.js';
export type { AdmissionRequest, QueueGroup, QueueEntry, QueueView } from './types.js';

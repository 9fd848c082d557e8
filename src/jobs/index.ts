export { JobService } from './job-service.js';
export {
  buildJobManifest,
  prepareNativeManifest,
  calcResources,
  uniqueJobName,
  timestampTag,
  POD_GROUP_NAME_LABEL,
  POD_GROUP_TOTAL_ANNOTATION,
  GPU_TYPE_ANNOTATION,
} from './manifest-builder.js';
export { JobCreateRequestSchema, NativeJobManifestSchema } from './types.js';
export type {
  JobCreateRequest,
  NativeJobManifest,
  PendingJob,
  ManifestOptions,
  ResourceShare,
} from './types.js';

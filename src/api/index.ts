export { APIServer, statusFor } from './server.js';
export { verifyApiKey, createAuthMiddleware, createCorsMiddleware, type RequestHandler } from './auth.js';
export { PriorityUpdateSchema } from './types.js';
export type {
  APIServerConfig,
  APIServices,
  PriorityUpdateRequest,
  HealthResponse,
  NodesResponse,
  NodeResponse,
  GpuPodsResponse,
  PendingWorkloadsResponse,
  PendingJobsResponse,
  JobIdResponse,
  APIError,
} from './types.js';

/**
 * REST API — Types
 *
 * Request/response shapes for the gpuboard HTTP API.
 */

import { z } from 'zod';
import type { AdmissionService, QueueView } from '../admission/index.js';
import type { InventoryService, GpuPodUsage, NodeInventory } from '../inventory/index.js';
import type { JobService, PendingJob } from '../jobs/index.js';

// ─── API Server Config ──────────────────────────────────────

export interface APIServerConfig {
  port: number;
  host?: string;
  apiKey?: string;
  corsOrigins?: string[];
  corsAllowCredentials?: boolean;
}

export interface APIServices {
  inventory: InventoryService;
  admission: AdmissionService;
  jobs: JobService;
}

// ─── Requests ───────────────────────────────────────────────

export const PriorityUpdateSchema = z.object({
  priority: z.string().min(1),
  namespace: z.string().min(1).optional(),
});

export type PriorityUpdateRequest = z.infer<typeof PriorityUpdateSchema>;

// ─── Responses ──────────────────────────────────────────────

export interface HealthResponse {
  status: 'ok';
  version: string;
  uptime: number;
}

export interface NodesResponse {
  nodes: NodeInventory[];
}

export interface NodeResponse {
  node: NodeInventory;
}

export interface GpuPodsResponse {
  node: string;
  gpuId: string;
  pods: GpuPodUsage[];
}

export interface PendingWorkloadsResponse {
  pendingWorkloads: QueueView;
}

export interface PendingJobsResponse {
  pendingJobs: PendingJob[];
}

export interface JobIdResponse {
  jobId: string;
}

// ─── API Error ──────────────────────────────────────────────

export interface APIError {
  error: string;
  code: string;
  details?: unknown;
}

import { z } from 'zod';

// ===== Job submission =====

export const JobCreateRequestSchema = z.object({
  name: z.string().regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/).max(63).optional(),
  namespace: z.string().min(1).optional(),
  gpuCount: z.number().int().min(0).max(64),
  cpuPct: z.number().int().min(0).max(100),
  memPct: z.number().int().min(0).max(100),
  /** Per-GPU core and memory share */
  gpuPct: z.number().int().min(1).max(100),
  userName: z.string(),
  teamName: z.string(),
  priority: z.string().min(1),
  gpuType: z.string().optional(),
  image: z.string().optional(),
  command: z.array(z.string()).optional(),
  labels: z.record(z.string()).optional(),
  annotations: z.record(z.string()).optional(),
  gangScheduling: z.boolean().default(false),
  gangCount: z.number().int().min(1).default(1),
  gangId: z.string().optional(),
  podGroupName: z.string().optional(),
  podGroupTotal: z.number().int().min(1).optional(),
});

export type JobCreateRequest = z.infer<typeof JobCreateRequestSchema>;

const StringMap = z.record(z.string());

export const NativeJobManifestSchema = z.object({
  apiVersion: z.string().default('batch/v1'),
  kind: z.literal('Job').default('Job'),
  metadata: z.object({
    name: z.string().min(1),
    namespace: z.string().optional(),
    labels: StringMap.default({}),
    annotations: StringMap.default({}),
  }).passthrough(),
  spec: z.object({
    template: z.object({
      metadata: z.object({
        labels: StringMap.default({}),
        annotations: StringMap.default({}),
      }).passthrough().default({}),
      spec: z.record(z.unknown()),
    }).passthrough(),
  }).passthrough(),
});

export type NativeJobManifest = z.infer<typeof NativeJobManifestSchema>;

// ===== Pending jobs =====

export interface PendingJob {
  jobId: string;
  namespace: string;
  priority: string;
  createdAt: string;
  userName: string;
  teamName: string;
  status: 'Pending';
  gpuType: string | null;
  /** Seconds since creation, null when the creation time is unknown */
  waitingSeconds: number | null;
}

export interface ManifestOptions {
  namespace: string;
  queueName: string;
  queueLabel: string;
  schedulerName: string;
  image: string;
  defaultGpuTypes: string;
  nodeSelector: Record<string, string>;
  backoffLimit: number;
  resourcePrefix: string;
  userAnnotation: string;
  teamAnnotation: string;
}

export interface ResourceShare {
  cpu: number;
  gpu: number;
  memoryMi: number;
}

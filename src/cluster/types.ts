/**
 * Cluster Types — raw Kubernetes objects as gpuboard reads them.
 *
 * Only the fields the reconciliation engine consumes are modelled. Everything
 * coming off the wire is validated with these schemas at the source boundary,
 * unknown fields are stripped.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════
// OBJECT META
// ═══════════════════════════════════════════════════════════════

const StringMap = z.record(z.string());

export const ObjectMetaSchema = z.object({
  name: z.string(),
  namespace: z.string().optional(),
  creationTimestamp: z.string().optional(),
  labels: StringMap.nullish(),
  annotations: StringMap.nullish(),
});

export type ObjectMeta = z.infer<typeof ObjectMetaSchema>;

// ═══════════════════════════════════════════════════════════════
// NODES & PODS
// ═══════════════════════════════════════════════════════════════

export const RawNodeSchema = z.object({
  metadata: ObjectMetaSchema,
  status: z.object({
    allocatable: StringMap.nullish(),
    capacity: StringMap.nullish(),
  }).optional(),
});

export type RawNode = z.infer<typeof RawNodeSchema>;

export const RawPodSchema = z.object({
  metadata: ObjectMetaSchema,
  spec: z.object({
    nodeName: z.string().optional(),
  }).optional(),
  status: z.object({
    phase: z.string().optional(),
  }).optional(),
});

export type RawPod = z.infer<typeof RawPodSchema>;

// ═══════════════════════════════════════════════════════════════
// KUEUE WORKLOADS
// ═══════════════════════════════════════════════════════════════

const QuantitySchema = z.union([z.string(), z.number()]).transform(String);

const ContainerSchema = z.object({
  name: z.string().optional(),
  resources: z.object({
    requests: z.record(QuantitySchema).optional(),
  }).optional(),
});

export const RawWorkloadSchema = z.object({
  metadata: ObjectMetaSchema,
  spec: z.object({
    queueName: z.string().optional(),
    priority: z.number().int().optional(),
    podSets: z.array(z.object({
      name: z.string().optional(),
      count: z.number().optional(),
      template: z.object({
        spec: z.object({
          containers: z.array(ContainerSchema).default([]),
        }).optional(),
      }).optional(),
    })).default([]),
  }).default({}),
  status: z.object({
    admission: z.unknown().optional(),
  }).optional(),
});

export type RawWorkload = z.infer<typeof RawWorkloadSchema>;

// ═══════════════════════════════════════════════════════════════
// BATCH JOBS
// ═══════════════════════════════════════════════════════════════

export const RawJobSchema = z.object({
  metadata: ObjectMetaSchema,
  spec: z.object({
    suspend: z.boolean().optional(),
    template: z.object({
      metadata: z.object({
        labels: StringMap.nullish(),
        annotations: StringMap.nullish(),
      }).optional(),
    }).optional(),
  }).optional(),
});

export type RawJob = z.infer<typeof RawJobSchema>;

export const ListSchema = <T extends z.ZodTypeAny>(item: T) =>
  z.object({ items: z.array(item).nullish().transform(items => items ?? []) });

// ═══════════════════════════════════════════════════════════════
// SOURCES
// ═══════════════════════════════════════════════════════════════

/**
 * Read side of the cluster. Implementations either return a complete list
 * or throw; partial results are never returned.
 */
export interface ClusterSource {
  listNodes(): Promise<RawNode[]>;
  /** All pods, or only the pods bound to `nodeName` */
  listPods(nodeName?: string): Promise<RawPod[]>;
  listWorkloads(): Promise<RawWorkload[]>;
}

/** Manifest accepted by the batch API; only `metadata` is inspected locally. */
export interface JobManifest {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    namespace?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
  };
  spec: Record<string, unknown>;
}

/**
 * Write side for batch Jobs.
 */
export interface JobStore {
  listJobs(): Promise<RawJob[]>;
  getJob(namespace: string, name: string): Promise<RawJob | undefined>;
  /** Throws JobConflictError when the name is taken */
  createJob(namespace: string, manifest: JobManifest): Promise<void>;
  /** Resolves false when the job does not exist */
  deleteJob(namespace: string, name: string): Promise<boolean>;
  /** Merge-patches job labels; resolves false when the job does not exist */
  patchJobLabels(namespace: string, name: string, labels: Record<string, string>): Promise<boolean>;
}

/** A complete, point-in-time view of what the engine reads. */
export interface ClusterSnapshot {
  nodes: RawNode[];
  pods: RawPod[];
  workloads: RawWorkload[];
}

export const ClusterSnapshotSchema = z.object({
  nodes: z.array(RawNodeSchema).default([]),
  pods: z.array(RawPodSchema).default([]),
  workloads: z.array(RawWorkloadSchema).default([]),
});

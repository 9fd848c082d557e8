/**
 * Builders for the raw Kubernetes objects the engine reads.
 */

import { RawJobSchema, RawWorkloadSchema, type RawJob, type RawNode, type RawPod, type RawWorkload } from '../../src/cluster/types.js';
import { GpuBoardConfigSchema, type GpuBoardConfig, type GpuBoardConfigInput } from '../../src/core/types.js';

export const ALLOCATION = 'hami.io/vgpu-devices-allocated';
export const MEMBER = 'example.com/member';
export const TEAM = 'example.com/team';

export function testConfig(overrides: GpuBoardConfigInput = {}): GpuBoardConfig {
  return GpuBoardConfigSchema.parse(overrides);
}

export function makeNode(
  name: string,
  options: { labels?: Record<string, string>; allocatable?: Record<string, string> } = {},
): RawNode {
  return {
    metadata: { name, labels: options.labels },
    status: { allocatable: options.allocatable },
  };
}

export interface PodOptions {
  allocation?: string;
  user?: string;
  team?: string;
  namespace?: string;
}

export function makePod(name: string, nodeName: string, options: PodOptions = {}): RawPod {
  const annotations: Record<string, string> = {};
  if (options.allocation !== undefined) annotations[ALLOCATION] = options.allocation;
  if (options.user !== undefined) annotations[MEMBER] = options.user;
  if (options.team !== undefined) annotations[TEAM] = options.team;
  return {
    metadata: { name, namespace: options.namespace ?? 'default', annotations },
    spec: { nodeName },
    status: { phase: 'Running' },
  };
}

export interface WorkloadOptions {
  namespace?: string;
  queueName?: string;
  queueLabel?: string;
  priority?: number;
  createdAt?: string;
  admitted?: boolean;
  requests?: Record<string, string>[];
  user?: string;
  team?: string;
}

export function makeWorkload(name: string, options: WorkloadOptions = {}): RawWorkload {
  const labels: Record<string, string> = {};
  if (options.queueLabel) labels['kueue.x-k8s.io/queue-name'] = options.queueLabel;
  const annotations: Record<string, string> = {};
  if (options.user) annotations[MEMBER] = options.user;
  if (options.team) annotations[TEAM] = options.team;

  return RawWorkloadSchema.parse({
    metadata: {
      name,
      namespace: options.namespace ?? 'default',
      creationTimestamp: options.createdAt,
      labels,
      annotations,
    },
    spec: {
      queueName: options.queueName,
      priority: options.priority,
      podSets: [{
        name: 'main',
        count: 1,
        template: {
          spec: {
            containers: (options.requests ?? []).map(requests => ({ resources: { requests } })),
          },
        },
      }],
    },
    status: options.admitted ? { admission: { clusterQueue: 'cluster-queue' } } : {},
  });
}

export function makeJob(
  name: string,
  options: {
    namespace?: string;
    suspend?: boolean;
    createdAt?: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
    podAnnotations?: Record<string, string>;
  } = {},
): RawJob {
  return RawJobSchema.parse({
    metadata: {
      name,
      namespace: options.namespace ?? 'default',
      creationTimestamp: options.createdAt,
      labels: options.labels,
      annotations: options.annotations,
    },
    spec: {
      suspend: options.suspend,
      template: { metadata: { annotations: options.podAnnotations } },
    },
  });
}

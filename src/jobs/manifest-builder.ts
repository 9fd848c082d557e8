/**
 * Job manifest templating for GPU batch jobs submitted through the queue.
 *
 * Jobs are created suspended; the queue controller unsuspends them on
 * admission. Gang-scheduled jobs carry the pod-group name and size Kueue
 * uses to admit the group as one unit.
 */

import { customAlphabet } from 'nanoid';
import type { JobManifest } from '../cluster/types.js';
import type { JobCreateRequest, ManifestOptions, NativeJobManifest, ResourceShare } from './types.js';

export const POD_GROUP_NAME_LABEL = 'kueue.x-k8s.io/pod-group-name';
export const POD_GROUP_TOTAL_ANNOTATION = 'kueue.x-k8s.io/pod-group-total-count';
export const GPU_TYPE_ANNOTATION = 'nvidia.com/use-gputype';

/** Per-GPU baseline the CPU and memory percentages scale */
const CPU_PER_GPU = 8;
const MEMORY_MI_PER_GPU = 64000;

const nameSuffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 6);

export function calcResources(gpuCount: number, cpuPct: number, memPct: number): ResourceShare {
  return {
    cpu: Math.floor((CPU_PER_GPU * gpuCount * cpuPct) / 100),
    gpu: gpuCount,
    memoryMi: Math.floor((MEMORY_MI_PER_GPU * gpuCount * memPct) / 100),
  };
}

/** `yyyymmddHHMMSS` in UTC */
export function timestampTag(now: Date): string {
  return now.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

export function uniqueJobName(base: string, now: Date = new Date()): string {
  return `${base}-${timestampTag(now)}-${nameSuffix()}`;
}

export function buildJobManifest(
  request: JobCreateRequest,
  options: ManifestOptions,
  now: Date = new Date(),
): JobManifest {
  const name = request.name ?? uniqueJobName('job', now);
  const namespace = request.namespace ?? options.namespace;
  const share = calcResources(request.gpuCount, request.cpuPct, request.memPct);

  const jobLabels: Record<string, string> = {
    app: 'gpuboard-job',
    [options.queueLabel]: options.queueName,
    priority: request.priority,
    ...request.labels,
  };
  const podLabels: Record<string, string> = { ...jobLabels };

  const jobAnnotations: Record<string, string> = {
    ...request.annotations,
    [options.userAnnotation]: request.userName,
    [options.teamAnnotation]: request.teamName,
  };
  const podAnnotations: Record<string, string> = {
    'hami.io/node-scheduler-policy': 'binpack',
    'hami.io/gpu-scheduler-policy': 'binpack',
    ...jobAnnotations,
    [GPU_TYPE_ANNOTATION]: request.gpuType ?? jobAnnotations[GPU_TYPE_ANNOTATION] ?? options.defaultGpuTypes,
  };

  const parallelism = request.gangScheduling ? request.gangCount : 1;
  if (request.gangScheduling) {
    const groupName = request.gangId ?? request.podGroupName;
    if (groupName) {
      podLabels[POD_GROUP_NAME_LABEL] = groupName;
    }
    if (request.podGroupTotal) {
      jobAnnotations[POD_GROUP_TOTAL_ANNOTATION] = String(request.podGroupTotal);
      podAnnotations[POD_GROUP_TOTAL_ANNOTATION] = String(request.podGroupTotal);
    }
  }

  const requests: Record<string, string> = {
    [`${options.resourcePrefix}/gpu`]: String(share.gpu),
    cpu: String(share.cpu),
    memory: `${share.memoryMi}Mi`,
  };
  const limits: Record<string, string> = {
    ...requests,
    'nvidia.com/gpucores': String(request.gpuPct),
    'nvidia.com/gpumem-percentage': String(request.gpuPct),
  };

  const container: Record<string, unknown> = {
    name: 'main',
    image: request.image ?? options.image,
    resources: { requests, limits },
  };
  if (request.command) {
    container.command = request.command;
  }

  return {
    apiVersion: 'batch/v1',
    kind: 'Job',
    metadata: { name, namespace, labels: jobLabels, annotations: jobAnnotations },
    spec: {
      suspend: true,
      parallelism,
      completions: parallelism,
      backoffLimit: options.backoffLimit,
      template: {
        metadata: { labels: podLabels, annotations: podAnnotations },
        spec: {
          schedulerName: options.schedulerName,
          containers: [container],
          restartPolicy: 'Never',
          nodeSelector: options.nodeSelector,
          tolerations: [{ key: 'gpu', operator: 'Exists', effect: 'NoSchedule' }],
        },
      },
    },
  };
}

/**
 * Copy the gang grouping of a caller-written Job onto its pod template, where
 * the queue controller reads it.
 */
export function prepareNativeManifest(manifest: NativeJobManifest): JobManifest {
  const { metadata } = manifest;
  const template = manifest.spec.template;
  const groupName = metadata.labels[POD_GROUP_NAME_LABEL];
  const groupTotal = metadata.annotations[POD_GROUP_TOTAL_ANNOTATION];

  if (groupName) {
    template.metadata.labels[POD_GROUP_NAME_LABEL] = groupName;
    if (groupTotal) {
      template.metadata.annotations[POD_GROUP_TOTAL_ANNOTATION] = groupTotal;
    }
  }

  return manifest;
}

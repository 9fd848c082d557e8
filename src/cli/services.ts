/**
 * Wires the engine services from a loaded configuration.
 */

import type { Logger } from 'pino';
import { AdmissionService, type WorkloadReaderOptions } from '../admission/index.js';
import { KubeApiSource, SnapshotSource, resolveKubeCredentials } from '../cluster/index.js';
import type { ClusterSource, JobStore } from '../cluster/index.js';
import type { GpuBoardConfig } from '../core/types.js';
import { InventoryService } from '../inventory/index.js';
import { JobService, type ManifestOptions } from '../jobs/index.js';

export function workloadReaderOptions(config: GpuBoardConfig): WorkloadReaderOptions {
  return {
    queueLabel: config.admission.queueLabel,
    defaultQueue: config.admission.defaultQueue,
    resourcePrefix: config.inventory.resourcePrefix,
    userAnnotation: config.inventory.userAnnotation,
    teamAnnotation: config.inventory.teamAnnotation,
  };
}

export function manifestOptions(config: GpuBoardConfig): ManifestOptions {
  return {
    ...config.jobs,
    queueLabel: config.admission.queueLabel,
    resourcePrefix: config.inventory.resourcePrefix,
    userAnnotation: config.inventory.userAnnotation,
    teamAnnotation: config.inventory.teamAnnotation,
  };
}

export function createKubeSource(config: GpuBoardConfig, logger?: Logger): KubeApiSource {
  return new KubeApiSource({
    credentials: resolveKubeCredentials(config.cluster),
    timeoutMs: config.cluster.requestTimeoutMs,
    maxRetries: config.cluster.maxRetries,
    podLabelSelector: config.cluster.podLabelSelector,
    logger,
  });
}

/** Read-side source: a snapshot file when given, the live cluster otherwise */
export function createClusterSource(config: GpuBoardConfig, snapshotPath?: string, logger?: Logger): ClusterSource {
  return snapshotPath ? SnapshotSource.fromFile(snapshotPath) : createKubeSource(config, logger);
}

export function createInventoryService(source: ClusterSource, config: GpuBoardConfig, logger?: Logger): InventoryService {
  return new InventoryService(source, config.inventory, logger);
}

export function createAdmissionService(source: ClusterSource, config: GpuBoardConfig, logger?: Logger): AdmissionService {
  return new AdmissionService(source, workloadReaderOptions(config), logger);
}

export function createJobService(store: JobStore, config: GpuBoardConfig, logger?: Logger): JobService {
  return new JobService(store, manifestOptions(config), logger);
}

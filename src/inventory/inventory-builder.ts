/**
 * InventoryBuilder — runs the reconciliation pipeline over one snapshot:
 *
 *   pods ──index by node──▶ parse annotations ──▶ aggregate per GPU ──▶ fixed slots
 *
 * Pure apart from logging: the same snapshot always yields the same output.
 */

import type { Logger } from 'pino';
import type { RawNode, RawPod } from '../cluster/types.js';
import type { InventoryConfig } from '../core/types.js';
import { getLogger } from '../core/logger.js';
import { NodeIdentity } from './node-identity.js';
import { parseAllocation } from './allocation-parser.js';
import { aggregateAllocations } from './gpu-aggregator.js';
import { countOverflow, normalizeSlots } from './slot-normalizer.js';
import {
  UNKNOWN_GPU_FAMILY,
  type AllocationRecord,
  type GPUSlot,
  type GpuPodUsage,
  type NodeInventory,
  type NodeStatus,
  type PodAllocation,
} from './types.js';

const NVIDIA_GPU_RESOURCE = 'nvidia.com/gpu';

export class InventoryBuilder {
  readonly identity: NodeIdentity;
  private readonly logger: Logger;

  constructor(private readonly config: InventoryConfig, logger?: Logger) {
    this.identity = new NodeIdentity(config.nodePrefix);
    this.logger = logger ?? getLogger();
  }

  /**
   * Build the inventory of every correctly named node. Pods are indexed by
   * node once, so the pass is linear in nodes + pods.
   */
  buildAll(nodes: RawNode[], pods: RawPod[]): NodeInventory[] {
    const podsByNode = indexPodsByNode(pods);
    const result: NodeInventory[] = [];
    for (const node of nodes) {
      if (!this.identity.isValid(node.metadata.name)) continue;
      result.push(this.buildNode(node, podsByNode.get(node.metadata.name) ?? []));
    }
    return result;
  }

  /** Build one node's inventory from the pods already bound to it. */
  buildNode(node: RawNode, pods: RawPod[]): NodeInventory {
    const name = node.metadata.name;
    const gpuFamily = this.resolveFamily(node);
    const slotsById = aggregateAllocations(this.podAllocations(pods), gpuFamily);

    const dropped = countOverflow(slotsById, this.config.slotCount);
    if (dropped > 0) {
      this.logger.warn(
        { node: name, gpus: slotsById.size, slotCount: this.config.slotCount, dropped },
        'GPUs beyond slot count dropped from inventory view',
      );
    }

    return {
      name,
      gpuFamily,
      slotCount: this.config.slotCount,
      status: this.resolveStatus(node, countAllocated(slotsById)),
      slots: normalizeSlots(slotsById, this.config.slotCount, gpuFamily),
    };
  }

  /** Every pod's allocation on `gpuId`, in pod then record order. */
  gpuPods(pods: RawPod[], gpuId: string): GpuPodUsage[] {
    const usage: GpuPodUsage[] = [];
    for (const pod of pods) {
      const { userName, teamName } = this.tenantOf(pod);
      for (const record of this.recordsOf(pod)) {
        if (record.gpuId !== gpuId) continue;
        usage.push({
          podName: pod.metadata.name,
          namespace: pod.metadata.namespace ?? '',
          allocationUnits: record.allocationUnits,
          userName,
          teamName,
        });
      }
    }
    return usage;
  }

  podAllocations(pods: RawPod[]): PodAllocation[] {
    const allocations: PodAllocation[] = [];
    for (const pod of pods) {
      const { userName, teamName } = this.tenantOf(pod);
      for (const record of this.recordsOf(pod)) {
        allocations.push({ podName: pod.metadata.name, record, userName, teamName });
      }
    }
    return allocations;
  }

  /** Family label wins, then the name-derived family, then the sentinel. */
  resolveFamily(node: RawNode): string {
    const label = node.metadata.labels?.[this.config.gpuFamilyLabel]?.trim();
    if (label) return label;
    return this.identity.classify(node.metadata.name).gpuFamily ?? UNKNOWN_GPU_FAMILY;
  }

  resolveStatus(node: RawNode, allocatedGpus: number): NodeStatus {
    if (allocatedGpus > 0) return 'Active';

    const allocatable = node.status?.allocatable ?? {};
    let malformed = false;
    for (const resource of [NVIDIA_GPU_RESOURCE, `${this.config.resourcePrefix}/gpu`]) {
      const quantity = allocatable[resource];
      if (quantity === undefined) continue;
      if (!/^\d+$/.test(quantity)) {
        malformed = true;
        continue;
      }
      if (Number.parseInt(quantity, 10) > 0) return 'Available';
    }
    return malformed ? 'Error' : 'NoGPU';
  }

  private recordsOf(pod: RawPod): AllocationRecord[] {
    return parseAllocation(pod.metadata.annotations?.[this.config.allocationAnnotation]);
  }

  private tenantOf(pod: RawPod): { userName: string; teamName: string } {
    const annotations = pod.metadata.annotations ?? {};
    return {
      userName: annotations[this.config.userAnnotation] ?? '',
      teamName: annotations[this.config.teamAnnotation] ?? '',
    };
  }
}

export function indexPodsByNode(pods: RawPod[]): Map<string, RawPod[]> {
  const index = new Map<string, RawPod[]>();
  for (const pod of pods) {
    const nodeName = pod.spec?.nodeName;
    if (!nodeName) continue;
    const bucket = index.get(nodeName);
    if (bucket) {
      bucket.push(pod);
    } else {
      index.set(nodeName, [pod]);
    }
  }
  return index;
}

function countAllocated(slotsById: ReadonlyMap<string, GPUSlot>): number {
  let allocated = 0;
  for (const slot of slotsById.values()) {
    if (slot.totalAllocation > 0) allocated++;
  }
  return allocated;
}

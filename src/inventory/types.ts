/**
 * Inventory Types — per-GPU allocation breakdown for fractional-GPU nodes.
 */

// ═══════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════

export interface AllocationRecord {
  /** Empty for placeholders and malformed input */
  gpuId: string;
  /** Share of the GPU, 0-100 */
  allocationUnits: number;
}

export type AllocationEncoding = 'compact' | 'extended';

// ═══════════════════════════════════════════════════════════════
// AGGREGATION
// ═══════════════════════════════════════════════════════════════

export interface PodAllocation {
  podName: string;
  record: AllocationRecord;
  userName: string;
  teamName: string;
}

export interface TenantSegment {
  userName: string;
  teamName: string;
  allocationUnits: number;
}

export type SlotSource = 'pod_annotation' | 'node_status';

export interface GPUSlot {
  /** Empty string marks an unfilled placeholder */
  gpuId: string;
  gpuFamily: string;
  totalAllocation: number;
  source: SlotSource;
  contributingPods: string[];
  segments: TenantSegment[];
}

// ═══════════════════════════════════════════════════════════════
// NODES
// ═══════════════════════════════════════════════════════════════

export type NodeStatus = 'Active' | 'Available' | 'NoGPU' | 'Error';

export interface NodeInventory {
  name: string;
  gpuFamily: string;
  slotCount: number;
  status: NodeStatus;
  slots: GPUSlot[];
}

export interface NodeClassification {
  valid: boolean;
  gpuFamily?: string;
}

export interface GpuPodUsage {
  podName: string;
  namespace: string;
  allocationUnits: number;
  userName: string;
  teamName: string;
}

/** Sentinel family for nodes whose family cannot be derived */
export const UNKNOWN_GPU_FAMILY = 'UNKNOWN';

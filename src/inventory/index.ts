/**
 * Inventory Module — per-GPU allocation breakdown for fractional-GPU nodes.
 *
 * @example
 * ```typescript
 * import { InventoryBuilder } from 'gpuboard';
 *
 * const builder = new InventoryBuilder(config.inventory);
 * const nodes = builder.buildAll(snapshot.nodes, snapshot.pods);
 * ```
 */

export { NodeIdentity } from './node-identity.js';
export { parseAllocation, detectEncoding } from './allocation-parser.js';
export { aggregateAllocations } from './gpu-aggregator.js';
export { normalizeSlots, countOverflow, placeholderSlot } from './slot-normalizer.js';
export { InventoryBuilder, indexPodsByNode } from './inventory-builder.js';
export { InventoryService } from './inventory-service.js';
export { UNKNOWN_GPU_FAMILY } from './types.js';
export type {
  AllocationRecord,
  AllocationEncoding,
  PodAllocation,
  TenantSegment,
  SlotSource,
  GPUSlot,
  NodeStatus,
  NodeInventory,
  NodeClassification,
  GpuPodUsage,
} from './types.js';

import type { GPUSlot } from './types.js';

export function placeholderSlot(gpuFamily: string): GPUSlot {
  return {
    gpuId: '',
    gpuFamily,
    totalAllocation: 0,
    source: 'node_status',
    contributingPods: [],
    segments: [],
  };
}

/**
 * Fit a node's GPUs into exactly `slotCount` presentation slots, in the
 * order the aggregator produced them. Surplus GPUs are dropped; see
 * `countOverflow` to report them.
 */
export function normalizeSlots(
  slotsById: ReadonlyMap<string, GPUSlot>,
  slotCount: number,
  gpuFamily: string,
): GPUSlot[] {
  const slots: GPUSlot[] = [];
  for (const slot of slotsById.values()) {
    if (slots.length >= slotCount) break;
    slots.push(slot);
  }
  while (slots.length < slotCount) {
    slots.push(placeholderSlot(gpuFamily));
  }
  return slots;
}

export function countOverflow(slotsById: ReadonlyMap<string, GPUSlot>, slotCount: number): number {
  return Math.max(0, slotsById.size - slotCount);
}

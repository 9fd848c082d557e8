import { describe, it, expect } from 'vitest';
import { aggregateAllocations } from '../../../src/inventory/gpu-aggregator.js';
import { countOverflow, normalizeSlots, placeholderSlot } from '../../../src/inventory/slot-normalizer.js';
import type { PodAllocation } from '../../../src/inventory/types.js';

function gpus(count: number): PodAllocation[] {
  return Array.from({ length: count }, (_, i) => ({
    podName: `pod-${i}`,
    record: { gpuId: `GPU-${i}`, allocationUnits: 10 },
    userName: 'alice',
    teamName: 'ml',
  }));
}

describe('normalizeSlots', () => {
  it('truncates to the slot count in aggregation order', () => {
    const byId = aggregateAllocations(gpus(10), 'A100');
    const slots = normalizeSlots(byId, 8, 'A100');

    expect(slots).toHaveLength(8);
    expect(slots.map(s => s.gpuId)).toEqual([
      'GPU-0', 'GPU-1', 'GPU-2', 'GPU-3', 'GPU-4', 'GPU-5', 'GPU-6', 'GPU-7',
    ]);
    expect(countOverflow(byId, 8)).toBe(2);
  });

  it('pads with placeholder slots', () => {
    const byId = aggregateAllocations(gpus(3), 'H100');
    const slots = normalizeSlots(byId, 8, 'H100');

    expect(slots).toHaveLength(8);
    expect(slots.slice(0, 3).map(s => s.source)).toEqual(['pod_annotation', 'pod_annotation', 'pod_annotation']);
    for (const slot of slots.slice(3)) {
      expect(slot).toEqual(placeholderSlot('H100'));
    }
    expect(countOverflow(byId, 8)).toBe(0);
  });

  it('fills an idle node with placeholders only', () => {
    const slots = normalizeSlots(new Map(), 4, 'L40S');
    expect(slots).toEqual([
      placeholderSlot('L40S'),
      placeholderSlot('L40S'),
      placeholderSlot('L40S'),
      placeholderSlot('L40S'),
    ]);
  });

  it('builds placeholders with no usage', () => {
    expect(placeholderSlot('A100')).toEqual({
      gpuId: '',
      gpuFamily: 'A100',
      totalAllocation: 0,
      source: 'node_status',
      contributingPods: [],
      segments: [],
    });
  });
});

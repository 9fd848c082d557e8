import { describe, it, expect } from 'vitest';
import { aggregateAllocations } from '../../../src/inventory/gpu-aggregator.js';
import type { PodAllocation } from '../../../src/inventory/types.js';

function alloc(podName: string, gpuId: string, units: number, userName = '', teamName = ''): PodAllocation {
  return { podName, record: { gpuId, allocationUnits: units }, userName, teamName };
}

describe('aggregateAllocations', () => {
  it('sums tenants per GPU and orders segments by share', () => {
    const slots = aggregateAllocations([
      alloc('p1', 'GPU-a', 20, 'alice', 'ml'),
      alloc('p2', 'GPU-a', 50, 'bob', 'vision'),
      alloc('p3', 'GPU-a', 10, 'alice', 'ml'),
    ], 'A100');

    const slot = slots.get('GPU-a');
    expect(slot).toEqual({
      gpuId: 'GPU-a',
      gpuFamily: 'A100',
      totalAllocation: 80,
      source: 'pod_annotation',
      contributingPods: ['p1', 'p2', 'p3'],
      segments: [
        { userName: 'bob', teamName: 'vision', allocationUnits: 50 },
        { userName: 'alice', teamName: 'ml', allocationUnits: 30 },
      ],
    });
  });

  it('keeps first-seen order for equal shares', () => {
    const slot = aggregateAllocations([
      alloc('p1', 'GPU-a', 30, 'carol', 'x'),
      alloc('p2', 'GPU-a', 30, 'dave', 'y'),
    ], 'A100').get('GPU-a');

    expect(slot?.segments.map(s => s.userName)).toEqual(['carol', 'dave']);
  });

  it('emits GPUs in first-seen order', () => {
    const slots = aggregateAllocations([
      alloc('p1', 'GPU-b', 10),
      alloc('p2', 'GPU-a', 10),
      alloc('p3', 'GPU-b', 10),
    ], 'H100');

    expect([...slots.keys()]).toEqual(['GPU-b', 'GPU-a']);
  });

  it('skips placeholder records', () => {
    const slots = aggregateAllocations([alloc('p1', '', 0), alloc('p2', 'GPU-a', 5)], 'A100');
    expect([...slots.keys()]).toEqual(['GPU-a']);
  });

  it('pools anonymous usage into one segment', () => {
    const slot = aggregateAllocations([
      alloc('p1', 'GPU-a', 10),
      alloc('p2', 'GPU-a', 15),
      alloc('p3', 'GPU-a', 5, 'erin', 'ops'),
    ], 'A100').get('GPU-a');

    expect(slot?.segments).toEqual([
      { userName: '', teamName: '', allocationUnits: 25 },
      { userName: 'erin', teamName: 'ops', allocationUnits: 5 },
    ]);
    const segmentSum = slot?.segments.reduce((sum, s) => sum + s.allocationUnits, 0);
    expect(segmentSum).toBe(slot?.totalAllocation);
  });

  it('has no segments when nothing is allocated', () => {
    const slot = aggregateAllocations([alloc('p1', 'GPU-a', 0, 'alice', 'ml')], 'A100').get('GPU-a');
    expect(slot?.totalAllocation).toBe(0);
    expect(slot?.contributingPods).toEqual(['p1']);
    expect(slot?.segments).toEqual([]);
  });
});

/**
 * GPUAggregator — merges the allocation records of every pod on one node
 * into one slot per physical GPU, with a per-tenant breakdown.
 *
 * Both levels are keyed by insertion-ordered Maps: slots come out in the
 * order their GPU id was first seen, segments tie-break on first sighting.
 */

import type { GPUSlot, PodAllocation, TenantSegment } from './types.js';

interface GpuBucket {
  totalAllocation: number;
  contributingPods: string[];
  /** (user, team) key -> segment, in first-seen order */
  tenants: Map<string, TenantSegment>;
}

export function aggregateAllocations(
  podRecords: Iterable<PodAllocation>,
  gpuFamily: string,
): Map<string, GPUSlot> {
  const buckets = new Map<string, GpuBucket>();

  for (const { podName, record, userName, teamName } of podRecords) {
    if (!record.gpuId) continue;

    let bucket = buckets.get(record.gpuId);
    if (!bucket) {
      bucket = { totalAllocation: 0, contributingPods: [], tenants: new Map() };
      buckets.set(record.gpuId, bucket);
    }

    bucket.totalAllocation += record.allocationUnits;
    bucket.contributingPods.push(podName);

    // Anonymous usage shares the single ("", "") segment.
    const key = JSON.stringify([userName, teamName]);
    const segment = bucket.tenants.get(key);
    if (segment) {
      segment.allocationUnits += record.allocationUnits;
    } else {
      bucket.tenants.set(key, { userName, teamName, allocationUnits: record.allocationUnits });
    }
  }

  const slots = new Map<string, GPUSlot>();
  for (const [gpuId, bucket] of buckets) {
    slots.set(gpuId, {
      gpuId,
      gpuFamily,
      totalAllocation: bucket.totalAllocation,
      source: 'pod_annotation',
      contributingPods: bucket.contributingPods,
      segments: toSegments(bucket),
    });
  }
  return slots;
}

function toSegments(bucket: GpuBucket): TenantSegment[] {
  if (bucket.totalAllocation === 0) return [];
  // Array.prototype.sort is stable, so equal shares keep first-seen order.
  return [...bucket.tenants.values()].sort((a, b) => b.allocationUnits - a.allocationUnits);
}

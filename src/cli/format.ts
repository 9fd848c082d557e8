/**
 * Plain-text rendering for the `nodes` and `queue` commands.
 */

import type { QueueView } from '../admission/index.js';
import type { GPUSlot, NodeInventory, TenantSegment } from '../inventory/index.js';

export function formatTenant(segment: TenantSegment): string {
  if (!segment.userName && !segment.teamName) return 'anonymous';
  return `${segment.userName || '-'}/${segment.teamName || '-'}`;
}

export function formatSlot(slot: GPUSlot, index: number): string {
  if (!slot.gpuId) {
    return `  [${index}] (empty)`;
  }
  const tenants = slot.segments
    .map(s => `${formatTenant(s)} ${s.allocationUnits}%`)
    .join(', ');
  return `  [${index}] ${slot.gpuId}  ${slot.totalAllocation}%${tenants ? `  ${tenants}` : ''}`;
}

export function formatNode(node: NodeInventory): string {
  const lines = [`${node.name}  ${node.gpuFamily}  ${node.status}`];
  node.slots.forEach((slot, i) => lines.push(formatSlot(slot, i)));
  return lines.join('\n');
}

export function formatNodes(nodes: NodeInventory[]): string {
  if (nodes.length === 0) return 'No GPU nodes found.';
  return nodes.map(formatNode).join('\n\n');
}

export function formatQueues(view: QueueView): string {
  const queues = Object.keys(view);
  if (queues.length === 0) return 'No pending workloads.';

  const blocks = queues.map(queue => {
    const entries = view[queue];
    const lines = [`${queue} (${entries.length} pending)`];
    for (const entry of entries) {
      const owner = entry.userName ? `  ${entry.userName}` : '';
      lines.push(`  ${entry.priority}  ${entry.namespace}/${entry.name}  ${entry.createdAt || '-'}${owner}`);
    }
    return lines.join('\n');
  });
  return blocks.join('\n\n');
}

import type { AdmissionRequest, QueueEntry, QueueGroup, QueueView } from './types.js';

/**
 * Keep pending requests, bucket them by queue, order each bucket for triage.
 * Queues come out in name order; queues with nothing pending are omitted.
 */
export function groupPending(requests: Iterable<AdmissionRequest>): Map<string, QueueGroup> {
  const buckets = new Map<string, AdmissionRequest[]>();
  for (const request of requests) {
    if (request.admitted) continue;
    const bucket = buckets.get(request.queueName);
    if (bucket) {
      bucket.push(request);
    } else {
      buckets.set(request.queueName, [request]);
    }
  }

  const groups = new Map<string, QueueGroup>();
  for (const queueName of [...buckets.keys()].sort()) {
    const pending = buckets.get(queueName) ?? [];
    groups.set(queueName, { queueName, requests: [...pending].sort(compareRequests) });
  }
  return groups;
}

/**
 * Priority descending, then oldest first, then namespace/name. Requests
 * without a parseable timestamp sort after those with one.
 */
export function compareRequests(a: AdmissionRequest, b: AdmissionRequest): number {
  if (a.priority !== b.priority) return b.priority - a.priority;

  const ta = createdAtMillis(a);
  const tb = createdAtMillis(b);
  if (ta !== tb) return ta - tb;

  const ka = `${a.namespace}/${a.name}`;
  const kb = `${b.namespace}/${b.name}`;
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

function createdAtMillis(request: AdmissionRequest): number {
  const millis = Date.parse(request.createdAt);
  return Number.isNaN(millis) ? Number.MAX_SAFE_INTEGER : millis;
}

export function toQueueView(groups: Map<string, QueueGroup>): QueueView {
  const view: QueueView = {};
  for (const [queueName, group] of groups) {
    view[queueName] = group.requests.map(toQueueEntry);
  }
  return view;
}

function toQueueEntry(request: AdmissionRequest): QueueEntry {
  return {
    name: request.name,
    namespace: request.namespace,
    priority: request.priority,
    createdAt: request.createdAt,
    resourceRequests: request.resourceRequests,
    userName: request.userName,
    teamName: request.teamName,
  };
}

import type { RawWorkload } from '../cluster/types.js';
import type { AdmissionRequest } from './types.js';

export interface WorkloadReaderOptions {
  queueLabel: string;
  defaultQueue: string;
  resourcePrefix: string;
  userAnnotation: string;
  teamAnnotation: string;
}

/**
 * Project a Kueue Workload onto the fields the grouper reads.
 *
 * Resource requests keep only `<resourcePrefix>/...` names; when several
 * containers request the same resource the last one read wins.
 */
export function toAdmissionRequest(workload: RawWorkload, options: WorkloadReaderOptions): AdmissionRequest {
  const { metadata, spec } = workload;
  const labels = metadata.labels ?? {};
  const annotations = metadata.annotations ?? {};
  const prefix = `${options.resourcePrefix}/`;

  const resourceRequests: Record<string, string> = {};
  for (const podSet of spec.podSets) {
    for (const container of podSet.template?.spec?.containers ?? []) {
      for (const [resource, amount] of Object.entries(container.resources?.requests ?? {})) {
        if (resource.startsWith(prefix)) {
          resourceRequests[resource] = amount;
        }
      }
    }
  }

  return {
    name: metadata.name,
    namespace: metadata.namespace ?? '',
    queueName: spec.queueName || labels[options.queueLabel] || options.defaultQueue,
    priority: spec.priority ?? 0,
    createdAt: metadata.creationTimestamp ?? '',
    resourceRequests,
    admitted: workload.status?.admission != null,
    userName: annotations[options.userAnnotation] ?? '',
    teamName: annotations[options.teamAnnotation] ?? '',
  };
}

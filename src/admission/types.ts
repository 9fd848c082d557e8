/**
 * Admission Types — workloads waiting for the queue controller.
 */

export interface AdmissionRequest {
  name: string;
  namespace: string;
  queueName: string;
  priority: number;
  /** ISO-8601 creation timestamp; empty when the source omitted it */
  createdAt: string;
  resourceRequests: Record<string, string>;
  admitted: boolean;
  userName: string;
  teamName: string;
}

export interface QueueGroup {
  queueName: string;
  /** Priority descending */
  requests: AdmissionRequest[];
}

/** Wire entry of the per-queue view */
export interface QueueEntry {
  name: string;
  namespace: string;
  priority: number;
  createdAt: string;
  resourceRequests: Record<string, string>;
  userName: string;
  teamName: string;
}

export type QueueView = Record<string, QueueEntry[]>;

/**
 * KubeApiSource — Kubernetes REST client for the objects gpuboard reads and
 * the batch Jobs it writes.
 *
 * Uses raw fetch() against the API server with bearer-token auth. List calls
 * are retried with backoff and validated against the cluster schemas; a list
 * that cannot be fetched completely fails as a whole.
 */

import { ZodError, type z } from 'zod';
import type { Logger } from 'pino';
import {
  JobConflictError,
  SnapshotSourceError,
  UpstreamError,
  toError,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { retry } from '../utils/retry.js';
import type { KubeCredentials } from './kubeconfig.js';
import {
  ListSchema,
  RawJobSchema,
  RawNodeSchema,
  RawPodSchema,
  RawWorkloadSchema,
  type ClusterSource,
  type JobManifest,
  type JobStore,
  type RawJob,
  type RawNode,
  type RawPod,
  type RawWorkload,
} from './types.js';

export const KUEUE_API = '/apis/kueue.x-k8s.io/v1beta1';
const BATCH_API = '/apis/batch/v1';

const NodeListSchema = ListSchema(RawNodeSchema);
const PodListSchema = ListSchema(RawPodSchema);
const WorkloadListSchema = ListSchema(RawWorkloadSchema);
const JobListSchema = ListSchema(RawJobSchema);

export interface KubeApiSourceOptions {
  credentials: KubeCredentials;
  timeoutMs?: number;
  maxRetries?: number;
  podLabelSelector?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

type ListResult<T> = z.ZodType<{ items: T[] }, z.ZodTypeDef, unknown>;

export class KubeApiSource implements ClusterSource, JobStore {
  private readonly server: string;
  private readonly token?: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly podLabelSelector?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: KubeApiSourceOptions) {
    this.server = options.credentials.server.replace(/\/+$/, '');
    this.token = options.credentials.token;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxRetries = options.maxRetries ?? 2;
    this.podLabelSelector = options.podLabelSelector;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? getLogger();
  }

  // ─── ClusterSource ────────────────────────────────────────

  async listNodes(): Promise<RawNode[]> {
    return this.list('nodes', '/api/v1/nodes', NodeListSchema);
  }

  async listPods(nodeName?: string): Promise<RawPod[]> {
    const params = new URLSearchParams();
    if (nodeName) params.set('fieldSelector', `spec.nodeName=${nodeName}`);
    if (this.podLabelSelector) params.set('labelSelector', this.podLabelSelector);
    const query = params.toString();
    return this.list('pods', `/api/v1/pods${query ? `?${query}` : ''}`, PodListSchema);
  }

  async listWorkloads(): Promise<RawWorkload[]> {
    return this.list('workloads', `${KUEUE_API}/workloads`, WorkloadListSchema);
  }

  // ─── JobStore ─────────────────────────────────────────────

  async listJobs(): Promise<RawJob[]> {
    return this.list('jobs', `${BATCH_API}/jobs`, JobListSchema);
  }

  async getJob(namespace: string, name: string): Promise<RawJob | undefined> {
    const res = await this.request('GET', jobPath(namespace, name));
    if (res.status === 404) return undefined;
    await this.ensureOk(res, `GET job ${namespace}/${name}`);
    return RawJobSchema.parse(await res.json());
  }

  async createJob(namespace: string, manifest: JobManifest): Promise<void> {
    const res = await this.request('POST', `${BATCH_API}/namespaces/${encodeURIComponent(namespace)}/jobs`, manifest);
    if (res.status === 409) {
      throw new JobConflictError(manifest.metadata.name);
    }
    await this.ensureOk(res, `create job ${namespace}/${manifest.metadata.name}`);
    this.logger.info({ job: manifest.metadata.name, namespace }, 'Job created');
  }

  async deleteJob(namespace: string, name: string): Promise<boolean> {
    const res = await this.request('DELETE', jobPath(namespace, name), { propagationPolicy: 'Background' });
    if (res.status === 404) {
      this.logger.warn({ job: name, namespace }, 'Job not found');
      return false;
    }
    await this.ensureOk(res, `delete job ${namespace}/${name}`);
    this.logger.info({ job: name, namespace }, 'Job deleted');
    return true;
  }

  async patchJobLabels(namespace: string, name: string, labels: Record<string, string>): Promise<boolean> {
    const res = await this.request(
      'PATCH',
      jobPath(namespace, name),
      { metadata: { labels } },
      'application/merge-patch+json',
    );
    if (res.status === 404) return false;
    await this.ensureOk(res, `patch job ${namespace}/${name}`);
    return true;
  }

  // ─── Helpers ──────────────────────────────────────────────

  private async list<T>(resource: string, path: string, schema: ListResult<T>): Promise<T[]> {
    try {
      return await retry(
        async () => {
          const res = await this.request('GET', path);
          await this.ensureOk(res, `GET ${path}`);
          return schema.parse(await res.json()).items;
        },
        { maxRetries: this.maxRetries, shouldRetry: isTransient },
      );
    } catch (err) {
      const error = toError(err);
      this.logger.error({ resource, error: error.message }, 'Kubernetes list failed');
      throw new SnapshotSourceError(`Failed to list ${resource}: ${error.message}`, resource, error);
    }
  }

  private async request(
    method: string,
    path: string,
    body?: unknown,
    contentType = 'application/json',
  ): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;
    if (body !== undefined) headers['Content-Type'] = contentType;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchImpl(`${this.server}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async ensureOk(res: Response, what: string): Promise<void> {
    if (res.ok) return;
    const detail = (await res.text().catch(() => '')).slice(0, 200);
    throw new UpstreamError(`${what} failed with ${res.status}${detail ? `: ${detail}` : ''}`, res.status);
  }
}

function jobPath(namespace: string, name: string): string {
  return `${BATCH_API}/namespaces/${encodeURIComponent(namespace)}/jobs/${encodeURIComponent(name)}`;
}

/** Server errors, throttling and network failures are worth retrying. */
function isTransient(error: Error): boolean {
  if (error instanceof UpstreamError) return error.status >= 500 || error.status === 429;
  return !(error instanceof ZodError);
}

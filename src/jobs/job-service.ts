import type { Logger } from 'pino';
import type { JobStore, RawJob } from '../cluster/types.js';
import { JobNotFoundError, ValidationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import {
  GPU_TYPE_ANNOTATION,
  buildJobManifest,
  prepareNativeManifest,
  uniqueJobName,
} from './manifest-builder.js';
import {
  JobCreateRequestSchema,
  NativeJobManifestSchema,
  type ManifestOptions,
  type PendingJob,
} from './types.js';
import type { ZodError } from 'zod';

/**
 * Submission and housekeeping for GPU batch Jobs. Admission itself is left
 * to the queue controller; this service only creates suspended Jobs and
 * reads them back.
 */
export class JobService {
  private readonly logger: Logger;

  constructor(
    private readonly store: JobStore,
    private readonly options: ManifestOptions,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger();
  }

  async submit(input: unknown, now: Date = new Date()): Promise<string> {
    const parsed = JobCreateRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw validationError('Invalid job request', parsed.error);
    }

    const manifest = buildJobManifest(parsed.data, this.options, now);
    const namespace = manifest.metadata.namespace ?? this.options.namespace;
    await this.store.createJob(namespace, manifest);
    this.logger.info({ job: manifest.metadata.name, namespace }, 'Job submitted');
    return manifest.metadata.name;
  }

  /**
   * Submit a caller-written Job manifest. A name that is already taken gets
   * a timestamp and random suffix instead of failing.
   */
  async submitNative(input: unknown, now: Date = new Date()): Promise<string> {
    const parsed = NativeJobManifestSchema.safeParse(input);
    if (!parsed.success) {
      throw validationError('Invalid job manifest', parsed.error);
    }

    const manifest = prepareNativeManifest(parsed.data);
    const namespace = manifest.metadata.namespace ?? this.options.namespace;
    if (await this.store.getJob(namespace, manifest.metadata.name)) {
      const renamed = uniqueJobName(manifest.metadata.name, now);
      this.logger.info({ job: manifest.metadata.name, renamed }, 'Job name taken, renaming');
      manifest.metadata.name = renamed;
    }

    await this.store.createJob(namespace, manifest);
    return manifest.metadata.name;
  }

  async delete(jobId: string, namespace: string = this.options.namespace): Promise<void> {
    const deleted = await this.store.deleteJob(namespace, jobId);
    if (!deleted) {
      throw new JobNotFoundError(jobId);
    }
  }

  async updatePriority(jobId: string, priority: string, namespace: string = this.options.namespace): Promise<void> {
    if (!priority) {
      throw new ValidationError('Priority must not be empty');
    }
    const patched = await this.store.patchJobLabels(namespace, jobId, { priority });
    if (!patched) {
      throw new JobNotFoundError(jobId);
    }
    this.logger.info({ job: jobId, namespace, priority }, 'Job priority updated');
  }

  /** Suspended Jobs, i.e. those the queue has not released yet. */
  async listPendingJobs(now: number = Date.now()): Promise<PendingJob[]> {
    const jobs = await this.store.listJobs();
    return jobs.filter(job => job.spec?.suspend === true).map(job => this.toPendingJob(job, now));
  }

  /** Names of jobs whose GPU-type preference lists `gpuType`, case-insensitively. */
  async jobsByGpuType(gpuType: string): Promise<string[]> {
    const wanted = gpuType.trim().toUpperCase();
    const jobs = await this.store.listJobs();
    return jobs
      .filter(job => gpuTypesOf(job).includes(wanted))
      .map(job => job.metadata.name);
  }

  private toPendingJob(job: RawJob, now: number): PendingJob {
    const { metadata } = job;
    const annotations = metadata.annotations ?? {};
    const created = metadata.creationTimestamp ? Date.parse(metadata.creationTimestamp) : Number.NaN;

    return {
      jobId: metadata.name,
      namespace: metadata.namespace ?? '',
      priority: metadata.labels?.priority ?? 'Normal',
      createdAt: metadata.creationTimestamp ?? '',
      userName: annotations[this.options.userAnnotation] ?? '',
      teamName: annotations[this.options.teamAnnotation] ?? '',
      status: 'Pending',
      gpuType: gpuTypeAnnotation(job) ?? null,
      waitingSeconds: Number.isNaN(created) ? null : Math.max(0, Math.floor((now - created) / 1000)),
    };
  }
}

function gpuTypeAnnotation(job: RawJob): string | undefined {
  return job.metadata.annotations?.[GPU_TYPE_ANNOTATION]
    ?? job.spec?.template?.metadata?.annotations?.[GPU_TYPE_ANNOTATION];
}

function gpuTypesOf(job: RawJob): string[] {
  return (gpuTypeAnnotation(job) ?? '')
    .split(',')
    .map(t => t.trim().toUpperCase())
    .filter(Boolean);
}

function validationError(message: string, error: ZodError): ValidationError {
  const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return new ValidationError(`${message}: ${issues.join('; ')}`, issues);
}

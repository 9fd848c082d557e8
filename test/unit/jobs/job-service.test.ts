import { describe, it, expect, beforeEach } from 'vitest';
import { manifestOptions } from '../../../src/cli/services.js';
import { JobConflictError, JobNotFoundError, ValidationError } from '../../../src/core/errors.js';
import { JobService } from '../../../src/jobs/job-service.js';
import { GPU_TYPE_ANNOTATION, POD_GROUP_NAME_LABEL } from '../../../src/jobs/manifest-builder.js';
import { makeJob, testConfig } from '../../helpers/fixtures.js';
import { MemoryJobStore } from '../../helpers/memory-job-store.js';

const now = new Date('2025-03-04T05:06:07Z');

const request = {
  name: 'train-a',
  gpuCount: 1,
  cpuPct: 50,
  memPct: 50,
  gpuPct: 100,
  userName: 'alice',
  teamName: 'ml',
  priority: 'High',
};

describe('JobService', () => {
  let store: MemoryJobStore;
  let service: JobService;

  beforeEach(() => {
    store = new MemoryJobStore();
    service = new JobService(store, manifestOptions(testConfig()));
  });

  // ── Submission ─────────────────────────────────────────────

  describe('submit', () => {
    it('creates the job and returns its name', async () => {
      expect(await service.submit(request, now)).toBe('train-a');
      expect(store.created).toHaveLength(1);
      expect(store.created[0].metadata.namespace).toBe('default');
    });

    it('generates a name when none is given', async () => {
      expect(await service.submit({ ...request, name: undefined }, now)).toBe('job-20250304050607-012345');
    });

    it('rejects an invalid request', async () => {
      await expect(service.submit({ ...request, gpuPct: 0 }, now)).rejects.toThrow(ValidationError);
      await expect(service.submit({ ...request, gpuPct: 0 }, now)).rejects.toThrow(
        'Invalid job request: gpuPct: Number must be greater than or equal to 1',
      );
      expect(store.created).toHaveLength(0);
    });

    it('reports a taken name', async () => {
      await service.submit(request, now);
      await expect(service.submit(request, now)).rejects.toThrow(JobConflictError);
    });
  });

  describe('submitNative', () => {
    const native = {
      metadata: { name: 'custom', labels: { [POD_GROUP_NAME_LABEL]: 'g1' } },
      spec: { template: { spec: { containers: [{ name: 'main', image: 'busybox' }] } } },
    };

    it('submits the manifest into the default namespace', async () => {
      expect(await service.submitNative(native, now)).toBe('custom');
      expect(store.created[0].metadata.namespace).toBeUndefined();
      expect(await store.getJob('default', 'custom')).toBeDefined();
      expect(store.created[0].spec).toMatchObject({
        template: { metadata: { labels: { [POD_GROUP_NAME_LABEL]: 'g1' } } },
      });
    });

    it('renames a manifest whose name is taken', async () => {
      store.seed(makeJob('custom'));
      expect(await service.submitNative(native, now)).toBe('custom-20250304050607-012345');
    });

    it('rejects a manifest of another kind', async () => {
      await expect(service.submitNative({ ...native, kind: 'Deployment' })).rejects.toThrow(ValidationError);
    });
  });

  // ── Housekeeping ───────────────────────────────────────────

  describe('delete', () => {
    it('deletes an existing job', async () => {
      store.seed(makeJob('train-a', { namespace: 'ml' }));
      await service.delete('train-a', 'ml');
      expect(await store.listJobs()).toEqual([]);
    });

    it('reports a missing job', async () => {
      await expect(service.delete('absent')).rejects.toThrow(JobNotFoundError);
      await expect(service.delete('absent')).rejects.toThrow('Job not found: absent');
    });
  });

  describe('updatePriority', () => {
    it('patches the priority label', async () => {
      store.seed(makeJob('train-a', { labels: { priority: 'Low', app: 'gpuboard-job' } }));
      await service.updatePriority('train-a', 'Urgent');
      const job = await store.getJob('default', 'train-a');
      expect(job?.metadata.labels).toEqual({ priority: 'Urgent', app: 'gpuboard-job' });
    });

    it('reports a missing job', async () => {
      await expect(service.updatePriority('absent', 'High')).rejects.toThrow(JobNotFoundError);
    });

    it('rejects an empty priority', async () => {
      await expect(service.updatePriority('train-a', '')).rejects.toThrow(ValidationError);
    });
  });

  // ── Queries ────────────────────────────────────────────────

  describe('listPendingJobs', () => {
    it('lists suspended jobs with their waiting time', async () => {
      store.seed(makeJob('train-a', {
        createdAt: '2025-03-04T05:00:00Z',
        labels: { priority: 'High' },
        annotations: { 'example.com/member': 'alice', 'example.com/team': 'ml' },
        podAnnotations: { [GPU_TYPE_ANNOTATION]: 'A100' },
        suspend: true,
      }));
      store.seed(makeJob('running', { suspend: false }));
      store.seed(makeJob('undated', { suspend: true }));

      const pending = await service.listPendingJobs(Date.parse('2025-03-04T05:01:30Z'));

      expect(pending).toEqual([
        {
          jobId: 'train-a',
          namespace: 'default',
          priority: 'High',
          createdAt: '2025-03-04T05:00:00Z',
          userName: 'alice',
          teamName: 'ml',
          status: 'Pending',
          gpuType: 'A100',
          waitingSeconds: 90,
        },
        {
          jobId: 'undated',
          namespace: 'default',
          priority: 'Normal',
          createdAt: '',
          userName: '',
          teamName: '',
          status: 'Pending',
          gpuType: null,
          waitingSeconds: null,
        },
      ]);
    });
  });

  describe('jobsByGpuType', () => {
    it('matches any listed type, ignoring case', async () => {
      store.seed(makeJob('both', { annotations: { [GPU_TYPE_ANNOTATION]: 'A100, H100' } }));
      store.seed(makeJob('h100-only', { podAnnotations: { [GPU_TYPE_ANNOTATION]: 'h100' } }));
      store.seed(makeJob('untyped'));

      expect(await service.jobsByGpuType('a100')).toEqual(['both']);
      expect(await service.jobsByGpuType('H100')).toEqual(['both', 'h100-only']);
      expect(await service.jobsByGpuType('L40S')).toEqual([]);
    });

    it('finds jobs submitted through the service', async () => {
      await service.submit({ ...request, gpuType: 'L40S' }, now);
      expect(await service.jobsByGpuType('l40s')).toEqual(['train-a']);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { toAdmissionRequest, type WorkloadReaderOptions } from '../../../src/admission/workload-reader.js';
import { makeWorkload } from '../../helpers/fixtures.js';

const options: WorkloadReaderOptions = {
  queueLabel: 'kueue.x-k8s.io/queue-name',
  defaultQueue: 'default',
  resourcePrefix: 'example.com',
  userAnnotation: 'example.com/member',
  teamAnnotation: 'example.com/team',
};

describe('toAdmissionRequest', () => {
  it('projects the fields the grouper reads', () => {
    const workload = makeWorkload('job-train', {
      namespace: 'research',
      queueName: 'gpu-high',
      priority: 100,
      createdAt: '2025-03-01T10:00:00Z',
      user: 'alice',
      team: 'ml',
      requests: [{ 'example.com/gpu': '2', cpu: '8' }],
    });

    expect(toAdmissionRequest(workload, options)).toEqual({
      name: 'job-train',
      namespace: 'research',
      queueName: 'gpu-high',
      priority: 100,
      createdAt: '2025-03-01T10:00:00Z',
      resourceRequests: { 'example.com/gpu': '2' },
      admitted: false,
      userName: 'alice',
      teamName: 'ml',
    });
  });

  it('takes the queue from the label when the workload names none', () => {
    const request = toAdmissionRequest(makeWorkload('w', { queueLabel: 'batch' }), options);
    expect(request.queueName).toBe('batch');
  });

  it('falls back to the default queue', () => {
    const request = toAdmissionRequest(makeWorkload('w'), options);
    expect(request.queueName).toBe('default');
    expect(request.priority).toBe(0);
    expect(request.createdAt).toBe('');
  });

  it('lets the last container win for a repeated resource', () => {
    const workload = makeWorkload('w', {
      requests: [
        { 'example.com/gpu': '1', 'example.com/gpumem': '4000' },
        { 'example.com/gpu': '3' },
      ],
    });
    expect(toAdmissionRequest(workload, options).resourceRequests).toEqual({
      'example.com/gpu': '3',
      'example.com/gpumem': '4000',
    });
  });

  it('marks workloads with an admission as admitted', () => {
    expect(toAdmissionRequest(makeWorkload('w', { admitted: true }), options).admitted).toBe(true);
  });
});

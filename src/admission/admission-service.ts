import type { Logger } from 'pino';
import type { ClusterSource, RawWorkload } from '../cluster/types.js';
import { GpuBoardError, SnapshotSourceError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { groupPending, toQueueView } from './admission-grouper.js';
import { toAdmissionRequest, type WorkloadReaderOptions } from './workload-reader.js';
import type { QueueGroup, QueueView } from './types.js';

export class AdmissionService {
  private readonly logger: Logger;

  constructor(
    private readonly source: ClusterSource,
    private readonly options: WorkloadReaderOptions,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger();
  }

  async pendingGroups(): Promise<Map<string, QueueGroup>> {
    let workloads: RawWorkload[];
    try {
      workloads = await this.source.listWorkloads();
    } catch (err) {
      if (err instanceof GpuBoardError) throw err;
      const error = toError(err);
      this.logger.error({ err: error }, 'Workload fetch failed');
      throw new SnapshotSourceError(`Failed to fetch workloads: ${error.message}`, 'workloads', error);
    }

    const groups = groupPending(workloads.map(w => toAdmissionRequest(w, this.options)));
    this.logger.debug({ workloads: workloads.length, queues: groups.size }, 'Grouped pending workloads');
    return groups;
  }

  async pendingByQueue(): Promise<QueueView> {
    return toQueueView(await this.pendingGroups());
  }
}

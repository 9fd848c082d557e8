import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ClusterSnapshotSchema, type ClusterSnapshot, type ClusterSource, type RawNode, type RawPod, type RawWorkload } from './types.js';
import { SnapshotSourceError, toError } from '../core/errors.js';

/**
 * ClusterSource over a fixed snapshot, either built in memory or read from a
 * YAML/JSON file of `{ nodes, pods, workloads }` lists. Used for offline
 * inspection with the CLI and as the in-process stand-in in tests.
 */
export class SnapshotSource implements ClusterSource {
  constructor(private readonly snapshot: ClusterSnapshot) {}

  static fromFile(path: string): SnapshotSource {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new SnapshotSourceError(`Failed to read snapshot ${path}`, 'snapshot', toError(err));
    }
    return SnapshotSource.fromObject(parsed, path);
  }

  static fromObject(value: unknown, label = 'snapshot'): SnapshotSource {
    const result = ClusterSnapshotSchema.safeParse(value ?? {});
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new SnapshotSourceError(
        `Invalid snapshot ${label}: ${issue.path.join('.')}: ${issue.message}`,
        'snapshot',
        result.error,
      );
    }
    return new SnapshotSource(result.data);
  }

  async listNodes(): Promise<RawNode[]> {
    return this.snapshot.nodes;
  }

  async listPods(nodeName?: string): Promise<RawPod[]> {
    if (!nodeName) return this.snapshot.pods;
    return this.snapshot.pods.filter(p => p.spec?.nodeName === nodeName);
  }

  async listWorkloads(): Promise<RawWorkload[]> {
    return this.snapshot.workloads;
  }
}

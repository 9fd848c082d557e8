import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SnapshotSource } from '../../../src/cluster/snapshot-source.js';
import { SnapshotSourceError } from '../../../src/core/errors.js';

describe('SnapshotSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gpuboard-snapshot-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a YAML snapshot file', async () => {
    const path = join(dir, 'cluster.yaml');
    writeFileSync(path, [
      'nodes:',
      '  - metadata:',
      '      name: fleet-a100-001',
      'pods:',
      '  - metadata:',
      '      name: train-1',
      '      annotations:',
      '        hami.io/vgpu-devices-allocated: "GPU-1:50"',
      '    spec:',
      '      nodeName: fleet-a100-001',
      '  - metadata:',
      '      name: other',
      '    spec:',
      '      nodeName: fleet-a100-002',
      '',
    ].join('\n'));

    const source = SnapshotSource.fromFile(path);
    expect((await source.listNodes()).map(n => n.metadata.name)).toEqual(['fleet-a100-001']);
    expect((await source.listPods()).map(p => p.metadata.name)).toEqual(['train-1', 'other']);
    expect((await source.listPods('fleet-a100-001')).map(p => p.metadata.name)).toEqual(['train-1']);
    expect(await source.listWorkloads()).toEqual([]);
  });

  it('reads a JSON snapshot file', async () => {
    const path = join(dir, 'cluster.json');
    writeFileSync(path, JSON.stringify({
      workloads: [{ metadata: { name: 'w1' }, spec: { queueName: 'gpu', priority: 3 } }],
    }));

    const [workload] = await SnapshotSource.fromFile(path).listWorkloads();
    expect(workload.spec).toEqual({ queueName: 'gpu', priority: 3, podSets: [] });
  });

  it('fails for a missing file', () => {
    const path = join(dir, 'missing.yaml');
    expect(() => SnapshotSource.fromFile(path)).toThrow(SnapshotSourceError);
    expect(() => SnapshotSource.fromFile(path)).toThrow(`Failed to read snapshot ${path}`);
  });

  it('treats an empty document as an empty cluster', async () => {
    const source = SnapshotSource.fromObject(null);
    expect(await source.listNodes()).toEqual([]);
  });

  it('rejects objects that do not match the schema', () => {
    expect(() => SnapshotSource.fromObject({ nodes: [{ metadata: {} }] })).toThrow(
      'Invalid snapshot snapshot: nodes.0.metadata.name: Required',
    );
  });
});

import type { Logger } from 'pino';
import type { ClusterSource, RawNode, RawPod } from '../cluster/types.js';
import type { InventoryConfig } from '../core/types.js';
import {
  GpuBoardError,
  InvalidNodeNameError,
  NodeNotFoundError,
  SnapshotSourceError,
  toError,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { InventoryBuilder } from './inventory-builder.js';
import type { GpuPodUsage, NodeInventory } from './types.js';

/**
 * Fetches a fresh node/pod snapshot per call and reconciles it. A failed
 * fetch surfaces as SnapshotSourceError and nothing is reconciled.
 */
export class InventoryService {
  private readonly builder: InventoryBuilder;
  private readonly logger: Logger;

  constructor(
    private readonly source: ClusterSource,
    config: InventoryConfig,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger();
    this.builder = new InventoryBuilder(config, this.logger);
  }

  async listNodes(): Promise<NodeInventory[]> {
    const [nodes, pods] = await this.fetch('nodes and pods', () =>
      Promise.all([this.source.listNodes(), this.source.listPods()]),
    );
    this.logger.debug({ nodes: nodes.length, pods: pods.length }, 'Reconciling inventory snapshot');
    return this.builder.buildAll(nodes, pods);
  }

  async getNode(nodeName: string): Promise<NodeInventory> {
    this.assertValidName(nodeName);
    const [node, pods] = await this.fetch(`node ${nodeName}`, () =>
      Promise.all([this.findNode(nodeName), this.source.listPods(nodeName)]),
    );
    if (!node) {
      throw new NodeNotFoundError(nodeName);
    }
    return this.builder.buildNode(node, pods);
  }

  async getGpuPods(nodeName: string, gpuId: string): Promise<GpuPodUsage[]> {
    this.assertValidName(nodeName);
    const pods: RawPod[] = await this.fetch(`pods of ${nodeName}`, () => this.source.listPods(nodeName));
    return this.builder.gpuPods(pods, gpuId);
  }

  private async findNode(nodeName: string): Promise<RawNode | undefined> {
    const nodes = await this.source.listNodes();
    return nodes.find(n => n.metadata.name === nodeName);
  }

  private assertValidName(nodeName: string): void {
    if (!this.builder.identity.isValid(nodeName)) {
      throw new InvalidNodeNameError(nodeName, this.builder.identity.describe());
    }
  }

  private async fetch<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof GpuBoardError) throw err;
      const error = toError(err);
      this.logger.error({ err: error, resource: what }, 'Snapshot fetch failed');
      throw new SnapshotSourceError(`Failed to fetch ${what}: ${error.message}`, what, error);
    }
  }
}

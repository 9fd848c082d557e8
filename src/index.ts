/**
 * gpuboard — per-GPU allocation inventory and admission-queue view
 * for fractional-GPU Kubernetes clusters.
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, InventoryService, SnapshotSource } from 'gpuboard';
 *
 * const config = new ConfigManager().load();
 * const inventory = new InventoryService(SnapshotSource.fromFile('cluster.yaml'), config.inventory);
 * const nodes = await inventory.listNodes();
 * ```
 */

// Core
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export {
  GpuBoardError,
  ConfigError,
  InvalidNodeNameError,
  NodeNotFoundError,
  SnapshotSourceError,
  UpstreamError,
  ValidationError,
  JobConflictError,
  JobNotFoundError,
  toError,
} from './core/errors.js';
export {
  GpuBoardConfigSchema,
  type GpuBoardConfig,
  type GpuBoardConfigInput,
  type ClusterConfig,
  type InventoryConfig,
  type AdmissionConfig,
  type JobsConfig,
} from './core/types.js';

// Cluster access
export * from './cluster/index.js';

// Inventory
export * from './inventory/index.js';

// Admission queue
export * from './admission/index.js';

// Jobs
export * from './jobs/index.js';

// REST API
export * from './api/index.js';

// CLI
export { createCLI, main } from './cli/index.js';

// Utils
export { retry, sleep, type RetryOptions } from './utils/retry.js';

export { VERSION, NAME } from './version.js';

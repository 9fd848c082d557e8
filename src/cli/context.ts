import { resolve } from 'path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { GpuBoardConfig } from '../core/types.js';

export type GlobalOptions = {
  dir: string;
  verbose?: boolean;
};

/**
 * Load configuration for a command and install the process logger.
 * `--verbose` wins over `logging.verbose` from the config files.
 */
export function loadCliConfig(options: GlobalOptions): GpuBoardConfig {
  const config = new ConfigManager({ projectDir: resolve(options.dir) }).load();
  const verbose = options.verbose ?? config.logging.verbose;
  setLogger(createLogger('gpuboard', verbose, config.logging.level));
  return config;
}

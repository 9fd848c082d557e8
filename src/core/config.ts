import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { GpuBoardConfigSchema, type GpuBoardConfig, type GpuBoardConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export interface ConfigManagerOptions {
  projectDir?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.gpuboard');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: GpuBoardConfigInput): GpuBoardConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.gpuboard.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const result = GpuBoardConfigSchema.safeParse(raw);
    if (!result.success) {
      const detail = result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, result.error);
    }

    return result.data;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const env = this.env;
    const cluster = section(raw, 'cluster');
    const inventory = section(raw, 'inventory');
    const api = section(raw, 'api');

    if (env.KUBECONFIG) {
      // KUBECONFIG may list several files; the first one wins
      cluster.kubeconfig = env.KUBECONFIG.split(':')[0];
    }
    if (env.GPUBOARD_API_SERVER) {
      cluster.apiServer = env.GPUBOARD_API_SERVER;
    }
    if (env.GPUBOARD_TOKEN) {
      cluster.token = env.GPUBOARD_TOKEN;
    }
    if (env.GPU_RESOURCE_PREFIX) {
      inventory.resourcePrefix = env.GPU_RESOURCE_PREFIX;
    }
    if (env.GPUBOARD_NODE_PREFIX) {
      inventory.nodePrefix = env.GPUBOARD_NODE_PREFIX;
    }
    if (env.GPUBOARD_SLOT_COUNT) {
      inventory.slotCount = Number(env.GPUBOARD_SLOT_COUNT);
    }
    if (env.GPUBOARD_PORT) {
      api.port = Number(env.GPUBOARD_PORT);
    }
    if (env.GPUBOARD_API_KEY) {
      api.apiKey = env.GPUBOARD_API_KEY;
    }
    if (env.CORS_ORIGINS) {
      api.corsOrigins = env.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean);
    }
    if (env.CORS_ALLOW_CREDENTIALS) {
      api.corsAllowCredentials = env.CORS_ALLOW_CREDENTIALS.toLowerCase() === 'true';
    }

    return { ...raw, cluster, inventory, api };
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const next = source[key];
      const current = target[key];
      if (isRecord(next) && isRecord(current)) {
        result[key] = this.deepMerge(current, next);
      } else if (next !== undefined) {
        result[key] = next;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

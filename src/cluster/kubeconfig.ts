/**
 * Kubernetes API credentials: explicit config, then in-cluster service
 * account, then kubeconfig. Only bearer-token auth is supported; a custom CA
 * is picked up by Node from NODE_EXTRA_CA_CERTS.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { ClusterConfig } from '../core/types.js';
import { ConfigError, toError } from '../core/errors.js';

export interface KubeCredentials {
  server: string;
  token?: string;
}

const SERVICE_ACCOUNT_TOKEN = '/var/run/secrets/kubernetes.io/serviceaccount/token';

const KubeconfigSchema = z.object({
  'current-context': z.string().optional(),
  contexts: z.array(z.object({
    name: z.string(),
    context: z.object({ cluster: z.string(), user: z.string().optional() }),
  })).default([]),
  clusters: z.array(z.object({
    name: z.string(),
    cluster: z.object({ server: z.string() }),
  })).default([]),
  users: z.array(z.object({
    name: z.string(),
    user: z.object({
      token: z.string().optional(),
      tokenFile: z.string().optional(),
    }).default({}),
  })).default([]),
});

export function resolveKubeCredentials(
  config: ClusterConfig,
  env: NodeJS.ProcessEnv = process.env,
  serviceAccountTokenPath: string = SERVICE_ACCOUNT_TOKEN,
): KubeCredentials {
  if (config.apiServer) {
    return { server: config.apiServer, token: readToken(config.token, config.tokenFile) };
  }

  if (env.KUBERNETES_SERVICE_HOST && existsSync(serviceAccountTokenPath)) {
    const port = env.KUBERNETES_SERVICE_PORT ?? '443';
    return {
      server: `https://${env.KUBERNETES_SERVICE_HOST}:${port}`,
      token: readToken(config.token, config.tokenFile ?? serviceAccountTokenPath),
    };
  }

  const path = expandHome(config.kubeconfig ?? join(homedir(), '.kube', 'config'));
  return fromKubeconfig(path, config.context, config.token);
}

export function fromKubeconfig(path: string, contextName?: string, tokenOverride?: string): KubeCredentials {
  if (!existsSync(path)) {
    throw new ConfigError(`No cluster configured: kubeconfig not found at ${path}`);
  }

  let kubeconfig: z.infer<typeof KubeconfigSchema>;
  try {
    kubeconfig = KubeconfigSchema.parse(parseYaml(readFileSync(path, 'utf-8')));
  } catch (err) {
    throw new ConfigError(`Failed to parse kubeconfig at ${path}`, toError(err));
  }

  const name = contextName ?? kubeconfig['current-context'];
  const context = kubeconfig.contexts.find(c => c.name === name);
  if (!context) {
    throw new ConfigError(`Context "${name ?? ''}" not found in ${path}`);
  }

  const cluster = kubeconfig.clusters.find(c => c.name === context.context.cluster);
  if (!cluster) {
    throw new ConfigError(`Cluster "${context.context.cluster}" not found in ${path}`);
  }

  const user = kubeconfig.users.find(u => u.name === context.context.user)?.user;
  return {
    server: cluster.cluster.server,
    token: readToken(tokenOverride ?? user?.token, user?.tokenFile),
  };
}

function readToken(token?: string, tokenFile?: string): string | undefined {
  if (token) return token;
  if (!tokenFile) return undefined;
  try {
    return readFileSync(expandHome(tokenFile), 'utf-8').trim();
  } catch (err) {
    throw new ConfigError(`Failed to read token file ${tokenFile}`, toError(err));
  }
}

function expandHome(path: string): string {
  return path.startsWith('~/') ? join(homedir(), path.slice(2)) : path;
}

import { z } from 'zod';

// ===== Configuration =====

export const GpuBoardConfigSchema = z.object({
  cluster: z.object({
    /** Kubernetes API server URL; overrides the kubeconfig cluster */
    apiServer: z.string().url().optional(),
    token: z.string().optional(),
    tokenFile: z.string().optional(),
    kubeconfig: z.string().optional(),
    context: z.string().optional(),
    /** Restricts the pods scanned for allocation annotations */
    podLabelSelector: z.string().optional(),
    requestTimeoutMs: z.number().int().positive().default(10000),
    maxRetries: z.number().int().min(0).max(10).default(2),
  }).default({}),
  inventory: z.object({
    slotCount: z.number().int().min(1).max(64).default(8),
    nodePrefix: z.string().regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/).default('fleet'),
    allocationAnnotation: z.string().default('hami.io/vgpu-devices-allocated'),
    userAnnotation: z.string().default('example.com/member'),
    teamAnnotation: z.string().default('example.com/team'),
    gpuFamilyLabel: z.string().default('nvidia.com/gpu.product'),
    resourcePrefix: z.string().default('example.com'),
  }).default({}),
  admission: z.object({
    queueLabel: z.string().default('kueue.x-k8s.io/queue-name'),
    defaultQueue: z.string().default('default'),
  }).default({}),
  jobs: z.object({
    namespace: z.string().default('default'),
    queueName: z.string().default('default'),
    schedulerName: z.string().default('hami-scheduler'),
    image: z.string().default('ubuntu:18.04'),
    defaultGpuTypes: z.string().default('A100,H100'),
    nodeSelector: z.record(z.string()).default({ 'hami.io/node-gpu': 'true' }),
    backoffLimit: z.number().int().min(0).default(2),
  }).default({}),
  api: z.object({
    port: z.number().int().min(0).max(65535).default(8000),
    apiKey: z.string().optional(),
    corsOrigins: z.array(z.string()).default(['*']),
    corsAllowCredentials: z.boolean().default(true),
  }).default({}),
  logging: z.object({
    verbose: z.boolean().default(false),
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }).default({}),
});

export type GpuBoardConfig = z.infer<typeof GpuBoardConfigSchema>;
export type InventoryConfig = GpuBoardConfig['inventory'];
export type AdmissionConfig = GpuBoardConfig['admission'];
export type JobsConfig = GpuBoardConfig['jobs'];
export type ClusterConfig = GpuBoardConfig['cluster'];

/**
 * Input type for overrides: every section optional, every field optional.
 */
export type GpuBoardConfigInput = z.input<typeof GpuBoardConfigSchema>;

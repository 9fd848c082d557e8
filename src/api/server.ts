/**
 * gpuboard REST API Server
 *
 * Read-only inventory and queue views plus job submission. Every request
 * reconciles a fresh cluster snapshot. Uses Node.js built-in http module.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from 'node:http';
import type { Logger } from 'pino';
import {
  GpuBoardError,
  InvalidNodeNameError,
  JobConflictError,
  JobNotFoundError,
  NodeNotFoundError,
  SnapshotSourceError,
  UpstreamError,
  ValidationError,
  toError,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { VERSION } from '../version.js';
import { createAuthMiddleware, createCorsMiddleware, type RequestHandler } from './auth.js';
import {
  PriorityUpdateSchema,
  type APIError,
  type APIServerConfig,
  type APIServices,
  type GpuPodsResponse,
  type HealthResponse,
  type JobIdResponse,
  type NodeResponse,
  type NodesResponse,
  type PendingJobsResponse,
  type PendingWorkloadsResponse,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// API SERVER
// ═══════════════════════════════════════════════════════════════

export class APIServer {
  private server: Server | null = null;
  private startedAt: number = 0;
  private middleware: RequestHandler[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly config: APIServerConfig,
    private readonly services: APIServices,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger();

    this.middleware.push(createCorsMiddleware(config.corsOrigins ?? ['*'], config.corsAllowCredentials ?? false));

    if (config.apiKey) {
      this.middleware.push(createAuthMiddleware(config.apiKey));
    }
  }

  /** Start the API server and resolve with its base URL */
  async start(): Promise<string> {
    return new Promise((resolve, reject) => {
      this.startedAt = Date.now();

      const server = createServer((req, res) => {
        this.runMiddleware(req, res, 0, () => {
          this.handleRequest(req, res).catch((err: unknown) => {
            this.logger.error({ err: toError(err) }, 'Unhandled request failure');
          });
        });
      });
      this.server = server;

      server.on('error', reject);

      server.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.config.port;
        const url = `http://${this.config.host ?? 'localhost'}:${port}`;
        this.logger.info({ url }, 'API server listening');
        resolve(url);
      });
    });
  }

  /** Stop the API server */
  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => resolve());
        this.server = null;
      } else {
        resolve();
      }
    });
  }

  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  // ─── Request Handling ─────────────────────────────────────

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', 'http://localhost');
    const method = req.method?.toUpperCase() || 'GET';
    const path = url.pathname;

    try {
      if (path === '/api/health' && method === 'GET') {
        return this.handleHealth(res);
      }

      // Inventory
      if (path === '/api/nodes' && method === 'GET') {
        return await this.handleListNodes(res);
      }

      const podsMatch = path.match(/^\/api\/nodes\/([^/]+)\/gpus\/([^/]+)\/pods$/);
      if (podsMatch && method === 'GET') {
        return await this.handleGpuPods(decodeSegment(podsMatch[1]), decodeSegment(podsMatch[2]), res);
      }

      const nodeMatch = path.match(/^\/api\/nodes\/([^/]+)\/gpus$/);
      if (nodeMatch && method === 'GET') {
        return await this.handleGetNode(decodeSegment(nodeMatch[1]), res);
      }

      // Queue and jobs
      if (path === '/api/jobs/pending-workloads' && method === 'GET') {
        return await this.handlePendingWorkloads(res);
      }

      if (path === '/api/jobs/pending' && method === 'GET') {
        return await this.handlePendingJobs(res);
      }

      const gpuTypeMatch = path.match(/^\/api\/jobs\/gpu-type\/([^/]+)$/);
      if (gpuTypeMatch && method === 'GET') {
        const jobs = await this.services.jobs.jobsByGpuType(decodeSegment(gpuTypeMatch[1]));
        return this.sendJSON(res, 200, { jobs });
      }

      if (path === '/api/jobs/submit' && method === 'POST') {
        const jobId = await this.services.jobs.submit(await this.readJSON(req));
        return this.sendJSON(res, 201, { jobId } satisfies JobIdResponse);
      }

      if (path === '/api/jobs/submit-native' && method === 'POST') {
        const jobId = await this.services.jobs.submitNative(await this.readJSON(req));
        return this.sendJSON(res, 201, { jobId } satisfies JobIdResponse);
      }

      const priorityMatch = path.match(/^\/api\/jobs\/([^/]+)\/priority$/);
      if (priorityMatch && method === 'PATCH') {
        return await this.handleUpdatePriority(decodeSegment(priorityMatch[1]), req, res);
      }

      const jobMatch = path.match(/^\/api\/jobs\/([^/]+)$/);
      if (jobMatch && method === 'DELETE') {
        const jobId = decodeSegment(jobMatch[1]);
        await this.services.jobs.delete(jobId, url.searchParams.get('namespace') ?? undefined);
        return this.sendJSON(res, 200, { deleted: true, jobId });
      }

      this.sendJSON(res, 404, { error: 'Not found', code: 'NOT_FOUND' });
    } catch (err) {
      this.sendError(res, err);
    }
  }

  private handleHealth(res: ServerResponse): void {
    const response: HealthResponse = {
      status: 'ok',
      version: VERSION,
      uptime: Date.now() - this.startedAt,
    };
    this.sendJSON(res, 200, response);
  }

  private async handleListNodes(res: ServerResponse): Promise<void> {
    const response: NodesResponse = { nodes: await this.services.inventory.listNodes() };
    this.sendJSON(res, 200, response);
  }

  private async handleGetNode(nodeName: string, res: ServerResponse): Promise<void> {
    const response: NodeResponse = { node: await this.services.inventory.getNode(nodeName) };
    this.sendJSON(res, 200, response);
  }

  private async handleGpuPods(nodeName: string, gpuId: string, res: ServerResponse): Promise<void> {
    const response: GpuPodsResponse = {
      node: nodeName,
      gpuId,
      pods: await this.services.inventory.getGpuPods(nodeName, gpuId),
    };
    this.sendJSON(res, 200, response);
  }

  private async handlePendingWorkloads(res: ServerResponse): Promise<void> {
    const response: PendingWorkloadsResponse = {
      pendingWorkloads: await this.services.admission.pendingByQueue(),
    };
    this.sendJSON(res, 200, response);
  }

  private async handlePendingJobs(res: ServerResponse): Promise<void> {
    const response: PendingJobsResponse = { pendingJobs: await this.services.jobs.listPendingJobs() };
    this.sendJSON(res, 200, response);
  }

  private async handleUpdatePriority(jobId: string, req: IncomingMessage, res: ServerResponse): Promise<void> {
    const parsed = PriorityUpdateSchema.safeParse(await this.readJSON(req));
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ValidationError(`Invalid priority update: ${issues.join('; ')}`, issues);
    }
    await this.services.jobs.updatePriority(jobId, parsed.data.priority, parsed.data.namespace);
    this.sendJSON(res, 200, { jobId, newPriority: parsed.data.priority });
  }

  // ─── Helpers ──────────────────────────────────────────────

  private runMiddleware(req: IncomingMessage, res: ServerResponse, index: number, done: () => void): void {
    if (index >= this.middleware.length) return done();
    this.middleware[index](req, res, () => this.runMiddleware(req, res, index + 1, done));
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
      req.on('error', reject);
    });
  }

  private async readJSON(req: IncomingMessage): Promise<unknown> {
    const body = await this.readBody(req);
    try {
      return JSON.parse(body);
    } catch {
      throw new ValidationError('Invalid JSON body');
    }
  }

  private sendError(res: ServerResponse, err: unknown): void {
    const error = toError(err);
    const status = statusFor(error);
    if (status >= 500) {
      this.logger.error({ err: error }, 'Request failed');
    }

    const body: APIError = error instanceof GpuBoardError
      ? { error: error.message, code: error.code }
      : { error: 'Internal server error', code: 'INTERNAL_ERROR' };
    if (error instanceof ValidationError && error.issues.length > 0) {
      body.details = error.issues;
    }
    this.sendJSON(res, status, body);
  }

  private sendJSON(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError(`Malformed path segment: ${segment}`);
  }
}

/**
 * HTTP status for an error raised while serving a request
 */
export function statusFor(error: Error): number {
  if (error instanceof InvalidNodeNameError || error instanceof ValidationError) return 400;
  if (error instanceof NodeNotFoundError || error instanceof JobNotFoundError) return 404;
  if (error instanceof JobConflictError) return 409;
  if (error instanceof SnapshotSourceError) return 503;
  if (error instanceof UpstreamError) return 502;
  return 500;
}

export class GpuBoardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GpuBoardError';
  }
}

export class ConfigError extends GpuBoardError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class InvalidNodeNameError extends GpuBoardError {
  constructor(public readonly nodeName: string, public readonly expected: string) {
    super(`Invalid node name "${nodeName}". Expected: ${expected}`, 'INVALID_NODE_NAME');
    this.name = 'InvalidNodeNameError';
  }
}

export class NodeNotFoundError extends GpuBoardError {
  constructor(public readonly nodeName: string) {
    super(`Node not found: ${nodeName}`, 'NODE_NOT_FOUND');
    this.name = 'NodeNotFoundError';
  }
}

export class SnapshotSourceError extends GpuBoardError {
  constructor(message: string, public readonly resource: string, cause?: Error) {
    super(message, 'SNAPSHOT_SOURCE_ERROR', cause);
    this.name = 'SnapshotSourceError';
  }
}

export class UpstreamError extends GpuBoardError {
  constructor(message: string, public readonly status: number) {
    super(message, 'UPSTREAM_ERROR');
    this.name = 'UpstreamError';
  }
}

export class ValidationError extends GpuBoardError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class JobConflictError extends GpuBoardError {
  constructor(public readonly jobName: string) {
    super(`Job already exists: ${jobName}`, 'JOB_CONFLICT');
    this.name = 'JobConflictError';
  }
}

export class JobNotFoundError extends GpuBoardError {
  constructor(public readonly jobName: string) {
    super(`Job not found: ${jobName}`, 'JOB_NOT_FOUND');
    this.name = 'JobNotFoundError';
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

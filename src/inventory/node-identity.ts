import type { NodeClassification } from './types.js';

/**
 * NodeIdentity — validates node names against the fleet naming convention
 * `<prefix>-<family>-<NNN>` and extracts the GPU family token.
 */
export class NodeIdentity {
  private readonly pattern: RegExp;

  constructor(private readonly prefix: string) {
    this.pattern = new RegExp(`^${escapeRegExp(prefix)}-([A-Za-z0-9]+)-\\d{3}$`);
  }

  classify(nodeName: string): NodeClassification {
    const match = this.pattern.exec(nodeName);
    if (!match) {
      return { valid: false };
    }
    return { valid: true, gpuFamily: match[1].toUpperCase() };
  }

  isValid(nodeName: string): boolean {
    return this.pattern.test(nodeName);
  }

  /** Human-readable form of the accepted pattern, used in error messages */
  describe(): string {
    return `${this.prefix}-<gpu family>-<3 digits>`;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

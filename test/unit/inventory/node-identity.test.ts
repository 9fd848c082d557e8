import { describe, it, expect } from 'vitest';
import { NodeIdentity } from '../../../src/inventory/node-identity.js';

describe('NodeIdentity', () => {
  const identity = new NodeIdentity('fleet');

  it('accepts prefix-family-NNN and upper-cases the family', () => {
    expect(identity.classify('fleet-a100-001')).toEqual({ valid: true, gpuFamily: 'A100' });
    expect(identity.classify('fleet-H100-042')).toEqual({ valid: true, gpuFamily: 'H100' });
  });

  it('rejects names with a different prefix', () => {
    expect(identity.classify('other-a100-001')).toEqual({ valid: false });
  });

  it('requires exactly three digits', () => {
    expect(identity.isValid('fleet-a100-01')).toBe(false);
    expect(identity.isValid('fleet-a100-0001')).toBe(false);
    expect(identity.isValid('fleet-a100-00a')).toBe(false);
  });

  it('rejects a family token containing a dash', () => {
    expect(identity.isValid('fleet-a-100-001')).toBe(false);
  });

  it('rejects surrounding text', () => {
    expect(identity.isValid('xfleet-a100-001')).toBe(false);
    expect(identity.isValid('fleet-a100-001-extra')).toBe(false);
  });

  it('treats the prefix literally', () => {
    const dotted = new NodeIdentity('gpu.pool');
    expect(dotted.isValid('gpu.pool-l40s-003')).toBe(true);
    expect(dotted.isValid('gpuXpool-l40s-003')).toBe(false);
  });

  it('describes the accepted pattern', () => {
    expect(identity.describe()).toBe('fleet-<gpu family>-<3 digits>');
  });
});

import { describe, it, expect } from 'vitest';
import { createCLI } from '../../../src/cli/index.js';

describe('createCLI', () => {
  it('registers the gpuboard commands', () => {
    const cli = createCLI();
    expect(cli.name()).toBe('gpuboard');
    expect(cli.commands.map(c => c.name())).toEqual(['nodes', 'queue', 'serve']);
  });

  it('offers snapshot and JSON output on the read commands', () => {
    const cli = createCLI();
    for (const name of ['nodes', 'queue']) {
      const command = cli.commands.find(c => c.name() === name);
      expect(command?.options.map(o => o.long)).toEqual(['--snapshot', '--json']);
    }
  });
});

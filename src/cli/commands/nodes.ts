/**
 * `gpuboard nodes [name]` — per-GPU allocation breakdown.
 */

import { Command } from 'commander';
import { loadCliConfig, type GlobalOptions } from '../context.js';
import { formatNodes } from '../format.js';
import { createClusterSource, createInventoryService } from '../services.js';

interface NodesOptions {
  snapshot?: string;
  json?: boolean;
}

export function createNodesCommand(): Command {
  const cmd = new Command('nodes');

  cmd
    .description('Show per-GPU allocation of fractional-GPU nodes')
    .argument('[name]', 'Show a single node')
    .option('-s, --snapshot <file>', 'Read a cluster snapshot file instead of the live cluster')
    .option('--json', 'Output as JSON')
    .action(async (name: string | undefined, options: NodesOptions, command: Command) => {
      const config = loadCliConfig(command.optsWithGlobals<GlobalOptions>());
      const inventory = createInventoryService(createClusterSource(config, options.snapshot), config);

      const nodes = name ? [await inventory.getNode(name)] : await inventory.listNodes();

      if (options.json) {
        console.log(JSON.stringify(name ? nodes[0] : nodes, null, 2));
        return;
      }
      console.log(formatNodes(nodes));
    });

  return cmd;
}

/**
 * `gpuboard queue` — pending workloads per queue, in triage order.
 */

import { Command } from 'commander';
import { loadCliConfig, type GlobalOptions } from '../context.js';
import { formatQueues } from '../format.js';
import { createAdmissionService, createClusterSource } from '../services.js';

export function createQueueCommand(): Command {
  const cmd = new Command('queue');

  cmd
    .description('Show pending workloads grouped by queue')
    .option('-s, --snapshot <file>', 'Read a cluster snapshot file instead of the live cluster')
    .option('--json', 'Output as JSON')
    .action(async (options: { snapshot?: string; json?: boolean }, command: Command) => {
      const config = loadCliConfig(command.optsWithGlobals<GlobalOptions>());
      const admission = createAdmissionService(createClusterSource(config, options.snapshot), config);
      const view = await admission.pendingByQueue();

      if (options.json) {
        console.log(JSON.stringify(view, null, 2));
        return;
      }
      console.log(formatQueues(view));
    });

  return cmd;
}

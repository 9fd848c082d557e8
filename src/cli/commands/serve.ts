/**
 * `gpuboard serve` — run the HTTP API against the live cluster.
 */

import { Command } from 'commander';
import { APIServer } from '../../api/server.js';
import { getLogger } from '../../core/logger.js';
import { loadCliConfig, type GlobalOptions } from '../context.js';
import {
  createAdmissionService,
  createInventoryService,
  createJobService,
  createKubeSource,
} from '../services.js';

interface ServeOptions {
  port?: number;
  host?: string;
}

export function createServeCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Start the gpuboard HTTP API')
    .option('-p, --port <port>', 'Port to listen on', (value: string) => parseInt(value, 10))
    .option('--host <host>', 'Interface to bind')
    .action(async (options: ServeOptions, command: Command) => {
      const config = loadCliConfig(command.optsWithGlobals<GlobalOptions>());
      const logger = getLogger();
      const kube = createKubeSource(config, logger);

      const server = new APIServer(
        {
          port: options.port ?? config.api.port,
          host: options.host,
          apiKey: config.api.apiKey,
          corsOrigins: config.api.corsOrigins,
          corsAllowCredentials: config.api.corsAllowCredentials,
        },
        {
          inventory: createInventoryService(kube, config, logger),
          admission: createAdmissionService(kube, config, logger),
          jobs: createJobService(kube, config, logger),
        },
        logger,
      );

      const url = await server.start();
      console.log(`gpuboard API listening on ${url}`);

      const shutdown = (): void => {
        server.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error(err);
            process.exit(1);
          },
        );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

  return cmd;
}

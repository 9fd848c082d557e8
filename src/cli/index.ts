/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createNodesCommand } from './commands/nodes.js';
import { createQueueCommand } from './commands/queue.js';
import { createServeCommand } from './commands/serve.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Per-GPU allocation and queue inspection for fractional-GPU Kubernetes clusters')
    .option('-v, --verbose', 'Log to the terminal at debug level')
    .option('-d, --dir <directory>', 'Project directory holding .gpuboard.yaml', '.');

  program.addCommand(createNodesCommand());
  program.addCommand(createQueueCommand());
  program.addCommand(createServeCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}

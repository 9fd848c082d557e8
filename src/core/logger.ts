import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.gpuboard', 'logs');

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

export function createLogger(
  name: string = 'gpuboard',
  verbose: boolean = false,
  level: pino.LevelWithSilent = 'info',
): pino.Logger {
  if (verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true },
      },
    });
  }

  ensureLogDir();
  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'gpuboard.log'), mkdir: true },
    },
  });
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

import { pino, type Logger } from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.tmplwiz', 'logs');

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

/**
 * Verbose runs pretty-print to stderr so the log never mixes with a document
 * written to stdout; otherwise logs go to ~/.tmplwiz/logs/tmplwiz.log.
 */
export function createLogger(name: string = 'tmplwiz', verbose: boolean = false): Logger {
  if (verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  ensureLogDir();
  return pino({
    name,
    level: 'debug',
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'tmplwiz.log'), mkdir: true },
    },
  });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}

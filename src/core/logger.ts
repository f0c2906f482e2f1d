import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';

export const DEFAULT_LOG_FILE = join(homedir(), '.ruleloop', 'logs', 'ruleloop.log');

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** Pretty-print to stdout instead of writing JSON lines to `file` */
  verbose?: boolean;
  file?: string;
}

/**
 * Verbose loggers pretty-print to the terminal; everything else is appended
 * to a JSON log file. A silent logger opens no transport at all.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const name = options.name ?? 'ruleloop';
  const level = options.level ?? 'info';

  if (level === 'silent') {
    return pino({ name, level });
  }

  if (options.verbose) {
    return pino({
      name,
      level: level === 'info' ? 'debug' : level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'HH:MM:ss.l', ignore: 'pid,hostname' },
      },
    });
  }

  const file = options.file ?? DEFAULT_LOG_FILE;
  const dir = dirname(file);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: file, mkdir: true },
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

import type { LogLevelName } from '../config.js';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

type EmittingLevel = Exclude<LogLevelName, 'silent'>;

const LEVEL_RANK: Record<LogLevelName, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// stdout carries the MCP stdio stream, so every line goes to stderr
export function createLogger(scope: string, level: LogLevelName = 'info'): Logger {
  const threshold = LEVEL_RANK[level];

  const write = (lineLevel: EmittingLevel, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_RANK[lineLevel] < threshold) {
      return;
    }

    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    console.error(`[applinks:${scope}] ${lineLevel.toUpperCase()} ${message}${suffix}`);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');

/**
 * Simple logger utility that writes level-tagged lines to stderr
 * Keeps stdout free for CLI banners and summaries
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

let minimumLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

/**
 * Change the minimum level that gets written
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

function writeExtras(args: unknown[]): void {
  if (args.length > 0) {
    process.stderr.write(`${JSON.stringify(args, null, 2)}\n`);
  }
}

export const logger = {
  info: (message: string, ...args: unknown[]) => {
    if (!enabled('info')) return;
    process.stderr.write(`[INFO] ${message}\n`);
    writeExtras(args);
  },

  error: (message: string, error?: unknown) => {
    if (!enabled('error')) return;
    process.stderr.write(`[ERROR] ${message}\n`);
    if (error) {
      process.stderr.write(
        `${error instanceof Error ? error.stack : JSON.stringify(error, null, 2)}\n`
      );
    }
  },

  debug: (message: string, ...args: unknown[]) => {
    if (!enabled('debug')) return;
    process.stderr.write(`[DEBUG] ${message}\n`);
    writeExtras(args);
  },

  warn: (message: string, ...args: unknown[]) => {
    if (!enabled('warn')) return;
    process.stderr.write(`[WARN] ${message}\n`);
    writeExtras(args);
  },
};

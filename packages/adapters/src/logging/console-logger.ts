import type { LoggerPort, LogLevel } from '@evsim/domain';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  switch (raw?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    case 'silent':
      return 'silent';
    default:
      return fallback;
  }
}

/** Console logger that prefixes every line with `[scope]`, filtered by level. */
export function createConsoleLogger(
  scope: string,
  level: LogLevel = parseLogLevel(process.env['LOG_LEVEL']),
): LoggerPort {
  const enabled = (at: LogLevel): boolean => LEVEL_RANK[at] >= LEVEL_RANK[level];
  const line = (message: string): string => `[${scope}] ${message}`;

  const write =
    (at: Exclude<LogLevel, 'silent'>, sink: (...args: unknown[]) => void) =>
    (message: string, context?: Record<string, unknown>): void => {
      if (!enabled(at)) return;
      if (context) sink(line(message), context);
      else sink(line(message));
    };

  return {
    debug: write('debug', console.debug),
    info: write('info', console.log),
    warn: write('warn', console.warn),
    error: write('error', console.error),
  };
}

export const silentLogger: LoggerPort = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

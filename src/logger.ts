export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// Set once at startup from LOG_LEVEL
let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function formatLogLine(level: LogLevel, scope: string, message: string, timestamp: string): string {
  return `[${timestamp}] ${level.toUpperCase()} [${scope}]: ${message}`;
}

function log(level: LogLevel, scope: string, message: string, data?: Record<string, unknown>): void {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(threshold)) return;

  // stdout belongs to the MCP stdio transport
  const line = formatLogLine(level, scope, message, new Date().toISOString());
  if (data) {
    console.error(line, data);
  } else {
    console.error(line);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => log('debug', scope, message, data),
    info: (message, data) => log('info', scope, message, data),
    warn: (message, data) => log('warn', scope, message, data),
    error: (message, data) => log('error', scope, message, data),
  };
}

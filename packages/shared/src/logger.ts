import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel !== undefined && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

export const logger = pino({
  name: 'toolscout',
  level: getLogLevel(),
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export type Logger = pino.Logger;

export function createChildLogger(component: string): Logger {
  return logger.child({ component });
}

import { pino, destination, type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value);
  return level ?? 'warn';
}

// stdout carries the operator prompts and progress lines, so logs go to stderr
export const logger: Logger = pino(
  {
    level: resolveLevel(process.env['LOG_LEVEL']),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  destination(2)
);

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}

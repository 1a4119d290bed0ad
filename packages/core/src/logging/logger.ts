/**
 * Pino logger shared by every package. Components take an optional `logger`
 * and fall back to a child of the base logger tagged with their name.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export const LOG_LEVEL_NAMES = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const satisfies ReadonlyArray<LevelWithSilent>;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

function defaultLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env['LOG_LEVEL']?.toLowerCase();
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

export const baseLogger: Logger = pino({
  level: defaultLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
});

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Parent to derive from instead of the base logger. */
  parent?: Logger;
}

/**
 * Child logger carrying a `service` binding.
 *
 * @example
 * ```typescript
 * const logger = createLogger('SandboxClient');
 * logger.debug({ taskId }, 'Polling status');
 * // {"level":"debug","time":"...","service":"SandboxClient","taskId":"...","msg":"Polling status"}
 * ```
 */
export function createLogger(
  service: string,
  options: CreateLoggerOptions = {},
): Logger {
  const child = (options.parent ?? baseLogger).child({ service });
  if (options.level) {
    child.level = options.level;
  }
  return child;
}

// Logger - pino factory for the service and CLI

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const REDACT_PATHS = ['apiKey', '*.apiKey', 'transport.apiKey', 'headers.authorization'];

export interface LoggerOptions {
  level?: LogLevel;
  bindings?: Record<string, unknown>;
}

/**
 * JSON logger on stderr, so stdout stays free for console output and CLI
 * listings. Disabled under Vitest.
 */
export function makeLogger(options: LoggerOptions = {}): Logger {
  const isTestTooling = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

  return pino(
    {
      level: options.level ?? 'info',
      enabled: !isTestTooling,
      base: { ...options.bindings, app: 'loopwise' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** For tests: keeps the Logger type, emits nothing. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

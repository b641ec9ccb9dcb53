// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { pino } from 'pino';
import type { Logger } from 'pino';
import { LogLevelSchema } from './config.js';
import type { LogLevel } from './config.js';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Minimum level.  Falls back to LOG_LEVEL, then "info". */
  level?: LogLevel;
  /** Value of the `name` binding on every record. */
  name?: string;
}

function levelFromEnv(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env['LOG_LEVEL']);
  return parsed.success ? parsed.data : 'info';
}

/**
 * Structured JSON logger.
 *
 * - ISO timestamps and a string `level` label
 * - Tenant credentials are redacted if they ever reach a log call
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'creditcore',
    level: options.level ?? levelFromEnv(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: [
        '*.credentials',
        '*.refreshToken',
        '*.accessToken',
        '*.password',
        '*.token',
        '*.secret',
      ],
      censor: '[REDACTED]',
    },
  });
}

let rootLogger: Logger | undefined;

/** Shared process-wide logger, created on first use. */
export function getLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}

/** Child of the shared logger bound to one component. */
export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getLogger()).child({ component });
}

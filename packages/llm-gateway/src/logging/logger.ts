// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
  readonly level?: LogLevel;
  /** Emit newline-delimited JSON instead of pretty output. Defaults to true in production. */
  readonly json?: boolean;
}

/** Paths pino blanks out wherever they appear in a log object. */
const REDACT_PATHS = ['apiKey', '*.apiKey', 'headers.authorization', 'headers["x-api-key"]'];

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? 'info';
  const isJson = config?.json ?? process.env['NODE_ENV'] === 'production';

  const transport = isJson
    ? undefined
    : {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'HH:MM:ss' },
      };

  const options: LoggerOptions = {
    level,
    base: { component: 'llm-gateway' },
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    ...(transport ? { transport } : {}),
  };

  return pino(options);
}

/** A logger that writes nothing, for library defaults and tests. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

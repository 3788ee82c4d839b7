/**
 * Pino Logger Factory
 *
 * Structured logging for library components and the CLI.
 * Components take a Logger by injection and bind their module name.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  /** Log level (default: info, or silent under Vitest) */
  level?: LogLevel;
  /** Enable pretty printing via pino-pretty */
  pretty?: boolean;
  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
  /** Write to stderr instead of stdout, keeping stdout for command output */
  stderr?: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: process.env.VITEST !== undefined ? 'silent' : 'info',
  pretty: false,
  base: {
    service: 'docforge',
  },
};

/**
 * Create a pino logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: mergedConfig.stderr ? 2 : 1,
      },
    };
    return pino(options);
  }

  return mergedConfig.stderr ? pino(options, pino.destination(2)) : pino(options);
}

let rootLogger: Logger | undefined;

/** Shared root logger, created lazily with the default configuration. */
export function getRootLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}

/** Child logger bound to a module name. */
export function moduleLogger(module: string, parent?: Logger): Logger {
  return (parent ?? getRootLogger()).child({ module });
}

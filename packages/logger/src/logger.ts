import os from 'node:os';
import { Writable } from 'node:stream';

import { pino, stdTimeFunctions, type Logger as PinoLogger, type LoggerOptions, type TransportTargetOptions } from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = PinoLogger;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;
let envOverride: Partial<LoggerEnvConfig> = {};

function isTestEnvironment(env: LoggerEnvConfig): boolean {
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Fixed-width category label; long names keep their tail.
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function createRootLogger(): Logger {
  const env = { ...validateLoggerEnv(process.env), ...envOverride };

  const options: LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: stdTimeFunctions.isoTime,
  };

  // Tests write into a no-op stream so no transport workers are spawned
  if (isTestEnvironment(env)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(options, noopStream);
  }

  const targets: TransportTargetOptions[] = [];

  if (env.LOGGER_CONSOLE_ENABLED) {
    targets.push(
      env.NODE_ENV === 'development'
        ? {
            level: 'trace',
            options: { ignore: 'pid,hostname,category,categoryLabel,service,environment' },
            target: 'pino-pretty',
          }
        : { level: 'trace', options: { destination: 1 }, target: 'pino/file' }
    );
  }

  if (env.LOGGER_FILE_LOG_ENABLED) {
    targets.push({
      level: 'trace',
      options: { destination: env.LOGGER_FILE_LOG_PATH, mkdir: true },
      target: 'pino/file',
    });
  }

  if (targets.length === 0) {
    return pino({ ...options, enabled: false });
  }

  return pino({ ...options, transport: { targets } });
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Category logger that follows reconfiguration.
 *
 * Modules create their loggers at import time, so the returned proxy resolves
 * the current underlying pino child on every call.
 */
export function getLogger(category: string): Logger {
  const target = getOrCreateCategoryLogger(category);
  return new Proxy(target, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
}

/**
 * Override environment-derived settings at runtime and rebuild all loggers.
 */
export function configureLogger(next: Partial<LoggerEnvConfig>): void {
  envOverride = { ...envOverride, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

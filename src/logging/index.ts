/**
 * Structured logging for the mediator.
 *
 * A single pino root logger is created lazily from the loaded configuration;
 * components get child loggers bound to their `component` field.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { loadConfig } from '../config/load-config.js';

/**
 * Structured logging fields.
 *
 * Common fields include:
 * - component: Component/subsystem identifier (e.g., "mediator", "registry")
 * - request_type: Request class name being dispatched
 * - handler: Handler class name
 * - duration_ms: Execution duration for timed operations
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

/**
 * Component logger returned by createLogger().
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

let rootLogger: Logger | null = null;

function createRootLogger(): Logger {
  const config = loadConfig();
  const loggerOptions: LoggerOptions = {
    name: 'mediator',
    level: config.logLevel,
  };

  // Pretty output only for local development
  if (config.environment === 'development') {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(loggerOptions);
}

/**
 * Get the shared root logger, creating it on first use.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the shared root logger.
 *
 * Loggers already returned by createLogger() pick up the replacement on
 * their next call.
 */
export function setRootLogger(logger: Logger | null): void {
  rootLogger = logger;
}

function withoutUndefined(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Create a logger with preset fields.
 *
 * @param defaultFields - Fields to include in every log message
 *
 * @example
 * const log = createLogger({ component: 'registry' });
 * log.info('Registered handler', { request_type: 'GetUserQuery' });
 * // {"component":"registry","request_type":"GetUserQuery","msg":"Registered handler",...}
 */
export function createLogger(defaultFields: LogFields): ComponentLogger {
  const bindings = withoutUndefined(defaultFields);
  let cached: { readonly root: Logger; readonly child: Logger } | null = null;

  // Rebuilt only when setRootLogger() swaps the root
  const logger = (): Logger => {
    const root = getRootLogger();
    if (!cached || cached.root !== root) {
      cached = { root, child: root.child(bindings) };
    }
    return cached.child;
  };

  const write =
    (level: 'error' | 'warn' | 'info' | 'debug' | 'trace') =>
    (message: string, fields?: LogFields): void => {
      logger()[level](withoutUndefined(fields), message);
    };

  return {
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    debug: write('debug'),
    trace: write('trace'),
  };
}

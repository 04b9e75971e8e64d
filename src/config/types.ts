/**
 * Configuration types for the mediator.
 */

/** Log levels accepted by the pino root logger. */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * What the registry does when a second handler class claims a request type.
 *
 * - `error`: throw DuplicateHandlerError
 * - `replace`: log a warning and keep the later class
 */
export const DUPLICATE_HANDLER_POLICIES = ['error', 'replace'] as const;

export type DuplicateHandlerPolicy = (typeof DUPLICATE_HANDLER_POLICIES)[number];

/**
 * Resolved mediator configuration.
 */
export interface MediatorConfig {
  /** Root logger level (default: "info"). */
  readonly logLevel: LogLevel;

  /** Duplicate registration policy (default: "error"). */
  readonly duplicateHandlers: DuplicateHandlerPolicy;

  /** Deployment environment name (default: "production"). */
  readonly environment: string;
}

/** Environment variables read by loadConfig(). */
export const ConfigEnvVars = {
  LOG_LEVEL: 'MEDIATOR_LOG_LEVEL',
  DUPLICATE_HANDLERS: 'MEDIATOR_DUPLICATE_HANDLERS',
  ENVIRONMENT: 'MEDIATOR_ENV',
} as const;

export const DEFAULT_CONFIG: MediatorConfig = Object.freeze({
  logLevel: 'info',
  duplicateHandlers: 'error',
  environment: 'production',
});

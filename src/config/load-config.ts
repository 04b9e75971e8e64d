/**
 * Environment-driven configuration loading.
 */

import { ConfigurationError } from '../registry/errors.js';
import {
  ConfigEnvVars,
  DEFAULT_CONFIG,
  DUPLICATE_HANDLER_POLICIES,
  LOG_LEVELS,
  type MediatorConfig,
} from './types.js';

type Env = Readonly<Record<string, string | undefined>>;

function readChoice<T extends string>(
  env: Env,
  variable: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = env[variable]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = raw.toLowerCase();
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(variable, raw, allowed);
  }
  return match;
}

/**
 * Build the mediator configuration from environment variables.
 *
 * Unset or blank variables fall back to DEFAULT_CONFIG.
 *
 * @param env - Variables to read (default: process.env)
 * @throws ConfigurationError if a variable holds an unsupported value
 *
 * @example
 * ```typescript
 * const config = loadConfig({ MEDIATOR_DUPLICATE_HANDLERS: 'replace' });
 * config.duplicateHandlers; // 'replace'
 * ```
 */
export function loadConfig(env: Env = process.env): MediatorConfig {
  return Object.freeze({
    logLevel: readChoice(env, ConfigEnvVars.LOG_LEVEL, LOG_LEVELS, DEFAULT_CONFIG.logLevel),
    duplicateHandlers: readChoice(
      env,
      ConfigEnvVars.DUPLICATE_HANDLERS,
      DUPLICATE_HANDLER_POLICIES,
      DEFAULT_CONFIG.duplicateHandlers
    ),
    environment: env[ConfigEnvVars.ENVIRONMENT]?.trim() || DEFAULT_CONFIG.environment,
  });
}

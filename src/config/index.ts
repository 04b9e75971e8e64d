export { loadConfig } from './load-config.js';
export {
  ConfigEnvVars,
  DEFAULT_CONFIG,
  DUPLICATE_HANDLER_POLICIES,
  type DuplicateHandlerPolicy,
  LOG_LEVELS,
  type LogLevel,
  type MediatorConfig,
} from './types.js';

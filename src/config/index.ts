/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 */

export {
  TIMEOUTS,
  LIMITS,
  TOKEN_GUARDS,
  DEFAULT_TASK,
  DEFAULT_START_URL,
  DEFAULT_ALLOWED_DOMAINS,
  DEFAULT_SCRIPT_PATH,
  DEFAULT_CONVERSATION_PATH,
  DEFAULT_CONFIG_PATH,
} from './defaults.js';
export { loadConfigFile, loadConfigFileOrDefaults, parseConfig } from './loader.js';

/**
 * Default configuration values.
 * Run-level values are overridable via config file or CLI flags;
 * replay timings are fixed so generated scripts behave the same everywhere.
 */

export const TIMEOUTS = {
  INITIAL_ACTION: 10_000,
  FALLBACK_ACTION: 1_000,
  ACTION_SETTLE: 500,
  CLEAR_SETTLE: 100,
  NAVIGATION: 5_000,
  NAVIGATION_SETTLE: 1_000,
  TAB_LOAD: 15_000,
  TAB_SETTLE: 500,
  AGENT_NAVIGATION: 15_000,
  AGENT_ACTION: 8_000,
  TOTAL_RUN_TIMEOUT: 300_000,
} as const;

export const LIMITS = {
  MAX_FALLBACKS: 50,
  MAX_STEPS: 15,
  MAX_ACTIONS_PER_STEP: 2,
  MAX_CONSECUTIVE_FAILURES: 3,
} as const;

export const TOKEN_GUARDS = {
  MAX_VISIBLE_TEXT_CHARS: 6_000,
  MAX_ELEMENTS: 150,
  MAX_ELEMENT_TEXT_CHARS: 80,
  MAX_EXTRACTED_CHARS: 2_000,
} as const;

export const DEFAULT_TASK =
  'Go to realtor.ca and search for houses in Ottawa, go to the first listing and click on it and verify if the price is visible';

export const DEFAULT_START_URL = 'https://www.realtor.ca';

export const DEFAULT_ALLOWED_DOMAINS = ['realtor.ca'] as const;

export const DEFAULT_SCRIPT_PATH = './playwright_scripts/realtor_replay.json';

export const DEFAULT_CONVERSATION_PATH = './logs/conversation.txt';

export const DEFAULT_CONFIG_PATH = '.listing-replay.yaml';

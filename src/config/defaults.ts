/**
 * Default configuration values.
 * All values are overridable via the config file.
 */

export const DIRECTORIES = {
  DATA_DIR: '.',
  SCENARIOS: 'scenarios',
  SETTINGS: 'settings',
  PROFILES: 'profiles',
  OUTPUTS: 'outputs',
  RUNS: 'runs',
} as const;

export const BROWSER = {
  HEADLESS: false,
  KEEP_OPEN: true,
  DEFAULT_TIMEOUT_MS: 60_000,
  CLOSE_WATCH_INTERVAL_MS: 1_000,
  TYPE_DELAY_MIN_MS: 50,
  TYPE_DELAY_MAX_MS: 250,
  FRAME_RETRY_DELAY_MS: 200,
} as const;

export const LIMITS = {
  MAX_ACCOUNTS: 1_000,
  CONCURRENCY: 1,
  DEBUG_QUEUE_CAPACITY: 256,
} as const;

export const CONFIG_FILE_NAME = 'scenario-runtime.config.json';

/**
 * Shared constants for the Zurg repair monitor
 */

// Application identity
export const APP_INFO = {
  NAME: 'Zurg Broken Torrent Monitor',
  VERSION: '1.0.0',
  USER_AGENT: 'ZurgMonitor/1.0.0',
} as const;

// Torrent states understood by the Zurg manage page (`?state=` query values)
export const TORRENT_STATES = {
  BROKEN: 'status_broken',
  UNDER_REPAIR: 'status_under_repair',
} as const;

// Human readable state labels for log lines
export const TORRENT_STATE_LABELS = {
  status_broken: 'broken',
  status_under_repair: 'under repair',
} as const;

// Zurg HTTP surface
export const ZURG_ENDPOINTS = {
  STATS: '/stats',
  MANAGE: '/manage/',
  MANAGE_BY_STATE: (state: string) => `/manage/?state=${encodeURIComponent(state)}`,
  REPAIR: (hash: string) => `/manage/${hash}/repair`,
} as const;

// Built-in configuration defaults (lowest precedence)
export const CONFIG_DEFAULTS = {
  ZURG_URL: 'http://localhost:9999',
  CHECK_INTERVAL_MINUTES: 30,
  RATE_LIMIT_REQUESTS: 10,
  RATE_LIMIT_DELAY_SECONDS: 0.5,
  RATE_LIMIT_BACKOFF_SECONDS: 5,
  LOG_FILE_NAME: 'zurg-monitor.log',
  // Looked up in this order within each search directory
  CONFIG_FILE_NAMES: ['zurg-monitor.conf', 'zurg-monitor.yml'],
} as const;

// Request timeouts in milliseconds
export const REQUEST_TIMEOUTS = {
  DEFAULT_MS: 30 * 1000,
  CONNECTION_TEST_MS: 10 * 1000,
} as const;

// Repair trigger pacing
export const REPAIR_LIMITS = {
  // Pause after every trigger call, independent of the rate limiter
  POST_TRIGGER_PAUSE_MS: 500,
} as const;

// HTML extraction bounds
export const PARSER_LIMITS = {
  // Max row span scanned when no closing </tr> follows a row marker
  ROW_SCAN_MAX_CHARS: 2000,
  // Characters taken on each side of a manage link in fallback mode
  FALLBACK_CONTEXT_CHARS: 1000,
  // Generic link texts at or below this length are not accepted as names
  MIN_LINK_NAME_LENGTH: 5,
  HASH_LENGTH: 40,
} as const;

// Rotating log file sink
export const LOG_ROTATION = {
  MAX_FILE_SIZE: '10M',
  MAX_FILES: 10,
} as const;

// Report layout
export const REPORT_CONFIG = {
  RULE_WIDTH: 72,
  LABEL_WIDTH: 27,
} as const;

export const TIME_MS = {
  SECOND: 1000,
  MINUTE: 60 * 1000,
} as const;

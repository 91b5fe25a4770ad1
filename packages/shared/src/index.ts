/**
 * @zurgmon/shared - Shared types, schemas, and constants
 */

// Type exports
export type {
  // Torrent
  TorrentState,
  TorrentInfo,
  // Stats
  CheckStats,
  PreviousCheckSnapshot,
  OverallStats,
  CheckComparison,
} from './types.js';

// Schema exports
export {
  checkIntervalSchema,
  configFileSectionSchema,
  configFileSchema,
  monitorConfigSchema,
} from './schemas.js';

export type {
  ConfigFileSection,
  MonitorConfigInput,
  MonitorConfig,
} from './schemas.js';

// Constant exports
export {
  APP_INFO,
  TORRENT_STATES,
  TORRENT_STATE_LABELS,
  ZURG_ENDPOINTS,
  CONFIG_DEFAULTS,
  REQUEST_TIMEOUTS,
  REPAIR_LIMITS,
  PARSER_LIMITS,
  LOG_ROTATION,
  REPORT_CONFIG,
  TIME_MS,
} from './constants.js';

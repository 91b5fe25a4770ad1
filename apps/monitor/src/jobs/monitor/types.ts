/**
 * Monitor Job Type Definitions
 */

import type { CheckComparison, MonitorConfig, TorrentInfo } from '@zurgmon/shared';
import type { IZurgClient } from '../../services/zurg/types.js';
import type { MonitorLogger } from '../../utils/logger.js';
import type { Sleep } from '../../utils/timing.js';
import type { MonitorStatsTracker } from './statsTracker.js';

/**
 * Settings the scheduler and processor read from the resolved configuration
 */
export type MonitorSettings = Pick<
  MonitorConfig,
  'zurgUrl' | 'username' | 'checkIntervalMinutes' | 'logFile' | 'dryRun'
>;

/**
 * Result of comparing the current cycle with the previous snapshot
 */
export interface ReconciliationResult {
  /** Both categories are empty */
  healthy: boolean;
  /** Torrents to trigger: every broken one, then every under-repair one, in listing order */
  candidates: TorrentInfo[];
  /** Hashes listed in both categories */
  overlap: string[];
  comparison: CheckComparison;
}

/**
 * Dependencies of a single check cycle
 */
export interface CheckContext {
  client: IZurgClient;
  tracker: MonitorStatsTracker;
  logger: MonitorLogger;
  dryRun: boolean;
  sleep?: Sleep;
  now?: () => Date;
}

export type CheckResult =
  | { status: 'aborted' }
  | { status: 'healthy'; comparison: CheckComparison }
  | {
      status: 'repaired';
      comparison: CheckComparison;
      attempted: number;
      triggered: number;
    };

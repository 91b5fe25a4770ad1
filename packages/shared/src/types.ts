/**
 * Core type definitions for the Zurg repair monitor
 */

import type { TORRENT_STATES } from './constants.js';

// Torrent types
export type TorrentState = (typeof TORRENT_STATES)[keyof typeof TORRENT_STATES];

export interface TorrentInfo {
  /** 40-character lowercase hex info hash */
  hash: string;
  name: string;
  state: TorrentState;
}

// Statistics types

/**
 * Working state of a single check cycle. Replaced at the start of every cycle.
 */
export interface CheckStats {
  totalTorrents: number;
  okTorrents: number;
  brokenFound: number;
  underRepairFound: number;
  repairsTriggered: number;
  // Parallel arrays in listing order
  brokenHashes: string[];
  brokenNames: string[];
  underRepairHashes: string[];
  underRepairNames: string[];
}

/**
 * Identifier sets observed one cycle ago, used only for delta metrics.
 */
export interface PreviousCheckSnapshot {
  broken: ReadonlySet<string>;
  underRepair: ReadonlySet<string>;
  /** Everything the monitor attempted to repair in the previous cycle */
  triggered: ReadonlySet<string>;
}

export interface OverallStats {
  totalChecks: number;
  brokenFound: number;
  underRepairFound: number;
  repairsTriggered: number;
  lastCheck: Date | null;
  lastBrokenFound: Date | null;
  currentCheck: CheckStats;
  previous: PreviousCheckSnapshot;
}

/**
 * Delta metrics between the current cycle and the previous snapshot
 */
export interface CheckComparison {
  repaired: number;
  movedToRepair: number;
  stillBroken: number;
  stillUnderRepair: number;
  newBroken: number;
  /** Percentage rounded to one decimal; null when nothing was triggered previously */
  successRate: number | null;
}

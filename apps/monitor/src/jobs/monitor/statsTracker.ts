/**
 * Monitor Statistics
 *
 * Process-lifetime counters plus the working state of the cycle in progress.
 * Nothing here survives a restart.
 */

import type {
  CheckStats,
  OverallStats,
  PreviousCheckSnapshot,
  TorrentInfo,
} from '@zurgmon/shared';

export function createCheckStats(): CheckStats {
  return {
    totalTorrents: 0,
    okTorrents: 0,
    brokenFound: 0,
    underRepairFound: 0,
    repairsTriggered: 0,
    brokenHashes: [],
    brokenNames: [],
    underRepairHashes: [],
    underRepairNames: [],
  };
}

export function emptySnapshot(): PreviousCheckSnapshot {
  return { broken: new Set(), underRepair: new Set(), triggered: new Set() };
}

/**
 * Healthy torrents implied by the category counts
 *
 * @returns `okTorrents` clamped to 0, and whether the counts exceeded the total
 *
 * @example
 * calculateOkTorrents(100, 3, 2); // { okTorrents: 95, overCounted: false }
 * calculateOkTorrents(0, 3, 2);   // { okTorrents: 0, overCounted: false } (total unknown)
 * calculateOkTorrents(4, 3, 2);   // { okTorrents: 0, overCounted: true }
 */
export function calculateOkTorrents(
  total: number,
  broken: number,
  underRepair: number
): { okTorrents: number; overCounted: boolean } {
  if (total <= 0) return { okTorrents: 0, overCounted: false };
  const ok = total - broken - underRepair;
  return ok < 0 ? { okTorrents: 0, overCounted: true } : { okTorrents: ok, overCounted: false };
}

export class MonitorStatsTracker {
  private totalChecks = 0;
  private brokenFound = 0;
  private underRepairFound = 0;
  private repairsTriggered = 0;
  private lastCheck: Date | null = null;
  private lastBrokenFound: Date | null = null;
  private current: CheckStats = createCheckStats();
  private snapshot: PreviousCheckSnapshot = emptySnapshot();

  /** Replace the current cycle's working state */
  startCheck(): void {
    this.current = createCheckStats();
  }

  recordTotal(total: number): void {
    this.current.totalTorrents = total;
  }

  /**
   * Count a cycle in which both category listings failed.
   * The previous snapshot is left untouched.
   */
  recordAbortedCheck(now: Date): void {
    this.totalChecks++;
    this.lastCheck = now;
  }

  /**
   * Record the cycle's category listings
   *
   * @returns whether the category counts exceeded a known total
   */
  recordObservations(
    broken: readonly TorrentInfo[],
    underRepair: readonly TorrentInfo[],
    now: Date
  ): { overCounted: boolean } {
    this.totalChecks++;
    this.lastCheck = now;

    const check = this.current;
    check.brokenFound = broken.length;
    check.underRepairFound = underRepair.length;
    check.brokenHashes = broken.map((t) => t.hash);
    check.brokenNames = broken.map((t) => t.name);
    check.underRepairHashes = underRepair.map((t) => t.hash);
    check.underRepairNames = underRepair.map((t) => t.name);

    this.brokenFound += broken.length;
    this.underRepairFound += underRepair.length;
    if (broken.length > 0) this.lastBrokenFound = now;

    const { okTorrents, overCounted } = calculateOkTorrents(
      check.totalTorrents,
      check.brokenFound,
      check.underRepairFound
    );
    check.okTorrents = okTorrents;
    return { overCounted };
  }

  recordRepairTriggered(): void {
    this.current.repairsTriggered++;
    this.repairsTriggered++;
  }

  /**
   * Replace the previous snapshot with the current cycle's categories
   *
   * @param triggered - Hashes the cycle attempted to repair (empty for a healthy cycle)
   */
  commitSnapshot(triggered: Iterable<string>): void {
    this.snapshot = {
      broken: new Set(this.current.brokenHashes),
      underRepair: new Set(this.current.underRepairHashes),
      triggered: new Set(triggered),
    };
  }

  get previous(): PreviousCheckSnapshot {
    return this.snapshot;
  }

  get currentCheck(): Readonly<CheckStats> {
    return this.current;
  }

  getStats(): OverallStats {
    return {
      totalChecks: this.totalChecks,
      brokenFound: this.brokenFound,
      underRepairFound: this.underRepairFound,
      repairsTriggered: this.repairsTriggered,
      lastCheck: this.lastCheck,
      lastBrokenFound: this.lastBrokenFound,
      currentCheck: {
        ...this.current,
        brokenHashes: [...this.current.brokenHashes],
        brokenNames: [...this.current.brokenNames],
        underRepairHashes: [...this.current.underRepairHashes],
        underRepairNames: [...this.current.underRepairNames],
      },
      previous: this.snapshot,
    };
  }
}

/**
 * Check Reconciliation
 *
 * Pure functions comparing the current cycle's categories with the snapshot
 * kept from the previous cycle. The metrics are informational only: every
 * listed torrent is a repair candidate regardless of its history.
 */

import type {
  CheckComparison,
  PreviousCheckSnapshot,
  TorrentInfo,
} from '@zurgmon/shared';
import type { ReconciliationResult } from './types.js';

function countIn(source: Iterable<string>, predicate: (hash: string) => boolean): number {
  let count = 0;
  for (const hash of source) {
    if (predicate(hash)) count++;
  }
  return count;
}

/**
 * Percentage of `part` in `whole`, rounded to one decimal. Null when `whole` is 0.
 *
 * @example
 * calculateSuccessRate(2, 3); // 66.7
 * calculateSuccessRate(0, 0); // null
 */
export function calculateSuccessRate(part: number, whole: number): number | null {
  if (whole === 0) return null;
  return Math.round((part / whole) * 1000) / 10;
}

/**
 * Compute delta metrics between the previous snapshot and the current hash sets
 *
 * @example
 * // prev.broken = {A, B}, prev.triggered = {A, B, C}, cur.broken = {C}
 * compareWithPreviousCheck(prev, new Set(['C']), new Set());
 * // { repaired: 2, movedToRepair: 0, stillBroken: 0, stillUnderRepair: 0, newBroken: 1, successRate: 66.7 }
 */
export function compareWithPreviousCheck(
  previous: PreviousCheckSnapshot,
  currentBroken: ReadonlySet<string>,
  currentUnderRepair: ReadonlySet<string>
): CheckComparison {
  const repaired = countIn(
    previous.triggered,
    (hash) => !currentBroken.has(hash) && !currentUnderRepair.has(hash)
  );

  return {
    repaired,
    movedToRepair: countIn(previous.broken, (hash) => currentUnderRepair.has(hash)),
    stillBroken: countIn(previous.broken, (hash) => currentBroken.has(hash)),
    stillUnderRepair: countIn(previous.underRepair, (hash) => currentUnderRepair.has(hash)),
    newBroken: countIn(
      currentBroken,
      (hash) => !previous.broken.has(hash) && !previous.underRepair.has(hash)
    ),
    successRate: calculateSuccessRate(repaired, previous.triggered.size),
  };
}

/**
 * Build the cycle's candidate list and metrics from the two category listings
 */
export function reconcile(
  broken: readonly TorrentInfo[],
  underRepair: readonly TorrentInfo[],
  previous: PreviousCheckSnapshot
): ReconciliationResult {
  const brokenHashes = new Set(broken.map((t) => t.hash));
  const underRepairHashes = new Set(underRepair.map((t) => t.hash));

  return {
    healthy: broken.length === 0 && underRepair.length === 0,
    candidates: [...broken, ...underRepair],
    overlap: [...brokenHashes].filter((hash) => underRepairHashes.has(hash)),
    comparison: compareWithPreviousCheck(previous, brokenHashes, underRepairHashes),
  };
}

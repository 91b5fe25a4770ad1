/**
 * Check Processor
 *
 * Runs one monitoring cycle: fetch the total and both category listings,
 * reconcile against the previous cycle, trigger repairs, print the summary and
 * commit the new snapshot. Requests are strictly sequential.
 */

import { REPAIR_LIMITS, TORRENT_STATES } from '@zurgmon/shared';
import { sleep as defaultSleep } from '../../utils/timing.js';
import { reconcile } from './reconciler.js';
import { triggerRepair } from './repair.js';
import { buildCheckSummary, emitLines } from './report.js';
import type { CheckContext, CheckResult } from './types.js';

/**
 * Perform a single check cycle
 *
 * A failure of one category listing is treated as an empty list. When both
 * fail the cycle is counted and abandoned without touching the previous snapshot.
 */
export async function performCheck(ctx: CheckContext): Promise<CheckResult> {
  const { client, tracker, dryRun } = ctx;
  const log = ctx.logger.child({ component: 'processor' });
  const sleep = ctx.sleep ?? defaultSleep;
  const now = ctx.now ?? (() => new Date());

  log.info('Starting torrent status check...');
  tracker.startCheck();

  const total = await client.getTotalTorrentCount();
  if (total !== null) {
    tracker.recordTotal(total);
  }

  const brokenResult = await client.getTorrentsByState(TORRENT_STATES.BROKEN);
  const underRepairResult = await client.getTorrentsByState(TORRENT_STATES.UNDER_REPAIR);

  if (brokenResult === null && underRepairResult === null) {
    log.error('Failed to retrieve torrent status - API calls failed');
    tracker.recordAbortedCheck(now());
    return { status: 'aborted' };
  }
  if (brokenResult === null) {
    log.warn('Failed to fetch broken torrents, continuing with under repair check');
  }
  if (underRepairResult === null) {
    log.warn('Failed to fetch under repair torrents, continuing with broken check');
  }

  const broken = brokenResult ?? [];
  const underRepair = underRepairResult ?? [];

  const { overCounted } = tracker.recordObservations(broken, underRepair, now());
  if (overCounted) {
    const check = tracker.currentCheck;
    log.warn(
      `Category counts exceed total torrent count (${check.brokenFound} broken + ` +
        `${check.underRepairFound} under repair > ${check.totalTorrents} total), reporting 0 OK torrents`
    );
  }

  log.info(`Found ${broken.length} broken torrent(s)`);
  log.info(`Found ${underRepair.length} under repair torrent(s)`);

  if (broken.length > 0) {
    log.warn('BROKEN TORRENTS:');
    for (const torrent of broken) log.warn(`  - ${torrent.name}`);
  }
  if (underRepair.length > 0) {
    log.info('UNDER REPAIR:');
    for (const torrent of underRepair) log.info(`  - ${torrent.name}`);
  }

  const previous = tracker.previous;
  const result = reconcile(broken, underRepair, previous);
  const comparison = previous.triggered.size > 0 ? result.comparison : null;

  if (result.overlap.length > 0) {
    log.warn(
      { overlap: result.overlap },
      `${result.overlap.length} torrent(s) listed as both broken and under repair`
    );
  }

  if (result.healthy) {
    log.success('✓ No broken or under repair torrents found - library is healthy!');
    log.info('Torrent status check completed');
    emitLines(log, buildCheckSummary(tracker.currentCheck, comparison));
    tracker.commitSnapshot([]);
    return { status: 'healthy', comparison: result.comparison };
  }

  log.info(`${dryRun ? 'Would trigger' : 'Triggering'} repairs...`);

  let triggered = 0;
  for (const [index, torrent] of result.candidates.entries()) {
    if (index === broken.length) {
      log.info(`${dryRun ? 'Would re-trigger' : 'Re-triggering'} repairs for under repair torrents...`);
    }
    if (await triggerRepair(client, torrent, { dryRun, logger: log })) {
      tracker.recordRepairTriggered();
      triggered++;
    }
    await sleep(REPAIR_LIMITS.POST_TRIGGER_PAUSE_MS);
  }

  log.info('Torrent status check completed');
  emitLines(log, buildCheckSummary(tracker.currentCheck, comparison));
  tracker.commitSnapshot(result.candidates.map((t) => t.hash));

  return {
    status: 'repaired',
    comparison: result.comparison,
    attempted: result.candidates.length,
    triggered,
  };
}

/**
 * Repair trigger for a single torrent
 */

import type { TorrentInfo } from '@zurgmon/shared';
import type { IZurgClient } from '../../services/zurg/types.js';
import type { MonitorLogger } from '../../utils/logger.js';

export interface TriggerOptions {
  dryRun: boolean;
  logger: MonitorLogger;
}

/**
 * Ask Zurg to repair one torrent. In dry-run mode nothing is sent and the
 * attempt counts as successful.
 */
export async function triggerRepair(
  client: IZurgClient,
  torrent: TorrentInfo,
  { dryRun, logger }: TriggerOptions
): Promise<boolean> {
  if (dryRun) {
    logger.info(`[DRY RUN] Would trigger repair for: ${torrent.name}`);
    return true;
  }

  logger.info(`Triggering repair for torrent: ${torrent.name}`);
  const ok = await client.triggerRepair(torrent.hash);
  if (ok) {
    logger.success(`Successfully triggered repair for: ${torrent.name}`);
  } else {
    logger.error({ hash: torrent.hash }, `Failed to trigger repair for: ${torrent.name}`);
  }
  return ok;
}

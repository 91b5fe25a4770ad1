/**
 * Process identity (PUID/PGID)
 *
 * Container images start the monitor as root and pass the target user through
 * PUID/PGID. When both are numeric and the process is root, the log directory is
 * handed over first and privileges are dropped afterwards. Nothing here is fatal.
 */

import { chownSync } from 'node:fs';
import { PermissionError, describeError } from './errors.js';
import type { MonitorLogger } from './logger.js';

export interface ProcessIdentity {
  geteuid?: () => number;
  setgid?: (id: number) => void;
  setuid?: (id: number) => void;
  chown: (path: string, uid: number, gid: number) => void;
}

export interface IdentityResult {
  applied: boolean;
  uid?: number;
  gid?: number;
}

const defaultIdentity: ProcessIdentity = {
  geteuid: process.geteuid ? () => process.geteuid?.() ?? -1 : undefined,
  setgid: process.setgid ? (id) => process.setgid?.(id) : undefined,
  setuid: process.setuid ? (id) => process.setuid?.(id) : undefined,
  chown: chownSync,
};

/**
 * Parse a PUID/PGID value. Returns null for anything but a non-negative integer.
 */
export function parseId(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  return Number.parseInt(value.trim(), 10);
}

/**
 * Apply PUID/PGID from the environment
 *
 * @param env - Environment to read PUID/PGID from
 * @param logDir - Directory handed to the target user before privileges drop
 */
export function applyProcessIdentity(
  env: NodeJS.ProcessEnv,
  logDir: string,
  logger: MonitorLogger,
  identity: ProcessIdentity = defaultIdentity
): IdentityResult {
  const rawUid = env.PUID;
  const rawGid = env.PGID;
  if (!rawUid || !rawGid) return { applied: false };

  const uid = parseId(rawUid);
  const gid = parseId(rawGid);
  if (uid === null || gid === null) {
    const error = new PermissionError('PUID and PGID must be numeric', { puid: rawUid, pgid: rawGid });
    logger.warn({ err: error }, `Could not apply PUID/PGID: ${error.message}`);
    return { applied: false };
  }

  const { geteuid, setgid, setuid } = identity;
  if (!geteuid || !setgid || !setuid) {
    logger.debug('PUID/PGID ignored: process identity cannot be changed on this platform');
    return { applied: false };
  }
  if (geteuid() !== 0) {
    logger.debug({ uid, gid }, 'PUID/PGID ignored: not running as root');
    return { applied: false };
  }

  try {
    identity.chown(logDir, uid, gid);
  } catch (err) {
    const error = new PermissionError(`Could not change owner of ${logDir}`, {
      reason: describeError(err),
    });
    logger.warn({ err: error }, error.message);
  }

  try {
    // Group first: once the uid is dropped setgid is no longer permitted
    setgid(gid);
    setuid(uid);
  } catch (err) {
    const error = new PermissionError('Could not apply PUID/PGID', { reason: describeError(err) });
    logger.warn({ err: error }, `${error.message}: ${describeError(err)}`);
    return { applied: false, uid, gid };
  }

  logger.debug(`Applied permissions: UID=${uid}, GID=${gid}`);
  return { applied: true, uid, gid };
}

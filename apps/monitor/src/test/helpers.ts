/**
 * Test helper utilities: capturing logger and an in-memory Zurg client
 */

import pino from 'pino';
import type { TorrentInfo, TorrentState } from '@zurgmon/shared';
import type { IZurgClient } from '../services/zurg/types.js';
import { CUSTOM_LEVELS, type MonitorLogLevel, type MonitorLogger } from '../utils/logger.js';

// pino level numbers as they appear in captured entries
export const LEVELS = {
  trace: 10,
  debug: 20,
  info: 30,
  success: 35,
  output: 36,
  warn: 40,
  error: 50,
} as const;

export interface LogEntry {
  level: number;
  msg: string;
  fields: Record<string, unknown>;
}

function toEntry(line: string): LogEntry {
  const parsed: unknown = JSON.parse(line);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Unexpected log line: ${line}`);
  }
  const fields: Record<string, unknown> = { ...parsed };
  const { level, msg } = fields;
  return {
    level: typeof level === 'number' ? level : -1,
    msg: typeof msg === 'string' ? msg : '',
    fields,
  };
}

export interface TestLogger {
  logger: MonitorLogger;
  entries: LogEntry[];
  /** Messages logged at `level`, or all messages when omitted */
  messages(level?: number): string[];
}

/**
 * Logger that records every entry (all levels) in memory
 */
export function createTestLogger(): TestLogger {
  const entries: LogEntry[] = [];
  const logger = pino<MonitorLogLevel>(
    { level: 'trace', customLevels: CUSTOM_LEVELS },
    {
      write(line: string) {
        entries.push(toEntry(line));
      },
    }
  );

  return {
    logger,
    entries,
    messages: (level) =>
      entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.msg),
  };
}

/**
 * In-memory IZurgClient. `null` listings simulate a failed request.
 */
export class FakeZurgClient implements IZurgClient {
  connected = true;
  total: number | null = 0;
  listings: Record<TorrentState, TorrentInfo[] | null> = {
    status_broken: [],
    status_under_repair: [],
  };
  /** Hashes whose repair request fails */
  failingRepairs = new Set<string>();

  readonly calls: string[] = [];
  readonly repairCalls: string[] = [];

  async testConnection(): Promise<boolean> {
    this.calls.push('testConnection');
    return this.connected;
  }

  async getTotalTorrentCount(): Promise<number | null> {
    this.calls.push('getTotalTorrentCount');
    return this.total;
  }

  async getTorrentsByState(state: TorrentState): Promise<TorrentInfo[] | null> {
    this.calls.push(`getTorrentsByState:${state}`);
    const listing = this.listings[state];
    return listing === null ? null : [...listing];
  }

  async triggerRepair(hash: string): Promise<boolean> {
    this.calls.push(`triggerRepair:${hash}`);
    this.repairCalls.push(hash);
    return !this.failingRepairs.has(hash);
  }
}

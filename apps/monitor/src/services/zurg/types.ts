/**
 * Zurg Integration Types
 */

import type { TorrentInfo, TorrentState } from '@zurgmon/shared';
import type { RequestFailure } from '../../utils/http.js';

/**
 * Outcome of a single request. Failures are values, never thrown.
 */
export type RequestResult = { ok: true; body: string } | { ok: false; failure: RequestFailure };

export interface RequestOptions {
  method?: 'GET' | 'POST';
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

export interface ZurgClientConfig {
  url: string;
  username?: string;
  password?: string;
}

/**
 * Operations the monitor needs from a Zurg instance
 */
export interface IZurgClient {
  /** Probe `/stats`; true only for a non-empty response body */
  testConnection(): Promise<boolean>;

  /** Number of distinct torrents in the full listing, or null when unavailable */
  getTotalTorrentCount(): Promise<number | null>;

  /** Torrents currently in `state`, or null when the listing could not be fetched */
  getTorrentsByState(state: TorrentState): Promise<TorrentInfo[] | null>;

  /** Ask Zurg to repair a torrent; true when the request succeeded */
  triggerRepair(hash: string): Promise<boolean>;
}

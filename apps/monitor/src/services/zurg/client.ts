/**
 * Zurg Client
 *
 * Implements IZurgClient over the Zurg management interface. Every request goes
 * through the rate limiter and carries the identifying headers (plus Basic auth
 * when credentials are configured).
 */

import {
  REQUEST_TIMEOUTS,
  TORRENT_STATE_LABELS,
  ZURG_ENDPOINTS,
  type TorrentInfo,
  type TorrentState,
} from '@zurgmon/shared';
import { HttpClientError, classifyRequestError, fetchText, zurgHeaders } from '../../utils/http.js';
import type { MonitorLogger } from '../../utils/logger.js';
import { countTotalTorrents, parseTorrentsFromHtml, type NameExtractionStrategy } from './parser.js';
import type { RateLimiter } from './rateLimiter.js';
import type { IZurgClient, RequestOptions, RequestResult, ZurgClientConfig } from './types.js';

const FAILURE_PREFIX = {
  transport: 'URL Error',
  unexpected: 'Unexpected error',
} as const;

/**
 * Zurg client implementation
 *
 * @example
 * const client = new ZurgClient({ url: 'http://localhost:9999' }, limiter, logger);
 * const broken = await client.getTorrentsByState('status_broken');
 */
export class ZurgClient implements IZurgClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly log: MonitorLogger;

  constructor(
    config: ZurgClientConfig,
    private readonly rateLimiter: RateLimiter,
    logger: MonitorLogger,
    private readonly nameStrategies?: readonly NameExtractionStrategy[]
  ) {
    this.baseUrl = config.url.replace(/\/+$/, '');
    this.headers = zurgHeaders(config);
    this.log = logger.child({ component: 'zurg-client' });
    if (this.headers['Authorization']) {
      this.log.trace(`Using authentication for user: ${config.username ?? ''}`);
    }
  }

  /**
   * Perform one rate-limited request. Failures are logged and returned, never thrown.
   */
  async request(path: string, options: RequestOptions = {}): Promise<RequestResult> {
    const { method = 'GET', timeoutMs = REQUEST_TIMEOUTS.DEFAULT_MS } = options;
    const url = `${this.baseUrl}${path}`;

    await this.rateLimiter.acquire();
    this.log.trace(`Making ${method} request to: ${url}`);

    try {
      const body = await fetchText(url, {
        method,
        headers: this.headers,
        service: 'zurg',
        timeout: timeoutMs,
      });
      this.log.trace(`Request successful, received ${Buffer.byteLength(body)} bytes`);
      return { ok: true, body };
    } catch (error) {
      const failure = classifyRequestError(error, url, timeoutMs);
      const err = error instanceof HttpClientError ? error.toExternalServiceError() : error;
      const message =
        failure.kind === 'protocol'
          ? `HTTP Error ${failure.reason.replace(' ', ': ')} for URL: ${url}`
          : `${FAILURE_PREFIX[failure.kind]}: ${failure.reason} for URL: ${url}`;
      this.log.error({ err, failure }, message);
      return { ok: false, failure };
    }
  }

  async testConnection(): Promise<boolean> {
    this.log.debug(`Testing connection to Zurg at ${this.baseUrl}...`);
    const result = await this.request(ZURG_ENDPOINTS.STATS, {
      timeoutMs: REQUEST_TIMEOUTS.CONNECTION_TEST_MS,
    });

    if (result.ok && result.body.length > 0) {
      this.log.success('Successfully connected to Zurg');
      return true;
    }
    this.log.error('Failed to connect to Zurg');
    return false;
  }

  async getTotalTorrentCount(): Promise<number | null> {
    this.log.debug('Fetching total torrent statistics...');
    const result = await this.request(ZURG_ENDPOINTS.MANAGE);
    if (!result.ok) {
      this.log.error('Failed to fetch torrents page');
      return null;
    }

    this.log.debug(`Successfully fetched torrents page (${result.body.length} bytes)`);
    const total = countTotalTorrents(result.body);
    this.log.debug(`Found ${total} total torrent(s)`);
    return total;
  }

  async getTorrentsByState(state: TorrentState): Promise<TorrentInfo[] | null> {
    const label = TORRENT_STATE_LABELS[state];
    this.log.debug(`Fetching ${label} torrents from Zurg...`);

    const result = await this.request(ZURG_ENDPOINTS.MANAGE_BY_STATE(state));
    if (!result.ok) {
      this.log.error(`Failed to fetch ${label} torrents page`);
      return null;
    }

    this.log.debug(`Successfully fetched ${label} torrents page (${result.body.length} bytes)`);
    const torrents = parseTorrentsFromHtml(result.body, state, this.nameStrategies);
    for (const torrent of torrents) {
      this.log.trace(`  Found ${label} torrent: ${torrent.name}`);
    }
    this.log.debug(`Successfully parsed ${torrents.length} ${label} torrent(s)`);
    return torrents;
  }

  async triggerRepair(hash: string): Promise<boolean> {
    const path = ZURG_ENDPOINTS.REPAIR(hash);
    this.log.debug(`  Repair URL: ${this.baseUrl}${path}`);
    const result = await this.request(path, { method: 'POST' });
    return result.ok;
  }
}

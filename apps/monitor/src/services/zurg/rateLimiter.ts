/**
 * Request rate limiter for the Zurg client
 *
 * Every request waits a short delay; after `maxRequests` requests the next one
 * waits the longer backoff instead and the counter starts over.
 */

import { TIME_MS } from '@zurgmon/shared';
import type { MonitorLogger } from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/timing.js';

export interface RateLimiterOptions {
  maxRequests: number;
  delaySeconds: number;
  backoffSeconds: number;
  logger: MonitorLogger;
  sleep?: Sleep;
}

export class RateLimiter {
  private count = 0;
  private readonly sleep: Sleep;

  constructor(private readonly options: RateLimiterOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Requests made since the last backoff */
  get requestCount(): number {
    return this.count;
  }

  /**
   * Wait before the next request
   *
   * @example
   * // maxRequests = 2: delay, delay, backoff, delay, delay, backoff, ...
   * await limiter.acquire();
   */
  async acquire(): Promise<void> {
    const { maxRequests, delaySeconds, backoffSeconds, logger } = this.options;

    if (this.count >= maxRequests) {
      logger.debug(
        `Rate limit reached (${maxRequests} requests), backing off for ${backoffSeconds}s...`
      );
      await this.sleep(backoffSeconds * TIME_MS.SECOND);
      this.count = 0;
      return;
    }

    this.count++;
    await this.sleep(delaySeconds * TIME_MS.SECOND);
  }
}

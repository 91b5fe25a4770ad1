/**
 * Monitor Scheduler
 *
 * Drives check cycles either once or on a fixed interval until aborted.
 * Cancellation only takes effect at the inter-cycle sleep; a cycle that has
 * started always finishes.
 */

import { APP_INFO, REPORT_CONFIG, TIME_MS, type OverallStats } from '@zurgmon/shared';
import { describeError } from '../../utils/errors.js';
import type { MonitorLogger } from '../../utils/logger.js';
import { isAbortError, sleep as defaultSleep, type Sleep } from '../../utils/timing.js';
import type { IZurgClient } from '../../services/zurg/types.js';
import { performCheck } from './processor.js';
import { buildBanner, buildOverallStatistics, emitLines } from './report.js';
import type { MonitorStatsTracker } from './statsTracker.js';
import type { MonitorSettings } from './types.js';

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface SchedulerDeps {
  client: IZurgClient;
  tracker: MonitorStatsTracker;
  logger: MonitorLogger;
  settings: MonitorSettings;
  sleep?: Sleep;
  now?: () => Date;
}

export class MonitorScheduler {
  private readonly log: MonitorLogger;
  private readonly sleep: Sleep;

  constructor(private readonly deps: SchedulerDeps) {
    this.log = deps.logger.child({ component: 'scheduler' });
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Probe Zurg, run one cycle and print the lifetime statistics
   */
  async runOnce(): Promise<ExitCode> {
    this.logStartup(false);
    if (!(await this.probe())) return EXIT_CODES.FAILURE;

    this.log.output('');
    this.log.info('Running in single-check mode');
    await this.check();

    this.log.output('');
    emitLines(this.log, buildOverallStatistics(this.stats()));
    return EXIT_CODES.OK;
  }

  /**
   * Probe Zurg, then run cycles every `checkIntervalMinutes` until `signal` aborts
   */
  async runContinuous(signal: AbortSignal): Promise<ExitCode> {
    const { checkIntervalMinutes } = this.deps.settings;

    this.logStartup(true);
    if (!(await this.probe())) return EXIT_CODES.FAILURE;

    emitLines(this.log, ['', 'Starting continuous monitoring loop (press Ctrl+C to stop)', '']);

    try {
      while (!signal.aborted) {
        await this.check();

        emitLines(this.log, [
          '',
          `Next check in ${checkIntervalMinutes} minutes...`,
          '='.repeat(REPORT_CONFIG.RULE_WIDTH),
          '',
        ]);
        await this.sleep(checkIntervalMinutes * TIME_MS.MINUTE, signal);
      }
      this.log.warn('Monitoring loop interrupted by user');
    } catch (error) {
      if (isAbortError(error)) {
        this.log.warn('Monitoring loop interrupted by user');
      } else {
        this.log.warn({ err: error }, `Monitoring loop interrupted: ${describeError(error)}`);
      }
    }

    this.log.output('');
    emitLines(this.log, buildOverallStatistics(this.stats()));
    this.log.output('Monitoring stopped');
    return EXIT_CODES.OK;
  }

  private stats(): OverallStats {
    return this.deps.tracker.getStats();
  }

  private async check(): Promise<void> {
    const { client, tracker, logger, settings, now } = this.deps;
    await performCheck({ client, tracker, logger, dryRun: settings.dryRun, sleep: this.sleep, now });
  }

  private async probe(): Promise<boolean> {
    if (await this.deps.client.testConnection()) return true;
    this.log.error('Cannot connect to Zurg - exiting');
    return false;
  }

  private logStartup(continuous: boolean): void {
    const { zurgUrl, username, checkIntervalMinutes, logFile, dryRun } = this.deps.settings;

    emitLines(this.log, buildBanner(`${APP_INFO.NAME} v${APP_INFO.VERSION}`));
    this.log.info(`Starting ${APP_INFO.NAME}`);
    this.log.info(`Zurg URL: ${zurgUrl}`);
    if (continuous) {
      this.log.info(`Check Interval: ${checkIntervalMinutes} minutes`);
    }
    this.log.info(`Log File: ${logFile}`);
    this.log.info(`Authentication: ${username ? 'Enabled' : 'Disabled'}`);
    if (dryRun) {
      this.log.warn('DRY RUN MODE: No repairs will be triggered');
    }
  }
}

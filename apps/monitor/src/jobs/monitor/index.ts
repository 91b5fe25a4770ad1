/**
 * Monitor Module
 *
 * Polling, reconciliation and repair of broken Zurg torrents.
 *
 * @example
 * import { MonitorScheduler, MonitorStatsTracker } from './jobs/monitor/index.js';
 *
 * const scheduler = new MonitorScheduler({ client, tracker: new MonitorStatsTracker(), logger, settings });
 * const exitCode = await scheduler.runContinuous(controller.signal);
 */

// ============================================================================
// Public API - Lifecycle
// ============================================================================

export { MonitorScheduler, EXIT_CODES, type ExitCode, type SchedulerDeps } from './scheduler.js';
export { performCheck } from './processor.js';
export { triggerRepair } from './repair.js';

// ============================================================================
// Types
// ============================================================================

export type { CheckContext, CheckResult, MonitorSettings, ReconciliationResult } from './types.js';

// ============================================================================
// Statistics and Reconciliation (exported for testing)
// ============================================================================

export { MonitorStatsTracker, calculateOkTorrents, createCheckStats, emptySnapshot } from './statsTracker.js';
export { reconcile, compareWithPreviousCheck, calculateSuccessRate } from './reconciler.js';
export { buildCheckSummary, buildOverallStatistics, formatTimestamp } from './report.js';

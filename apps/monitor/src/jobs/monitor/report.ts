/**
 * Report Formatting
 *
 * Pure builders for the per-cycle summary and the lifetime statistics. Each
 * returns the lines to print; callers emit them at the `output` level.
 */

import { REPORT_CONFIG, type CheckComparison, type CheckStats, type OverallStats } from '@zurgmon/shared';
import type { MonitorLogger } from '../../utils/logger.js';

const RULE = '='.repeat(REPORT_CONFIG.RULE_WIDTH);

function field(label: string, value: string | number, indent = '  '): string {
  return `${indent}${`${label}:`.padEnd(REPORT_CONFIG.LABEL_WIDTH)}${value}`;
}

function percentage(part: number, total: number): number {
  return total > 0 ? Math.round((part / total) * 10000) / 100 : 0;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`, or `Never`
 */
export function formatTimestamp(date: Date | null): string {
  if (!date) return 'Never';
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function buildBanner(title: string): string[] {
  return ['', RULE, `  ${title}`, RULE, ''];
}

/**
 * Summary of the cycle that just ran
 *
 * @param comparison - Delta metrics; pass null when the previous cycle triggered nothing
 */
export function buildCheckSummary(check: CheckStats, comparison: CheckComparison | null): string[] {
  const lines = buildBanner('CHECK SUMMARY');

  if (check.totalTorrents > 0) {
    const total = check.totalTorrents;
    lines.push(
      'TORRENT STATISTICS:',
      field('Total Torrents', total),
      field('OK Torrents', `${check.okTorrents} (${percentage(check.okTorrents, total)}%)`),
      field('Broken', `${check.brokenFound} (${percentage(check.brokenFound, total)}%)`),
      field('Under Repair', `${check.underRepairFound} (${percentage(check.underRepairFound, total)}%)`),
      ''
    );
  }

  lines.push(
    'CURRENT CHECK RESULTS:',
    field('Broken Torrents', check.brokenFound),
    field('Under Repair', check.underRepairFound),
    field('Repairs Triggered', check.repairsTriggered)
  );

  if (check.brokenNames.length > 0) {
    lines.push('', '  Broken Torrents:', ...check.brokenNames.map((name) => `    - ${name}`));
  }
  if (check.underRepairNames.length > 0) {
    lines.push('', '  Under Repair:', ...check.underRepairNames.map((name) => `    - ${name}`));
  }

  if (comparison) {
    lines.push(
      '',
      'COMPARISON WITH PREVIOUS CHECK:',
      field('Successfully Repaired', comparison.repaired),
      field('Moved to Repair', comparison.movedToRepair),
      field('Still Broken', comparison.stillBroken),
      field('Still Under Repair', comparison.stillUnderRepair),
      field('New Broken', comparison.newBroken)
    );
    if (comparison.successRate !== null) {
      lines.push(field('Repair Success Rate', `${comparison.successRate}%`));
    }
  }

  lines.push('', RULE, '');
  return lines;
}

/**
 * Lifetime counters, printed on exit
 */
export function buildOverallStatistics(stats: OverallStats): string[] {
  return [
    ...buildBanner('OVERALL STATISTICS'),
    field('Total Checks Performed', stats.totalChecks, ''),
    field('Total Broken Found', stats.brokenFound, ''),
    field('Total Under Repair Found', stats.underRepairFound, ''),
    field('Total Repairs Triggered', stats.repairsTriggered, ''),
    field('Last Check', formatTimestamp(stats.lastCheck), ''),
    field('Last Broken Found', formatTimestamp(stats.lastBrokenFound), ''),
    '',
    RULE,
  ];
}

export function emitLines(logger: MonitorLogger, lines: readonly string[]): void {
  for (const line of lines) {
    logger.output(line);
  }
}

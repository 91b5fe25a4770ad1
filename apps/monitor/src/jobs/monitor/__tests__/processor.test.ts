/**
 * Check Processor Tests
 *
 * Runs performCheck against an in-memory Zurg client:
 * - healthy, repaired and aborted cycles
 * - partial listing failures
 * - dry run, failed triggers, overlap and over-counted totals
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { performCheck } from '../processor.js';
import { MonitorStatsTracker } from '../statsTracker.js';
import type { CheckContext } from '../types.js';
import { FakeZurgClient, createTestLogger, LEVELS, type TestLogger } from '../../../test/helpers.js';
import { HASH_A, HASH_B, HASH_C, HASH_D, createTorrent } from '../../../test/fixtures.js';

const NOW = new Date('2026-03-01T10:00:00Z');

let client: FakeZurgClient;
let tracker: MonitorStatsTracker;
let log: TestLogger;
let sleep: ReturnType<typeof vi.fn>;

function context(overrides: Partial<CheckContext> = {}): CheckContext {
  return {
    client,
    tracker,
    logger: log.logger,
    dryRun: false,
    sleep: async (ms) => {
      sleep(ms);
    },
    now: () => NOW,
    ...overrides,
  };
}

beforeEach(() => {
  client = new FakeZurgClient();
  tracker = new MonitorStatsTracker();
  log = createTestLogger();
  sleep = vi.fn();
});

describe('performCheck', () => {
  it('should fetch the total, then broken, then under repair', async () => {
    await performCheck(context());

    expect(client.calls).toEqual([
      'getTotalTorrentCount',
      'getTorrentsByState:status_broken',
      'getTorrentsByState:status_under_repair',
    ]);
  });

  describe('healthy library', () => {
    it('should report health and commit an empty triggered set', async () => {
      client.total = 25;

      const result = await performCheck(context());

      expect(result.status).toBe('healthy');
      expect(log.messages(LEVELS.success)).toEqual([
        '✓ No broken or under repair torrents found - library is healthy!',
      ]);
      expect(client.repairCalls).toEqual([]);
      expect(tracker.getStats()).toMatchObject({ totalChecks: 1, repairsTriggered: 0, lastCheck: NOW });
      expect(tracker.currentCheck.okTorrents).toBe(25);
      expect(tracker.previous.triggered.size).toBe(0);
    });

    it('should leave everything but the check count unchanged on repeated healthy cycles', async () => {
      await performCheck(context());
      const first = tracker.getStats();

      await performCheck(context());
      const second = tracker.getStats();

      expect(second.totalChecks).toBe(first.totalChecks + 1);
      expect({ ...second, totalChecks: 0 }).toEqual({ ...first, totalChecks: 0 });
    });

    it('should report repairs from the previous cycle', async () => {
      client.listings.status_broken = [createTorrent(HASH_A, 'Broken Movie')];
      await performCheck(context());

      client.listings.status_broken = [];
      const result = await performCheck(context());

      expect(result).toMatchObject({ status: 'healthy', comparison: { repaired: 1, successRate: 100 } });
      expect(log.messages(LEVELS.output)).toContain('  Repair Success Rate:       100%');
    });
  });

  describe('repairs', () => {
    it('should trigger broken torrents first, then re-trigger under-repair ones', async () => {
      client.total = 10;
      client.listings.status_broken = [createTorrent(HASH_A, 'Broken Movie'), createTorrent(HASH_B, 'Broken Show')];
      client.listings.status_under_repair = [createTorrent(HASH_C, 'Repairing Album', 'status_under_repair')];

      const result = await performCheck(context());

      expect(client.repairCalls).toEqual([HASH_A, HASH_B, HASH_C]);
      expect(result).toEqual({
        status: 'repaired',
        comparison: expect.objectContaining({ newBroken: 2 }),
        attempted: 3,
        triggered: 3,
      });
      expect(sleep.mock.calls).toEqual([[500], [500], [500]]);
      expect(log.messages(LEVELS.info)).toContain('Re-triggering repairs for under repair torrents...');
      expect(tracker.getStats()).toMatchObject({ brokenFound: 2, underRepairFound: 1, repairsTriggered: 3 });
      expect(tracker.currentCheck.okTorrents).toBe(7);
      expect([...tracker.previous.triggered]).toEqual([HASH_A, HASH_B, HASH_C]);
    });

    it('should list broken torrents as warnings', async () => {
      client.listings.status_broken = [createTorrent(HASH_A, 'Broken Movie')];

      await performCheck(context());

      expect(log.messages(LEVELS.warn)).toEqual(['BROKEN TORRENTS:', '  - Broken Movie']);
    });

    it('should not count failed triggers but still remember them as attempted', async () => {
      client.listings.status_broken = [createTorrent(HASH_A, 'Broken Movie'), createTorrent(HASH_B, 'Broken Show')];
      client.failingRepairs.add(HASH_A);

      const result = await performCheck(context());

      expect(result).toMatchObject({ status: 'repaired', attempted: 2, triggered: 1 });
      expect(client.repairCalls).toEqual([HASH_A, HASH_B]);
      expect(log.messages(LEVELS.error)).toEqual(['Failed to trigger repair for: Broken Movie']);
      expect(tracker.currentCheck.repairsTriggered).toBe(1);
      expect([...tracker.previous.triggered]).toEqual([HASH_A, HASH_B]);
    });

    it('should only log in dry-run mode but still pause after each trigger', async () => {
      client.listings.status_broken = [createTorrent(HASH_A, 'Broken Movie')];
      client.listings.status_under_repair = [createTorrent(HASH_B, 'Repairing Show', 'status_under_repair')];

      const result = await performCheck(context({ dryRun: true }));

      expect(client.repairCalls).toEqual([]);
      expect(result).toMatchObject({ attempted: 2, triggered: 2 });
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(log.messages(LEVELS.info)).toEqual(
        expect.arrayContaining([
          'Would trigger repairs...',
          '[DRY RUN] Would trigger repair for: Broken Movie',
          'Would re-trigger repairs for under repair torrents...',
          '[DRY RUN] Would trigger repair for: Repairing Show',
        ])
      );
    });

    it('should trigger torrents listed in both categories twice and warn about the overlap', async () => {
      client.listings.status_broken = [createTorrent(HASH_A, 'Listed Twice')];
      client.listings.status_under_repair = [createTorrent(HASH_A, 'Listed Twice', 'status_under_repair')];

      await performCheck(context());

      expect(client.repairCalls).toEqual([HASH_A, HASH_A]);
      expect(log.messages(LEVELS.warn)).toContain('1 torrent(s) listed as both broken and under repair');
      expect(tracker.previous.triggered.size).toBe(1);
    });

    it('should warn and report 0 OK torrents when categories exceed the total', async () => {
      client.total = 1;
      client.listings.status_broken = [createTorrent(HASH_A, 'Broken Movie'), createTorrent(HASH_B, 'Broken Show')];

      await performCheck(context());

      expect(tracker.currentCheck.okTorrents).toBe(0);
      expect(log.messages(LEVELS.warn)).toContain(
        'Category counts exceed total torrent count (2 broken + 0 under repair > 1 total), reporting 0 OK torrents'
      );
    });
  });

  describe('listing failures', () => {
    it('should continue with under-repair torrents when the broken listing fails', async () => {
      client.listings.status_broken = null;
      client.listings.status_under_repair = [
        createTorrent(HASH_C, 'Repairing One', 'status_under_repair'),
        createTorrent(HASH_D, 'Repairing Two', 'status_under_repair'),
      ];

      const result = await performCheck(context());

      expect(log.messages(LEVELS.warn)).toContain(
        'Failed to fetch broken torrents, continuing with under repair check'
      );
      expect(result).toMatchObject({ status: 'repaired', attempted: 2, triggered: 2 });
      expect(client.repairCalls).toEqual([HASH_C, HASH_D]);
      expect(tracker.getStats()).toMatchObject({ totalChecks: 1, brokenFound: 0, underRepairFound: 2 });
    });

    it('should continue with broken torrents when the under-repair listing fails', async () => {
      client.listings.status_broken = [createTorrent(HASH_A, 'Broken Movie')];
      client.listings.status_under_repair = null;

      await performCheck(context());

      expect(log.messages(LEVELS.warn)).toContain(
        'Failed to fetch under repair torrents, continuing with broken check'
      );
      expect(client.repairCalls).toEqual([HASH_A]);
    });

    it('should abandon the cycle when both listings fail', async () => {
      client.listings.status_broken = [createTorrent(HASH_A, 'Broken Movie')];
      await performCheck(context());
      const snapshot = tracker.previous;

      client.listings.status_broken = null;
      client.listings.status_under_repair = null;
      const result = await performCheck(context());

      expect(result).toEqual({ status: 'aborted' });
      expect(log.messages(LEVELS.error)).toEqual(['Failed to retrieve torrent status - API calls failed']);
      expect(tracker.previous).toBe(snapshot);
      expect(tracker.getStats()).toMatchObject({ totalChecks: 2, brokenFound: 1, repairsTriggered: 1 });
      expect(client.repairCalls).toEqual([HASH_A]);
    });
  });
});

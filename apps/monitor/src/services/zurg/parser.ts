/**
 * Zurg Management Page Parser
 *
 * Pure functions for extracting torrents from the HTML served by `/manage/`.
 * Separated from the client for testability; identical input always gives
 * identical output.
 */

import { load } from 'cheerio';
import { PARSER_LIMITS, type TorrentInfo, type TorrentState } from '@zurgmon/shared';

// ============================================================================
// Patterns
// ============================================================================

const HASH = `[a-fA-F0-9]{${PARSER_LIMITS.HASH_LENGTH}}`;
const ROW_PATTERN = new RegExp(`<tr[^>]*data-hash="(${HASH})"[^>]*>`, 'g');
const MANAGE_LINK_PATTERN = new RegExp(`href="/manage/(${HASH})/"`, 'g');
const DATA_HASH_PATTERN = new RegExp(`data-hash="(${HASH})"`, 'g');
const DATA_NAME_PATTERN = /data-name="([^"]+)"/;
const FIRST_LINK_PATTERN = /<a[^>]+>([^<]+)<\/a>/;
const SIZE_PATTERN = /^\d+\.\d+\s*(GB|MB|KB|TB)$/;

/**
 * Decode HTML entities in a text fragment (`&amp;` -> `&`, `&#39;` -> `'`)
 */
export function decodeEntities(text: string): string {
  return load(text, null, false).root().text();
}

function cleanName(raw: string): string {
  return decodeEntities(raw.trim());
}

// ============================================================================
// Name Extraction
// ============================================================================

/**
 * One way of finding a torrent's display name in a block of markup.
 * Returns null when the strategy does not apply.
 */
export interface NameExtractionStrategy {
  name: string;
  extract(context: string, hash: string): string | null;
}

/** Text of the torrent's own `/manage/<hash>/` link */
export const manageLinkTextStrategy: NameExtractionStrategy = {
  name: 'manage-link',
  extract(context, hash) {
    const match = new RegExp(`href="/manage/${hash}/">([^<]+)</a>`, 'i').exec(context);
    return match?.[1] !== undefined ? cleanName(match[1]) : null;
  },
};

/** A `data-name` attribute anywhere in the block */
export const dataNameStrategy: NameExtractionStrategy = {
  name: 'data-name',
  extract(context) {
    const match = DATA_NAME_PATTERN.exec(context);
    return match?.[1] !== undefined ? cleanName(match[1]) : null;
  },
};

/** Text of the first link, unless it is a size ("1.5 GB") or too short to be a title */
export const firstLinkTextStrategy: NameExtractionStrategy = {
  name: 'first-link',
  extract(context) {
    const match = FIRST_LINK_PATTERN.exec(context);
    if (match?.[1] === undefined) return null;
    const name = cleanName(match[1]);
    if (SIZE_PATTERN.test(name) || name.length <= PARSER_LIMITS.MIN_LINK_NAME_LENGTH) {
      return null;
    }
    return name;
  },
};

export const DEFAULT_NAME_STRATEGIES: readonly NameExtractionStrategy[] = [
  manageLinkTextStrategy,
  dataNameStrategy,
  firstLinkTextStrategy,
];

/**
 * Resolve a display name through the strategy chain; the first non-null result wins
 *
 * @example
 * extractTorrentName('<a href="/manage/abc.../">Ubuntu ISO</a>', 'abc...'); // 'Ubuntu ISO'
 * extractTorrentName('<td>nothing</td>', 'abc...'); // 'Unknown (abc...)'
 */
export function extractTorrentName(
  context: string,
  hash: string,
  strategies: readonly NameExtractionStrategy[] = DEFAULT_NAME_STRATEGIES
): string {
  for (const strategy of strategies) {
    const name = strategy.extract(context, hash);
    if (name !== null) return name;
  }
  return `Unknown (${hash})`;
}

// ============================================================================
// Listing Parsing
// ============================================================================

/**
 * Parse torrents of one state from a `/manage/?state=...` page
 *
 * Rows are located by their `data-hash` attribute. When the page has no such
 * rows at all, `/manage/<hash>/` links are used instead. Hashes are lowercased
 * and only their first occurrence is kept.
 */
export function parseTorrentsFromHtml(
  html: string,
  state: TorrentState,
  strategies: readonly NameExtractionStrategy[] = DEFAULT_NAME_STRATEGIES
): TorrentInfo[] {
  const torrents: TorrentInfo[] = [];
  const seen = new Set<string>();
  let rowCount = 0;

  for (const match of html.matchAll(ROW_PATTERN)) {
    rowCount++;
    const hash = match[1]?.toLowerCase();
    if (hash === undefined || seen.has(hash)) continue;
    seen.add(hash);

    const start = match.index ?? 0;
    const rowEnd = html.indexOf('</tr>', start);
    const end = rowEnd === -1 ? Math.min(html.length, start + PARSER_LIMITS.ROW_SCAN_MAX_CHARS) : rowEnd;

    torrents.push({ hash, name: extractTorrentName(html.slice(start, end), hash, strategies), state });
  }

  if (rowCount > 0) return torrents;

  for (const match of html.matchAll(MANAGE_LINK_PATTERN)) {
    const hash = match[1]?.toLowerCase();
    if (hash === undefined || seen.has(hash)) continue;
    seen.add(hash);

    const start = match.index ?? 0;
    const context = html.slice(
      Math.max(0, start - PARSER_LIMITS.FALLBACK_CONTEXT_CHARS),
      Math.min(html.length, start + match[0].length + PARSER_LIMITS.FALLBACK_CONTEXT_CHARS)
    );

    torrents.push({ hash, name: extractTorrentName(context, hash, strategies), state });
  }

  return torrents;
}

/**
 * Count distinct torrents in the full `/manage/` listing
 */
export function countTotalTorrents(html: string): number {
  const hashes = new Set<string>();
  for (const match of html.matchAll(DATA_HASH_PATTERN)) {
    if (match[1] !== undefined) hashes.add(match[1].toLowerCase());
  }
  return hashes.size;
}

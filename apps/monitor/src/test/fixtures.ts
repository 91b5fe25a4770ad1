/**
 * Test fixtures and factory functions for Zurg pages and torrents
 */

import { TORRENT_STATES, type TorrentInfo, type TorrentState } from '@zurgmon/shared';

// 40-character hex hashes
export const HASH_A = 'a1'.repeat(20);
export const HASH_B = 'b2'.repeat(20);
export const HASH_C = 'c3'.repeat(20);
export const HASH_D = 'd4'.repeat(20);

export function createTorrent(
  hash: string,
  name: string,
  state: TorrentState = TORRENT_STATES.BROKEN
): TorrentInfo {
  return { hash, name, state };
}

/**
 * A management table row the way Zurg renders it
 */
export function torrentRow(hash: string, name: string, size = '1.50 GB'): string {
  return [
    `<tr class="torrent-row" data-hash="${hash}">`,
    `  <td><a href="/manage/${hash}/">${name}</a></td>`,
    `  <td><a href="#size">${size}</a></td>`,
    '</tr>',
  ].join('\n');
}

export function managePage(rows: readonly string[]): string {
  return [
    '<!DOCTYPE html>',
    '<html><head><title>Zurg</title></head><body>',
    '<table>',
    '<tr><th>Name</th><th>Size</th></tr>',
    ...rows,
    '</table>',
    '</body></html>',
  ].join('\n');
}

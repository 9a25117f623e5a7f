/**
 * Locate JS variable assignments in watch-page HTML and cut out their
 * object literals.
 */

import { scanBalancedObject, type ExtractedBlob } from './document-scanner.js';
import { isObject, parseTree, type Tree } from './structured-tree.js';

export const PLAYER_RESPONSE_MARKERS: readonly string[] = [
  'ytInitialPlayerResponse = ',
  'var ytInitialPlayerResponse = ',
  'window.ytInitialPlayerResponse = ',
];

export const INITIAL_DATA_MARKERS: readonly string[] = [
  'ytInitialData = {',
  'var ytInitialData = {',
  'window["ytInitialData"] = {',
  'window.ytInitialData = {',
  'ytInitialData": {',
];

export interface LocateOptions {
  /**
   * Keep scanning past a rejected blob for the next occurrence of the same
   * marker. When false, only the first occurrence of each marker is tried.
   */
  resume?: boolean;
}

/**
 * Find the first blob behind any of `markers` that `accept` turns into a
 * value. Markers are tried in order.
 */
export function locateVariable<T>(
  html: string,
  markers: readonly string[],
  accept: (blob: ExtractedBlob) => T | null,
  options: LocateOptions = {},
): T | null {
  for (const marker of markers) {
    let from = 0;
    while (from < html.length) {
      const markerIdx = html.indexOf(marker, from);
      if (markerIdx === -1) break;

      const braceIdx = html.indexOf('{', markerIdx);
      if (braceIdx === -1) break;

      const scan = scanBalancedObject(html, braceIdx);
      if (!scan.ok) {
        if (process.env.DEBUG) console.debug('[watchmeta]', `${marker.trim()} scan failed: ${scan.reason}`);
        break;
      }

      const value = accept(scan.blob);
      if (value !== null) return value;
      if (!options.resume) break;
      from = scan.blob.end;
    }
  }
  return null;
}

/**
 * The raw `ytInitialPlayerResponse` object text, or null.
 */
export function extractPlayerResponseBlob(html: string): ExtractedBlob | null {
  return locateVariable(html, PLAYER_RESPONSE_MARKERS, (blob) => blob);
}

function parseObjectTree(blob: ExtractedBlob): Tree | null {
  const tree = parseTree(blob.text);
  return tree && isObject(tree) ? tree : null;
}

/**
 * The parsed `ytInitialData` tree, or null.
 *
 * Falls back to the first brace after any bare `ytInitialData` token when
 * none of the assignment forms matched.
 */
export function extractInitialData(html: string): Tree | null {
  const located = locateVariable(html, INITIAL_DATA_MARKERS, parseObjectTree, { resume: true });
  if (located) return located;

  const token = html.indexOf('ytInitialData');
  if (token === -1) return null;
  const braceIdx = html.indexOf('{', token + 'ytInitialData'.length);
  if (braceIdx === -1) return null;
  const scan = scanBalancedObject(html, braceIdx);
  return scan.ok ? parseObjectTree(scan.blob) : null;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Last-resort scalar lookup: the value of the first `"key":"value"` pair.
 */
export function extractStringLiteral(text: string, key: string): string | null {
  const match = text.match(new RegExp(`"${escapeRegExp(key)}"\\s*:\\s*"([^"\\\\]*(?:\\\\.[^"\\\\]*)*)"`));
  return match ? match[1] : null;
}

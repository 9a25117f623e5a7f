/**
 * Output formatting and argument parsing for the CLI.
 */

import { InvalidArgumentError } from 'commander';
import { effectiveDescription, WatchMetaError, type DisplayLanguage, type PageConfig, type VideoMetadata } from './types.js';

export function parseTimeout(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds.');
  }
  return n;
}

export function parseLanguage(value: string): DisplayLanguage {
  const v = value.trim().toLowerCase();
  if (v !== 'en' && v !== 'tr') {
    throw new InvalidArgumentError('Language must be "en" or "tr".');
  }
  return v;
}

/**
 * Human-readable metadata block. Empty fields are left out.
 */
export function formatMetadataText(meta: VideoMetadata): string {
  const rows: [string, string | undefined][] = [
    ['Title', meta.title],
    ['Channel', meta.author],
    ['Channel ID', meta.channelId],
    ['Views', meta.viewCountText],
    ['Published', meta.publishedTimeText],
    ['Duration', meta.durationText],
  ];
  const width = Math.max(...rows.map(([label]) => label.length));
  const lines = rows
    .filter((row): row is [string, string] => Boolean(row[1]))
    .map(([label, value]) => `${`${label}:`.padEnd(width + 2)}${value}`);

  const description = effectiveDescription(meta);
  if (description) lines.push('', description);
  return lines.join('\n');
}

export function formatPageConfigText(config: PageConfig): string {
  const entries = Object.entries(config).filter(([, value]) => Boolean(value));
  if (entries.length === 0) return 'No ytcfg values found.';
  return entries.map(([key, value]) => `${key}: ${value}`).join('\n');
}

/**
 * Red error line plus a hint for the failure classes users can act on.
 */
export function formatError(error: Error): string {
  const lines: string[] = [`\x1b[31m✖ ${error.message || String(error)}\x1b[0m`];
  const code = error instanceof WatchMetaError ? error.code : undefined;

  switch (code) {
    case 'TIMEOUT':
      lines.push('\x1b[33m💡 Try increasing timeout: --timeout 30000\x1b[0m');
      break;
    case 'BLOCKED':
      lines.push('\x1b[33m💡 Try a different user agent: --user-agent "Mozilla/5.0..."\x1b[0m');
      lines.push('\x1b[33m💡 Or save the page from a browser and run: watchmeta file page.html --id <id>\x1b[0m');
      break;
    case 'NO_PLAYER_RESPONSE':
      lines.push('\x1b[33m💡 The page has no player data. The video may be private, removed or age-restricted.\x1b[0m');
      break;
    case 'INVALID_URL':
      lines.push('\x1b[33m💡 Pass an 11-character video id or a youtube.com / youtu.be URL.\x1b[0m');
      break;
    default:
      break;
  }
  return lines.join('\n');
}

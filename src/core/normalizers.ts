/**
 * Number, duration and escape normalization for scraped watch-page text.
 */

import type { DisplayLanguage } from '../types.js';

const VIEW_SUFFIX: Record<DisplayLanguage, string> = {
  en: 'views',
  tr: 'görüntülenme',
};

const UNIT_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
  mn: 1_000_000,
  b: 1_000_000_000,
};

/**
 * Parse an approximate count from localized text.
 *
 * Handles grouped digits ("1,234,567", "1.234.567", "1 234 567"), suffixed
 * counts ("1.2K", "3,4M", "2 Mn", "1B") and plain runs of two or more
 * digits. Returns null when nothing matches.
 */
export function approxNumberFromText(text: string): number | null {
  const s = text.trim().toLowerCase();
  if (!s) return null;

  const grouped = s.match(/(?<!\d)(\d{1,3}(?:[.,\s]\d{3})+)(?!\d)/);
  if (grouped) {
    const n = parseInt(grouped[1].replace(/[\s.,]/g, ''), 10);
    if (Number.isFinite(n)) return n;
  }

  const suffixed = s.match(/(?<!\d)(\d+(?:[.,]\d+)?)\s*(k|m|b|mn)\b/);
  if (suffixed) {
    const value = parseFloat(suffixed[1].replace(',', '.'));
    if (!Number.isFinite(value)) return null;
    return Math.round(value * (UNIT_MULTIPLIERS[suffixed[2]] ?? 1));
  }

  const plain = s.match(/(?<!\d)(\d{2,})(?!\d)/);
  if (plain) {
    const n = parseInt(plain[1], 10);
    if (Number.isFinite(n)) return n;
  }

  return null;
}

/** Every decimal digit in `text`, concatenated. */
export function digitsOnly(text: string): string {
  return text.replace(/\D/g, '');
}

/**
 * Count text for a raw capture: the approximate number when it parses,
 * else the bare digits, else empty.
 */
export function countFromCapture(raw: string): string {
  const approx = approxNumberFromText(raw);
  if (approx !== null) return String(approx);
  return digitsOnly(raw);
}

function abbreviate(d: number, divisor: number, unit: string): string {
  const scaled = d / divisor;
  return `${d >= divisor * 10 ? scaled.toFixed(0) : scaled.toFixed(1)}${unit}`;
}

/**
 * Short count without suffix: 987, 1.2K, 34M, 1.1B.
 */
export function formatCountShort(count: number): string {
  if (count >= 1_000_000_000) return abbreviate(count, 1_000_000_000, 'B');
  if (count >= 1_000_000) return abbreviate(count, 1_000_000, 'M');
  if (count >= 1_000) return abbreviate(count, 1_000, 'K');
  return String(count);
}

/**
 * "1.2M views" for an integer string. Anything that isn't a plain integer
 * (placeholders, already-formatted text) is returned unchanged.
 */
export function formatViewCount(countString: string, language: DisplayLanguage = 'en'): string {
  if (!/^\d+$/.test(countString)) return countString;
  return `${formatCountShort(parseInt(countString, 10))} ${VIEW_SUFFIX[language]}`;
}

/**
 * Canonical view-count display for any raw or parsed count text.
 */
export function normalizeViewCountText(raw: string, language: DisplayLanguage = 'en'): string {
  const trimmed = raw.trim();
  if (!trimmed) return '';
  const approx = approxNumberFromText(trimmed);
  if (approx !== null) return formatViewCount(String(approx), language);
  const digits = digitsOnly(trimmed);
  return formatViewCount(digits || trimmed, language);
}

/**
 * Format seconds into M:SS or H:MM:SS.
 */
export function formatDuration(seconds: number): string {
  if (!seconds || isNaN(seconds)) return '0:00';
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = Math.floor(seconds % 60);

  if (h > 0) {
    return `${h}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`;
  }
  return `${m}:${String(s).padStart(2, '0')}`;
}

/**
 * Convert "9:58" or "1:02:03" into seconds. Returns null for anything else.
 */
export function durationTextToSeconds(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+(?::\d+){1,2}$/.test(trimmed)) return null;
  const parts = trimmed.split(':').map((p) => parseInt(p, 10));
  if (parts.length === 2) return parts[0] * 60 + parts[1];
  return parts[0] * 3600 + parts[1] * 60 + parts[2];
}

/**
 * Undo the escapes YouTube leaves in JSON string fragments captured by
 * regex: `\n`, `&` and `\"`.
 */
export function unescapeJsonFragment(s: string): string {
  return s
    .replace(/\\n/g, '\n')
    .replace(/\\u0026/g, '&')
    .replace(/\\"/g, '"');
}

/** Inverse of `unescapeJsonFragment` for text without backslashes. */
export function escapeJsonFragment(s: string): string {
  return s
    .replace(/"/g, '\\"')
    .replace(/&/g, '\\u0026')
    .replace(/\n/g, '\\n');
}

const ENTITY_TO_CHAR: Record<string, string> = {
  '&amp;': '&',
  '&quot;': '"',
  '&#39;': "'",
  '&lt;': '<',
  '&gt;': '>',
};

const CHAR_TO_ENTITY: Record<string, string> = Object.fromEntries(
  Object.entries(ENTITY_TO_CHAR).map(([entity, ch]) => [ch, entity]),
);

/**
 * Decode the five entities found in watch-page attribute values. Single
 * pass, so "&amp;lt;" becomes "&lt;" and not "<".
 */
export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(?:amp|quot|#39|lt|gt);/g, (entity) => ENTITY_TO_CHAR[entity] ?? entity);
}

export function encodeHtmlEntities(text: string): string {
  return text.replace(/[&"'<>]/g, (ch) => CHAR_TO_ENTITY[ch] ?? ch);
}

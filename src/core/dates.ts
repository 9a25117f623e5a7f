/**
 * Publish-date parsing and relative display.
 *
 * Watch pages give dates as ISO days ("2024-01-15"), absolute text
 * ("Sep 11, 2025", "11 Eyl 2025") or relative text ("3 weeks ago",
 * "vor 2 Jahren"). All of them are converted to an ISO timestamp first and
 * then displayed relative to a reference time.
 */

import { readFileSync } from 'fs';
import { WatchMetaError, type DisplayLanguage } from '../types.js';

export type TimeUnit = 'year' | 'month' | 'week' | 'day' | 'hour' | 'minute';

const TIME_UNITS: readonly TimeUnit[] = ['year', 'month', 'week', 'day', 'hour', 'minute'];

interface DisplayStrings {
  units: Record<TimeUnit, [singular: string, plural: string]>;
  ago: string;
  justNow: string;
}

interface DateTokens {
  units: Record<TimeUnit, ReadonlySet<string>>;
  /** Month name or abbreviation → zero-based month index */
  months: Record<DisplayLanguage, ReadonlyMap<string, number>>;
  display: Record<DisplayLanguage, DisplayStrings>;
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

// ---------------------------------------------------------------------------
// Token table
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new WatchMetaError(`Date token table: ${where} must be a list of strings`);
  }
  return value;
}

function section(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new WatchMetaError(`Date token table: ${where} must be an object`);
  }
  return value;
}

function displayString(value: unknown, where: string): string {
  if (typeof value !== 'string') {
    throw new WatchMetaError(`Date token table: ${where} must be a string`);
  }
  return value;
}

function byUnit<T>(make: (unit: TimeUnit) => T): Record<TimeUnit, T> {
  return {
    year: make('year'),
    month: make('month'),
    week: make('week'),
    day: make('day'),
    hour: make('hour'),
    minute: make('minute'),
  };
}

function byLanguage<T>(make: (language: DisplayLanguage) => T): Record<DisplayLanguage, T> {
  return { en: make('en'), tr: make('tr') };
}

function monthTable(value: unknown, language: DisplayLanguage): ReadonlyMap<string, number> {
  if (!Array.isArray(value) || value.length !== 12) {
    throw new WatchMetaError(`Date token table: months.${language} must list 12 months`);
  }
  const byName = new Map<string, number>();
  value.forEach((aliases: unknown, index) => {
    for (const alias of stringList(aliases, `months.${language}[${index}]`)) byName.set(alias, index);
  });
  return byName;
}

function displayStrings(value: unknown, language: DisplayLanguage): DisplayStrings {
  const d = section(value, `display.${language}`);
  return {
    units: byUnit((unit): [string, string] => {
      const [singular, plural] = stringList(d[unit], `display.${language}.${unit}`);
      if (singular === undefined || plural === undefined) {
        throw new WatchMetaError(`Date token table: display.${language}.${unit} needs two forms`);
      }
      return [singular, plural];
    }),
    ago: displayString(d.ago, `display.${language}.ago`),
    justNow: displayString(d.justNow, `display.${language}.justNow`),
  };
}

export function parseDateTokens(raw: unknown): DateTokens {
  const root = section(raw, 'root');
  const unitsIn = section(root.units, 'units');
  const monthsIn = section(root.months, 'months');
  const displayIn = section(root.display, 'display');

  return {
    units: byUnit((unit) => new Set(stringList(unitsIn[unit], `units.${unit}`))),
    months: byLanguage((language) => monthTable(monthsIn[language], language)),
    display: byLanguage((language) => displayStrings(displayIn[language], language)),
  };
}

// data/ sits two levels above both src/core and dist/core
const TOKENS = parseDateTokens(
  JSON.parse(readFileSync(new URL('../../data/date-tokens.json', import.meta.url), 'utf-8')),
);

// ---------------------------------------------------------------------------
// Calendar helpers (UTC)
// ---------------------------------------------------------------------------

function daysInMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

/** Add months, clamping the day to the target month's length. */
function addMonths(date: Date, months: number): Date {
  const total = date.getUTCFullYear() * 12 + date.getUTCMonth() + months;
  const year = Math.floor(total / 12);
  const month = total - year * 12;
  const day = Math.min(date.getUTCDate(), daysInMonth(year, month));
  return new Date(Date.UTC(
    year, month, day,
    date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds(), date.getUTCMilliseconds(),
  ));
}

function fullMonthsBetween(from: Date, to: Date): number {
  let months = (to.getUTCFullYear() - from.getUTCFullYear()) * 12 + (to.getUTCMonth() - from.getUTCMonth());
  if (addMonths(from, months).getTime() > to.getTime()) months--;
  return Math.max(0, months);
}

function toIso(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function isoDay(year: number, monthIndex: number, day: number): string | null {
  if (monthIndex < 0 || monthIndex > 11) return null;
  if (day < 1 || day > daysInMonth(year, monthIndex)) return null;
  return `${year}-${String(monthIndex + 1).padStart(2, '0')}-${String(day).padStart(2, '0')}T00:00:00Z`;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Absolute date text → ISO timestamp at UTC midnight.
 *
 * Recognizes "yyyy-MM-dd" anywhere in the text, "Sep 11, 2025" /
 * "September 11, 2025" (also inside "Streamed live on ..."), and Turkish
 * "11 Eyl 2025" / "11 Eylül 2025".
 */
export function absoluteDateToISO(raw: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const ymd = trimmed.match(/(\d{4})-(\d{2})-(\d{2})/);
  if (ymd) return isoDay(parseInt(ymd[1], 10), parseInt(ymd[2], 10) - 1, parseInt(ymd[3], 10));

  for (const m of trimmed.matchAll(/([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})/g)) {
    const month = TOKENS.months.en.get(m[1].toLowerCase());
    if (month !== undefined) return isoDay(parseInt(m[3], 10), month, parseInt(m[2], 10));
  }

  for (const m of trimmed.matchAll(/(\d{1,2})\s+(\p{L}+)\.?\s+(\d{4})/gu)) {
    const month = TOKENS.months.tr.get(m[2].toLocaleLowerCase('tr'));
    if (month !== undefined) return isoDay(parseInt(m[3], 10), month, parseInt(m[1], 10));
  }

  return null;
}

function detectUnit(lower: string): TimeUnit | null {
  const words = new Set(lower.split(/[^\p{L}]+/u).filter(Boolean));
  for (const unit of TIME_UNITS) {
    for (const token of TOKENS.units[unit]) {
      if (words.has(token)) return unit;
      // CJK units are glued to the following character ("3年前")
      if (/^[\u3040-\u9fff]+$/.test(token) && lower.includes(token)) return unit;
    }
  }
  return null;
}

/**
 * Relative date text ("5 days ago", "3 yıl önce", "hace 2 años") → ISO
 * timestamp computed back from `now`.
 */
export function relativeStringToISO(raw: string, now: Date = new Date()): string | null {
  const lower = raw.trim().toLowerCase();
  if (!lower) return null;

  const num = lower.match(/\d+/);
  if (!num) return null;
  const n = parseInt(num[0], 10);
  if (!(n > 0)) return null;

  const unit = detectUnit(lower);
  switch (unit) {
    case 'year': return toIso(addMonths(now, -12 * n));
    case 'month': return toIso(addMonths(now, -n));
    case 'week': return toIso(new Date(now.getTime() - n * WEEK_MS));
    case 'day': return toIso(new Date(now.getTime() - n * DAY_MS));
    case 'hour': return toIso(new Date(now.getTime() - n * HOUR_MS));
    case 'minute': return toIso(new Date(now.getTime() - n * MINUTE_MS));
    default: return null;
  }
}

// ---------------------------------------------------------------------------
// Display
// ---------------------------------------------------------------------------

function ago(n: number, unit: TimeUnit, language: DisplayLanguage): string {
  const strings = TOKENS.display[language];
  const [singular, plural] = strings.units[unit];
  return strings.ago.replace('{n}', String(n)).replace('{unit}', n === 1 ? singular : plural);
}

/**
 * "3 years ago" style display for an ISO timestamp
 * (`yyyy-MM-ddTHH:mm:ssZ`). Other input is returned unchanged.
 */
export function formatRelativeDate(
  iso: string,
  now: Date = new Date(),
  language: DisplayLanguage = 'en',
): string {
  const m = iso.match(/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/);
  if (!m) return iso;
  const [, y, mo, d, h, mi, s] = m.map((part) => parseInt(part, 10));
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));

  const months = fullMonthsBetween(date, now);
  if (months >= 12) return ago(Math.floor(months / 12), 'year', language);
  if (months > 0) return ago(months, 'month', language);

  const diff = now.getTime() - date.getTime();
  if (diff >= WEEK_MS) return ago(Math.floor(diff / WEEK_MS), 'week', language);
  if (diff >= DAY_MS) return ago(Math.floor(diff / DAY_MS), 'day', language);
  if (diff >= HOUR_MS) return ago(Math.floor(diff / HOUR_MS), 'hour', language);
  if (diff >= MINUTE_MS) return ago(Math.floor(diff / MINUTE_MS), 'minute', language);
  return TOKENS.display[language].justNow;
}

export interface PublishedDisplayOptions {
  now?: Date;
  language?: DisplayLanguage;
}

/**
 * Canonical publish-date display: absolute → relative → passthrough.
 */
export function normalizePublishedDisplay(raw: string, options: PublishedDisplayOptions = {}): string {
  const { now = new Date(), language = 'en' } = options;
  const trimmed = raw.trim();
  if (!trimmed) return '';

  const iso = absoluteDateToISO(trimmed) ?? relativeStringToISO(trimmed, now);
  return iso ? formatRelativeDate(iso, now, language) : trimmed;
}

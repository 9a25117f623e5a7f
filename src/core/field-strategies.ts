/**
 * Per-field strategy lists for the extraction cascade.
 *
 * Order matters: the typed player-response value always comes first, then
 * regex scans over the player-response text, then lookups in the
 * `ytInitialData` tree and regex scans over the whole page.
 */

import type { Strategy } from './cascade.js';
import { countFromCapture, unescapeJsonFragment } from './normalizers.js';
import type { VideoDetails } from './player-response.js';
import { asString, child, select, textOf, type PathSegment, type Tree } from './structured-tree.js';

/**
 * Everything a strategy may read. Trees are parsed on first use and then
 * shared by every strategy of the same extraction.
 */
export interface ExtractionContext {
  html: string;
  /** Player-response object text, or '' when none was located */
  blob: string;
  typed?: VideoDetails;
  initialData(): Tree | undefined;
  playerTree(): Tree | undefined;
}

export interface ViewCountCapture {
  /** Integer count as text */
  count: string;
  /** The capture as it appeared in the page */
  raw: string;
}

type TextStrategy = Strategy<ExtractionContext, string>;

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** First `"name":"value"` in `source`, unescaped. */
export function regexField(source: string, name: string): string | null {
  if (!source) return null;
  const re = new RegExp(`"${escapeRegExp(name)}"\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`);
  const m = source.match(re);
  return m ? unescapeJsonFragment(m[1]) : null;
}

function capture(source: string, re: RegExp): string | null {
  const m = source.match(re);
  return m ? m[1] : null;
}

export const PRIMARY_INFO_PATH: readonly PathSegment[] = [
  'contents', 'twoColumnWatchNextResults', 'results', 'results', 'contents', [], 'videoPrimaryInfoRenderer',
];

export const SECONDARY_INFO_PATH: readonly PathSegment[] = [
  'contents', 'twoColumnWatchNextResults', 'results', 'results', 'contents', [], 'videoSecondaryInfoRenderer',
];

function typedText(field: keyof VideoDetails): TextStrategy {
  return { name: 'typed', run: (ctx) => ctx.typed?.[field] };
}

function blobText(field: string): TextStrategy {
  return { name: `blob:${field}`, run: (ctx) => regexField(ctx.blob, field) };
}

// ---------------------------------------------------------------------------
// Text fields
// ---------------------------------------------------------------------------

export const TITLE_STRATEGIES: readonly TextStrategy[] = [typedText('title'), blobText('title')];

export const AUTHOR_STRATEGIES: readonly TextStrategy[] = [typedText('author'), blobText('author')];

export const CHANNEL_ID_STRATEGIES: readonly TextStrategy[] = [typedText('channelId'), blobText('channelId')];

export const SHORT_DESCRIPTION_STRATEGIES: readonly TextStrategy[] = [
  typedText('shortDescription'),
  blobText('shortDescription'),
];

// ---------------------------------------------------------------------------
// View count
// ---------------------------------------------------------------------------

function countOf(raw: string | null | undefined): ViewCountCapture | null {
  if (!raw) return null;
  const count = countFromCapture(raw);
  return count ? { count, raw } : null;
}

/**
 * View-count text under the primary-info renderer: simpleText, else joined
 * runs, else the short form.
 */
export function primaryInfoViewCountText(root: Tree | undefined): string | null {
  for (const info of select(root, PRIMARY_INFO_PATH)) {
    const holder = child(info, 'viewCount');
    const renderer = child(holder, 'videoViewCountRenderer') ?? child(holder, 'viewCountRenderer');
    if (!renderer) continue;
    const text = textOf(child(renderer, 'viewCount'))?.trim() || asString(child(child(renderer, 'shortViewCount'), 'simpleText'))?.trim();
    if (text) return text;
  }
  return null;
}

export const VIEW_COUNT_STRATEGIES: readonly Strategy<ExtractionContext, ViewCountCapture>[] = [
  { name: 'typed', run: (ctx) => countOf(ctx.typed?.viewCount) },
  { name: 'blob:viewCount', run: (ctx) => countOf(regexField(ctx.blob, 'viewCount')) },
  { name: 'blob:view_count', run: (ctx) => countOf(regexField(ctx.blob, 'view_count')) },
  {
    name: 'html:viewCountText',
    run: (ctx) => countOf(capture(ctx.html, /"viewCountText"\s*:\s*\{\s*"simpleText"\s*:\s*"(.*?)"/s)),
  },
  { name: 'tree:primaryInfo', run: (ctx) => countOf(primaryInfoViewCountText(ctx.initialData())) },
  {
    name: 'html:viewCountRenderer',
    run: (ctx) => countOf(capture(
      ctx.html,
      /"(?:videoViewCountRenderer|viewCountRenderer)"\s*:\s*\{[^{]*?"viewCount"\s*:\s*\{[^{]*?"simpleText"\s*:\s*"(.*?)"/s,
    )),
  },
  {
    name: 'html:shortViewCount',
    run: (ctx) => countOf(capture(ctx.html, /"shortViewCount"[^}]*?"simpleText"\s*:\s*"(.*?)"/s)),
  },
  {
    name: 'html:microformat',
    run: (ctx) => countOf(capture(ctx.html, /"playerMicroformatRenderer"[^{]*?\{[^}]*?"viewCount"\s*:\s*"(\d+)"/s)),
  },
];

/**
 * Live "watching now" text wins over whatever the view-count cascade
 * captured, so the raw text reflects a running stream.
 */
export function liveViewCountText(ctx: ExtractionContext): string | null {
  return primaryInfoViewCountText(ctx.initialData());
}

// ---------------------------------------------------------------------------
// Publish date
// ---------------------------------------------------------------------------

export const PUBLISHED_STRATEGIES: readonly TextStrategy[] = [
  typedText('publishDate'),
  blobText('publishDate'),
  blobText('uploadDate'),
  {
    name: 'html:datePublished',
    run: (ctx) =>
      capture(ctx.html, /"datePublished"\s*:\s*"(\d{4}-\d{2}-\d{2})[^"]*"/) ??
      capture(ctx.html, /itemprop="datePublished"\s+content="(\d{4}-\d{2}-\d{2})/),
  },
  {
    name: 'tree:dateText',
    run: (ctx) => {
      for (const info of select(ctx.initialData(), PRIMARY_INFO_PATH)) {
        const text = asString(child(child(info, 'dateText'), 'simpleText'));
        if (text?.trim()) return text;
      }
      return null;
    },
  },
  { name: 'html:dateText', run: (ctx) => capture(ctx.html, /"dateText"\s*:\s*\{\s*"simpleText"\s*:\s*"(.*?)"/s) },
  {
    name: 'tree:microformat',
    run: (ctx) => {
      const path = ['microformat', 'playerMicroformatRenderer', 'publishDate'];
      return asString(select(ctx.playerTree(), path)[0]) ?? asString(select(ctx.initialData(), path)[0]);
    },
  },
  {
    name: 'html:microformat',
    run: (ctx) => capture(ctx.html, /"playerMicroformatRenderer"[^{]*?\{[^}]*?"publishDate"\s*:\s*"(\d{4}-\d{2}-\d{2})/s),
  },
];

// ---------------------------------------------------------------------------
// Duration
// ---------------------------------------------------------------------------

function seconds(value: string | null | undefined): number | null {
  if (!value || !/^\d+$/.test(value.trim())) return null;
  return parseInt(value, 10);
}

export const DURATION_STRATEGIES: readonly Strategy<ExtractionContext, number>[] = [
  { name: 'typed', run: (ctx) => seconds(ctx.typed?.lengthSeconds) },
  { name: 'blob:lengthSeconds', run: (ctx) => seconds(capture(ctx.blob, /"lengthSeconds"\s*:\s*"?(\d+)"?/)) },
  {
    name: 'blob:approxDurationMs',
    run: (ctx) => {
      const ms = seconds(capture(ctx.blob, /"approxDurationMs"\s*:\s*"?(\d+)"?/));
      return ms === null ? null : Math.floor(ms / 1000);
    },
  },
];

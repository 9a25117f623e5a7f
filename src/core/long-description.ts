/**
 * Long-description recovery.
 *
 * The full description only exists in `ytInitialData`, in one of several
 * renderer shapes, and sometimes only as run arrays that the tree parser
 * never sees because the surrounding object is truncated. Every strategy
 * below produces a candidate; the longest one wins.
 */

import { acceptText, collectCandidates, type Strategy } from './cascade.js';
import { SECONDARY_INFO_PATH, type ExtractionContext } from './field-strategies.js';
import { unescapeJsonFragment } from './normalizers.js';
import { asString, child, items, select, type Tree } from './structured-tree.js';

const ATTRIBUTED_WINDOW = 8000;
const MICROFORMAT_WINDOW = 6000;
const RUNS_MAX_CHARS = 20000;

const TIMESTAMP_LINE = /^(?:\d{1,2}:\d{2}:\d{2}|\d{1,2}:\d{2})\s+\S/;

/** Length in code points, so emoji count once. */
export function charCount(s: string): number {
  return Array.from(s).length;
}

/**
 * Concatenate description runs, starting a new line before every run that
 * opens with a chapter timestamp.
 */
export function combineRuns(texts: readonly string[]): string {
  let out = '';
  for (const raw of texts) {
    const text = raw.replace(/\\n/g, '\n').replace(/\r/g, '');
    if (TIMESTAMP_LINE.test(text) && out && !out.endsWith('\n')) out += '\n';
    out += text;
  }
  return out;
}

function runTexts(node: Tree | undefined): string[] {
  return items(child(node, 'runs')).map((run) => asString(child(run, 'text')) ?? '');
}

// ---------------------------------------------------------------------------
// Run-array scanner
// ---------------------------------------------------------------------------

interface Literal {
  value: string;
  /** Index just past the closing quote */
  end: number;
}

const SIMPLE_ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', b: '\b', f: '\f' };

/** Read a JSON string body starting right after its opening quote. */
function readStringLiteral(source: string, start: number): Literal {
  let value = '';
  let i = start;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '"') return { value, end: i + 1 };
    if (ch !== '\\') {
      value += ch;
      i++;
      continue;
    }
    const esc = source[i + 1] ?? '';
    const hex = esc === 'u' ? source.slice(i + 2, i + 6) : '';
    if (/^[0-9a-fA-F]{4}$/.test(hex)) {
      value += String.fromCharCode(parseInt(hex, 16));
      i += 6;
    } else {
      value += SIMPLE_ESCAPES[esc] ?? esc;
      i += 2;
    }
  }
  return { value, end: source.length };
}

const RUNS_OPENER = /"description"\s*:\s*\{\s*"runs"\s*:\s*\[/;
const TEXT_KEY = /"text"\s*:\s*"/y;

/**
 * Collect every `"text"` value inside the first description run array found
 * after `ytInitialData`, without parsing the surrounding object.
 */
export function scanDescriptionRuns(html: string): string[] {
  const anchor = html.indexOf('ytInitialData');
  if (anchor === -1) return [];
  const tail = html.slice(anchor);
  const opener = RUNS_OPENER.exec(tail);
  if (!opener) return [];

  const texts: string[] = [];
  let collected = 0;
  let depth = 1;
  let i = opener.index + opener[0].length;

  while (i < tail.length && depth > 0 && collected < RUNS_MAX_CHARS) {
    const ch = tail[i];
    if (ch === '"') {
      TEXT_KEY.lastIndex = i;
      const key = TEXT_KEY.exec(tail);
      const literal = readStringLiteral(tail, key ? i + key[0].length : i + 1);
      if (key) {
        texts.push(literal.value);
        collected += literal.value.length;
      }
      i = literal.end;
      continue;
    }
    if (ch === '[') depth++;
    else if (ch === ']') depth--;
    i++;
  }
  return texts;
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

function windowAfter(html: string, marker: string, size: number): string | null {
  const idx = html.indexOf(marker);
  return idx === -1 ? null : html.slice(idx, idx + size);
}

function captureIn(snippet: string | null, re: RegExp): string | null {
  const m = snippet?.match(re);
  return m ? unescapeJsonFragment(m[1]) : null;
}

function structuredDescriptions(root: Tree | undefined): Tree[] {
  return select(root, ['engagementPanels', [], 'engagementPanelSectionListRenderer'])
    .filter((panel) => {
      const id = asString(child(panel, 'identifier')) ??
        asString(child(panel, 'panelIdentifier')) ??
        asString(child(panel, 'targetId')) ?? '';
      return id.includes('structured-description');
    })
    .flatMap((panel) => select(panel, [
      'content', 'structuredDescriptionContentRenderer', 'items', [],
      'videoDescriptionMetadataRenderer', 'description',
    ]));
}

export const LONG_DESCRIPTION_STRATEGIES: readonly Strategy<ExtractionContext, string>[] = [
  {
    name: 'tree:secondaryInfo.simpleText',
    run: (ctx) => {
      const descriptions = select(ctx.initialData(), [...SECONDARY_INFO_PATH, 'description', 'simpleText']);
      const text = asString(descriptions[0]);
      return text === undefined ? null : text.replace(/\\n/g, '\n');
    },
  },
  {
    name: 'tree:secondaryInfo.runs',
    run: (ctx) => {
      const description = select(ctx.initialData(), [...SECONDARY_INFO_PATH, 'description'])[0];
      return combineRuns(runTexts(description));
    },
  },
  {
    name: 'tree:structuredDescription',
    run: (ctx) => {
      for (const description of structuredDescriptions(ctx.initialData())) {
        const simple = asString(child(description, 'simpleText'));
        const text = simple !== undefined ? simple : combineRuns(runTexts(description));
        if (text.trim()) return text;
      }
      return null;
    },
  },
  {
    name: 'html:attributedDescription',
    run: (ctx) => {
      const snippet = windowAfter(ctx.html, '"attributedDescription":', ATTRIBUTED_WINDOW);
      return captureIn(snippet, /"content"\s*:\s*"((?:[^"\\]|\\.)*)"/) ??
        captureIn(snippet, /"simpleText"\s*:\s*"((?:[^"\\]|\\.)*)"/);
    },
  },
  {
    name: 'html:microformatDataRenderer',
    run: (ctx) => captureIn(
      windowAfter(ctx.html, 'microformatDataRenderer', MICROFORMAT_WINDOW),
      /"description"\s*:\s*\{.*?"simpleText"\s*:\s*"((?:[^"\\]|\\.)*)"/s,
    ),
  },
  { name: 'html:descriptionRuns', run: (ctx) => combineRuns(scanDescriptionRuns(ctx.html)) },
];

/**
 * The longest long-description candidate, kept only when it is strictly
 * longer than the short description.
 */
export function selectLongDescription(ctx: ExtractionContext, shortDescription: string): string | undefined {
  const candidates = collectCandidates('longDescription', LONG_DESCRIPTION_STRATEGIES, ctx, acceptText);
  let best: string | undefined;
  for (const { value } of candidates) {
    if (best === undefined || charCount(value) > charCount(best)) best = value;
  }
  if (best === undefined || charCount(best) <= charCount(shortDescription)) return undefined;
  return best;
}

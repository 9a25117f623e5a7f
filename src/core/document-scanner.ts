/**
 * Balanced-object extraction for JSON embedded in HTML/JS text.
 */

/** A balanced `{...}` substring and the index just past its closing brace. */
export interface ExtractedBlob {
  text: string;
  end: number;
}

export type ScanFailure = 'misplaced' | 'unterminated';

export type ScanResult =
  | { ok: true; blob: ExtractedBlob }
  | { ok: false; reason: ScanFailure };

/**
 * Scan forward from `start` (expected to point at `{`) and return the
 * balanced object, inclusive of both braces.
 *
 * Only `{`/`}` move the depth counter; brackets are ignored. Braces inside
 * string literals don't count. A `<` seen before the first brace means the
 * caller pointed into markup, not script, and aborts the scan.
 */
export function scanBalancedObject(text: string, start: number): ScanResult {
  let depth = 0;
  let inString = false;
  let escaping = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaping) {
        escaping = false;
      } else if (ch === '\\') {
        escaping = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return { ok: true, blob: { text: text.slice(start, i + 1), end: i + 1 } };
      }
    } else if (ch === '<' && depth === 0) {
      return { ok: false, reason: 'misplaced' };
    }
  }

  return { ok: false, reason: 'unterminated' };
}

/**
 * Convenience wrapper: the balanced object starting at `start`, or null.
 */
export function extractBalancedObject(text: string, start: number): ExtractedBlob | null {
  const result = scanBalancedObject(text, start);
  return result.ok ? result.blob : null;
}

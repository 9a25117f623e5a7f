/**
 * Tests for balanced-object scanning
 */

import { describe, it, expect } from 'vitest';
import { extractBalancedObject, scanBalancedObject } from '../core/document-scanner.js';

describe('scanBalancedObject', () => {
  it('returns the object and the index after its closing brace', () => {
    const text = 'var x = {"a":{"b":1}};rest';
    const result = scanBalancedObject(text, 8);
    expect(result).toEqual({ ok: true, blob: { text: '{"a":{"b":1}}', end: 21 } });
    expect(text.slice(21)).toBe(';rest');
  });

  it('ignores braces inside string literals', () => {
    const text = '{"a":"}{","b":"{{"}';
    const result = scanBalancedObject(text, 0);
    expect(result.ok && result.blob.text).toBe(text);
  });

  it('honors escaped quotes inside strings', () => {
    const text = '{"a":"say \\"}\\" ok"} tail';
    const blob = extractBalancedObject(text, 0);
    expect(blob?.text).toBe('{"a":"say \\"}\\" ok"}');
  });

  it('does not count square brackets', () => {
    const blob = extractBalancedObject('{"a":[1,[2]],"b":"]"}', 0);
    expect(blob?.text).toBe('{"a":[1,[2]],"b":"]"}');
  });

  it('reports unterminated objects', () => {
    expect(scanBalancedObject('{"a":{"b":1}', 0)).toEqual({ ok: false, reason: 'unterminated' });
  });

  it('reports markup before the first brace as misplaced', () => {
    expect(scanBalancedObject('  <script>{"a":1}', 0)).toEqual({ ok: false, reason: 'misplaced' });
  });

  it('accepts < inside the object', () => {
    const blob = extractBalancedObject('{"html":"<b>"}', 0);
    expect(blob?.text).toBe('{"html":"<b>"}');
  });

  it('returns null from the wrapper on failure', () => {
    expect(extractBalancedObject('{', 0)).toBeNull();
  });
});

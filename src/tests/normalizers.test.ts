/**
 * Tests for count, duration and escape normalization
 */

import { describe, it, expect } from 'vitest';
import {
  approxNumberFromText,
  countFromCapture,
  decodeHtmlEntities,
  durationTextToSeconds,
  encodeHtmlEntities,
  escapeJsonFragment,
  formatDuration,
  formatViewCount,
  normalizeViewCountText,
  unescapeJsonFragment,
} from '../core/normalizers.js';

describe('approxNumberFromText', () => {
  it('parses grouped digits', () => {
    expect(approxNumberFromText('12,345 views')).toBe(12345);
    expect(approxNumberFromText('1.234.567 Aufrufe')).toBe(1234567);
    expect(approxNumberFromText('1 234 567')).toBe(1234567);
  });

  it('parses suffixed counts', () => {
    expect(approxNumberFromText('1.2M')).toBe(1200000);
    expect(approxNumberFromText('1.5K views')).toBe(1500);
    expect(approxNumberFromText('3,4M')).toBe(3400000);
    expect(approxNumberFromText('2 Mn')).toBe(2000000);
    expect(approxNumberFromText('1B')).toBe(1000000000);
  });

  it('parses plain runs of two or more digits', () => {
    expect(approxNumberFromText('42 views')).toBe(42);
  });

  it('returns null when nothing matches', () => {
    expect(approxNumberFromText('')).toBeNull();
    expect(approxNumberFromText('No views')).toBeNull();
    expect(approxNumberFromText('7')).toBeNull();
  });
});

describe('countFromCapture', () => {
  it('prefers the approximate parse, then bare digits', () => {
    expect(countFromCapture('1,234 watching now')).toBe('1234');
    expect(countFromCapture('5')).toBe('5');
    expect(countFromCapture('none')).toBe('');
  });
});

describe('formatViewCount', () => {
  it('abbreviates with one decimal below ten units', () => {
    expect(formatViewCount('987')).toBe('987 views');
    expect(formatViewCount('1500')).toBe('1.5K views');
    expect(formatViewCount('12000')).toBe('12K views');
    expect(formatViewCount('1200000')).toBe('1.2M views');
    expect(formatViewCount('1100000000')).toBe('1.1B views');
  });

  it('supports Turkish display', () => {
    expect(formatViewCount('1200000', 'tr')).toBe('1.2M görüntülenme');
  });

  it('passes non-integer input through', () => {
    expect(formatViewCount('Live')).toBe('Live');
  });
});

describe('normalizeViewCountText', () => {
  it('canonicalizes raw captures', () => {
    expect(normalizeViewCountText('1,234,567 views')).toBe('1.2M views');
    expect(normalizeViewCountText('5 views')).toBe('5 views');
    expect(normalizeViewCountText('  ')).toBe('');
  });
});

describe('durations', () => {
  it('formats M:SS and H:MM:SS', () => {
    expect(formatDuration(75)).toBe('1:15');
    expect(formatDuration(59)).toBe('0:59');
    expect(formatDuration(3725)).toBe('1:02:05');
    expect(formatDuration(0)).toBe('0:00');
  });

  it('parses clock text back to seconds', () => {
    expect(durationTextToSeconds('9:58')).toBe(598);
    expect(durationTextToSeconds('1:02:03')).toBe(3723);
    expect(durationTextToSeconds('soon')).toBeNull();
  });
});

describe('escapes', () => {
  it('unescapes JSON fragments', () => {
    expect(unescapeJsonFragment('a\\nb \\u0026 \\"q\\"')).toBe('a\nb & "q"');
  });

  it('escape and unescape are inverses for backslash-free text', () => {
    const text = 'Tom & "Jerry"\nend';
    expect(escapeJsonFragment(text)).toBe('Tom \\u0026 \\"Jerry\\"\\nend');
    expect(unescapeJsonFragment(escapeJsonFragment(text))).toBe(text);
  });

  it('decodes HTML entities in a single pass', () => {
    expect(decodeHtmlEntities('Tom &amp; &quot;J&quot; &#39;x&#39; &lt;b&gt;')).toBe('Tom & "J" \'x\' <b>');
    expect(decodeHtmlEntities('&amp;lt;')).toBe('&lt;');
  });

  it('encodes what it decodes', () => {
    const text = `a < b & "c" 'd' >`;
    expect(encodeHtmlEntities(text)).toBe('a &lt; b &amp; &quot;c&quot; &#39;d&#39; &gt;');
    expect(decodeHtmlEntities(encodeHtmlEntities(text))).toBe(text);
  });
});

/**
 * Tests for video id parsing and request user agents
 */

import { describe, it, expect } from 'vitest';
import { isValidVideoId, parseYouTubeUrl } from '../core/youtube-url.js';
import { DESKTOP_USER_AGENTS, getDesktopUserAgent, getSecCHUA, getSecCHUAPlatform } from '../core/user-agents.js';

describe('parseYouTubeUrl', () => {
  it('accepts a bare id', () => {
    expect(parseYouTubeUrl('dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(parseYouTubeUrl('  dQw4w9WgXcQ\n')).toBe('dQw4w9WgXcQ');
  });

  it('parses common URL formats', () => {
    expect(parseYouTubeUrl('https://www.youtube.com/watch?v=dQw4w9WgXcQ&t=120')).toBe('dQw4w9WgXcQ');
    expect(parseYouTubeUrl('https://m.youtube.com/watch?v=dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(parseYouTubeUrl('https://music.youtube.com/watch?v=dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(parseYouTubeUrl('https://youtu.be/dQw4w9WgXcQ?si=abc')).toBe('dQw4w9WgXcQ');
    expect(parseYouTubeUrl('https://www.youtube.com/embed/dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(parseYouTubeUrl('https://www.youtube.com/shorts/dQw4w9WgXcQ')).toBe('dQw4w9WgXcQ');
    expect(parseYouTubeUrl('https://www.youtube.com/live/dQw4w9WgXcQ?feature=share')).toBe('dQw4w9WgXcQ');
  });

  it('rejects everything else', () => {
    expect(parseYouTubeUrl('')).toBeNull();
    expect(parseYouTubeUrl('dQw4w9WgXc')).toBeNull();
    expect(parseYouTubeUrl('https://example.com/watch?v=dQw4w9WgXcQ')).toBeNull();
    expect(parseYouTubeUrl('https://www.youtube.com/watch?v=short')).toBeNull();
    expect(parseYouTubeUrl('https://www.youtube.com/channel/UC123')).toBeNull();
  });

  it('validates ids', () => {
    expect(isValidVideoId('a-b_c123456')).toBe(true);
    expect(isValidVideoId(undefined)).toBe(false);
  });
});

describe('user agents', () => {
  it('picks from the desktop pool', () => {
    expect(getDesktopUserAgent(() => 0)).toBe(DESKTOP_USER_AGENTS[0]);
    expect(DESKTOP_USER_AGENTS).toContain(getDesktopUserAgent());
  });

  it('matches client hints to the UA', () => {
    const ua = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36';
    expect(getSecCHUA(ua)).toBe('"Chromium";v="134", "Google Chrome";v="134", "Not)A;Brand";v="99"');
    expect(getSecCHUAPlatform(ua)).toBe('"macOS"');
    expect(getSecCHUA('curl/8.0')).toBe('"Chromium";v="136", "Google Chrome";v="136", "Not.A/Brand";v="24"');
  });
});

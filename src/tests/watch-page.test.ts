/**
 * Tests for watch-page fetching and the getVideoMetadata entry point
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mock undici fetch so tests never hit the network
// ---------------------------------------------------------------------------

vi.mock('undici', async (importOriginal) => {
  const actual = await importOriginal<typeof import('undici')>();
  return { ...actual, fetch: vi.fn() };
});

import { fetch, Response } from 'undici';
import {
  buildOEmbedUrl,
  buildWatchUrl,
  fetchOEmbed,
  fetchWatchPage,
  getVideoMetadata,
  metaTagInfo,
  retryFetch,
} from '../core/watch-page.js';
import { BlockedError, NetworkError, NoPlayerResponseFoundError, TimeoutError, WatchMetaError } from '../types.js';

const mockFetch = vi.mocked(fetch);
const VIDEO_ID = 'abcdefghijk';

// ---------------------------------------------------------------------------
// Sample data
// ---------------------------------------------------------------------------

function watchPage(videoDetails: Record<string, string>, head = ''): string {
  const player = JSON.stringify({ videoDetails });
  return `<!DOCTYPE html><html><head>${head}</head><body><script>var ytInitialPlayerResponse = ${player};</script></body></html>`;
}

const META_TAGS =
  '<meta property="og:title" content="Meta Title">' +
  '<span itemprop="author" itemscope><link itemprop="url" href="https://www.youtube.com/@test"><link itemprop="name" content="Meta Channel"></span>';

function respondWith(routes: { page?: string; pageStatus?: number; oembed?: string; oembedStatus?: number }): void {
  mockFetch.mockImplementation(async (input) => {
    const url = String(input);
    if (url.includes('/oembed')) {
      return new Response(routes.oembed ?? '', { status: routes.oembedStatus ?? 200 });
    }
    return new Response(routes.page ?? '', { status: routes.pageStatus ?? 200 });
  });
}

beforeEach(() => {
  vi.clearAllMocks();
});

// ---------------------------------------------------------------------------
// URLs
// ---------------------------------------------------------------------------

describe('URL builders', () => {
  it('pins the watch URL to English/US', () => {
    expect(buildWatchUrl(VIDEO_ID)).toBe(
      'https://www.youtube.com/watch?v=abcdefghijk&hl=en&persist_hl=1&gl=US&persist_gl=1&bpctr=9999999999',
    );
  });

  it('encodes the oEmbed target URL', () => {
    expect(buildOEmbedUrl(VIDEO_ID)).toBe(
      'https://www.youtube.com/oembed?url=https%3A%2F%2Fwww.youtube.com%2Fwatch%3Fv%3Dabcdefghijk&format=json',
    );
  });
});

// ---------------------------------------------------------------------------
// fetchWatchPage
// ---------------------------------------------------------------------------

describe('fetchWatchPage', () => {
  it('sends browser headers and returns the body', async () => {
    const page = watchPage({ title: 'T' });
    respondWith({ page });
    await expect(fetchWatchPage(VIDEO_ID, { userAgent: 'test-agent' })).resolves.toBe(page);
    expect(mockFetch).toHaveBeenCalledWith(
      buildWatchUrl(VIDEO_ID),
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent', 'Sec-Fetch-Mode': 'navigate' }),
      }),
    );
  });

  it('treats 429 as blocked', async () => {
    respondWith({ page: 'slow down', pageStatus: 429 });
    await expect(fetchWatchPage(VIDEO_ID)).rejects.toBeInstanceOf(BlockedError);
  });

  it('reports other HTTP failures with their status', async () => {
    respondWith({ page: 'missing', pageStatus: 404 });
    const error = await fetchWatchPage(VIDEO_ID).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error instanceof NetworkError && error.statusCode).toBe(404);
  });

  it('detects the consent interstitial', async () => {
    respondWith({ page: '<html><form action="https://consent.youtube.com/save"></form></html>' });
    await expect(fetchWatchPage(VIDEO_ID)).rejects.toBeInstanceOf(BlockedError);
  });

  it('maps an aborted request to a timeout', async () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    mockFetch.mockRejectedValueOnce(abort);
    await expect(fetchWatchPage(VIDEO_ID, { timeout: 50 })).rejects.toThrow(new TimeoutError('Request timed out after 50ms'));
  });

  it('maps DNS failures', async () => {
    const cause = Object.assign(new Error('getaddrinfo ENOTFOUND www.youtube.com'), { code: 'ENOTFOUND' });
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed', { cause }));
    await expect(fetchWatchPage(VIDEO_ID)).rejects.toThrow(
      'DNS resolution failed: www.youtube.com not found. Check your network connection.',
    );
  });
});

// ---------------------------------------------------------------------------
// retryFetch
// ---------------------------------------------------------------------------

describe('retryFetch', () => {
  it('retries transient failures', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new NetworkError('reset'))
      .mockResolvedValueOnce('ok');
    await expect(retryFetch(fn, { attempts: 3, baseDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry blocked requests', async () => {
    const fn = vi.fn().mockRejectedValue(new BlockedError('blocked'));
    await expect(retryFetch(fn, { attempts: 3, baseDelayMs: 0 })).rejects.toBeInstanceOf(BlockedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt', async () => {
    const fn = vi.fn().mockRejectedValue(new NetworkError('down'));
    await expect(retryFetch(fn, { attempts: 2, baseDelayMs: 0 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops waiting when the caller aborts', async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async () => {
      setTimeout(() => controller.abort(), 10);
      throw new NetworkError('reset');
    });
    const error = await retryFetch(fn, { attempts: 3, baseDelayMs: 60_000, signal: controller.signal })
      .catch((e: unknown) => e);
    expect(error instanceof WatchMetaError && error.code).toBe('ABORTED');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('does not retry an aborted request', async () => {
    const fn = vi.fn().mockRejectedValue(new WatchMetaError('Request aborted', 'ABORTED'));
    await expect(retryFetch(fn, { attempts: 3, baseDelayMs: 0 })).rejects.toThrow('Request aborted');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Fallbacks
// ---------------------------------------------------------------------------

describe('fetchOEmbed', () => {
  it('reads title and author_name', async () => {
    respondWith({ oembed: JSON.stringify({ title: 'OE Title', author_name: 'OE Channel' }) });
    await expect(fetchOEmbed(VIDEO_ID)).resolves.toEqual({ title: 'OE Title', author: 'OE Channel' });
  });

  it('returns null on HTTP errors and bad JSON', async () => {
    respondWith({ oembed: 'Unauthorized', oembedStatus: 401 });
    await expect(fetchOEmbed(VIDEO_ID)).resolves.toBeNull();
    respondWith({ oembed: '<html>' });
    await expect(fetchOEmbed(VIDEO_ID)).resolves.toBeNull();
  });
});

describe('metaTagInfo', () => {
  it('reads og:title and the author microdata', () => {
    expect(metaTagInfo(`<html><head>${META_TAGS}</head></html>`)).toEqual({ title: 'Meta Title', author: 'Meta Channel' });
  });

  it('leaves missing tags undefined', () => {
    expect(metaTagInfo('<html></html>')).toEqual({ title: undefined, author: undefined });
  });
});

// ---------------------------------------------------------------------------
// getVideoMetadata
// ---------------------------------------------------------------------------

describe('getVideoMetadata', () => {
  it('accepts URLs and keeps extracted fields', async () => {
    respondWith({ page: watchPage({ title: 'Page Title', author: 'Page Channel', lengthSeconds: '90' }) });
    const meta = await getVideoMetadata(`https://youtu.be/${VIDEO_ID}?t=10`);
    expect(meta.id).toBe(VIDEO_ID);
    expect(meta.title).toBe('Page Title');
    expect(meta.author).toBe('Page Channel');
    expect(meta.durationText).toBe('1:30');
    // oEmbed is only consulted for missing fields
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('fills a missing author from oEmbed', async () => {
    respondWith({
      page: watchPage({ title: 'Page Title' }, META_TAGS),
      oembed: JSON.stringify({ title: 'OE Title', author_name: 'OE Channel' }),
    });
    const meta = await getVideoMetadata(VIDEO_ID);
    expect(meta.title).toBe('Page Title');
    expect(meta.author).toBe('OE Channel');
  });

  it('falls back to meta tags when oEmbed is disabled', async () => {
    respondWith({ page: watchPage({ title: 'Page Title' }, META_TAGS) });
    const meta = await getVideoMetadata(VIDEO_ID, { oembed: false });
    expect(meta.author).toBe('Meta Channel');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('rejects input that is not a video', async () => {
    const error = await getVideoMetadata('https://example.com/watch?v=1').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(WatchMetaError);
    expect(error instanceof WatchMetaError && error.code).toBe('INVALID_URL');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('returns the partial record with oEmbed fields when the player response is missing', async () => {
    respondWith({
      page: '<html><body><script>x = {"viewCountText":{"simpleText":"2,500 views"}};</script></body></html>',
      oembed: JSON.stringify({ title: 'OE Title', author_name: 'OE Channel' }),
    });
    const meta = await getVideoMetadata(VIDEO_ID);
    expect(meta.title).toBe('OE Title');
    expect(meta.author).toBe('OE Channel');
    expect(meta.rawViewCountText).toBe('2,500 views');
    expect(meta.viewCountText).toBe('2.5K views');
  });

  it('keeps the missing player response error when oEmbed is disabled', async () => {
    respondWith({ page: '<html><body>Video unavailable</body></html>' });
    await expect(getVideoMetadata(VIDEO_ID, { oembed: false })).rejects.toBeInstanceOf(NoPlayerResponseFoundError);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('propagates a missing player response', async () => {
    respondWith({ page: '<html><body>Video unavailable</body></html>' });
    await expect(getVideoMetadata(VIDEO_ID)).rejects.toBeInstanceOf(NoPlayerResponseFoundError);
  });
});

/**
 * Watch-page fetching and the metadata entry point that sits on top of it.
 *
 * The extractor itself never touches the network. This module downloads the
 * page, maps transport failures onto typed errors, retries what is worth
 * retrying, and fills a missing title or author from oEmbed and the page's
 * `<meta>` tags.
 */

import { load } from 'cheerio';
import { fetch as undiciFetch } from 'undici';
import { extractVideoMetadata } from './extractor.js';
import { getDesktopUserAgent, getSecCHUA, getSecCHUAPlatform } from './user-agents.js';
import { parseYouTubeUrl } from './youtube-url.js';
import {
  BlockedError,
  NetworkError,
  NoPlayerResponseFoundError,
  TimeoutError,
  WatchMetaError,
  type GetVideoMetadataOptions,
  type VideoMetadata,
  type WatchPageOptions,
} from '../types.js';

const DEFAULT_TIMEOUT_MS = 15000;
const DEFAULT_ATTEMPTS = 2;

export interface OEmbedInfo {
  title?: string;
  author?: string;
}

// ---------------------------------------------------------------------------
// URLs and headers
// ---------------------------------------------------------------------------

/**
 * Watch URL pinned to English/US so labels and dates come back in a
 * predictable locale; `bpctr` skips the age/content interstitial.
 */
export function buildWatchUrl(videoId: string): string {
  const params = new URLSearchParams({
    v: videoId,
    hl: 'en',
    persist_hl: '1',
    gl: 'US',
    persist_gl: '1',
    bpctr: '9999999999',
  });
  return `https://www.youtube.com/watch?${params.toString()}`;
}

export function buildOEmbedUrl(videoId: string): string {
  const params = new URLSearchParams({
    url: `https://www.youtube.com/watch?v=${videoId}`,
    format: 'json',
  });
  return `https://www.youtube.com/oembed?${params.toString()}`;
}

export function buildRequestHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Sec-CH-UA': getSecCHUA(userAgent),
    'Sec-CH-UA-Mobile': '?0',
    'Sec-CH-UA-Platform': getSecCHUAPlatform(userAgent),
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
    'Sec-Fetch-User': '?1',
    'Upgrade-Insecure-Requests': '1',
  };
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

function causeMessage(error: unknown): string {
  if (!(error instanceof Error)) return '';
  const cause = error.cause;
  if (!(cause instanceof Error)) return '';
  const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
  return [cause.message, code].filter(Boolean).join(' ');
}

/** Translate a failed undici request into the error hierarchy. */
export function mapFetchError(error: unknown, url: string, timeoutMs: number, callerAborted: boolean): WatchMetaError {
  if (error instanceof WatchMetaError) return error;

  if (error instanceof Error && error.name === 'AbortError') {
    if (callerAborted) return new WatchMetaError('Request aborted', 'ABORTED');
    return new TimeoutError(`Request timed out after ${timeoutMs}ms`);
  }

  const host = new URL(url).hostname;
  const causeMsg = causeMessage(error);

  if (causeMsg.includes('certificate') || causeMsg.includes('CERT') || causeMsg.includes('SSL') || causeMsg.includes('TLS')) {
    return new NetworkError(`TLS/SSL certificate error for ${host}.`);
  }
  if (causeMsg.includes('ENOTFOUND') || causeMsg.includes('getaddrinfo')) {
    return new NetworkError(`DNS resolution failed: ${host} not found. Check your network connection.`);
  }
  if (causeMsg.includes('ECONNREFUSED')) {
    return new NetworkError(`Connection refused by ${host}.`);
  }
  if (causeMsg.includes('ECONNRESET') || causeMsg.includes('EPIPE')) {
    return new NetworkError(`Connection reset by ${host}. Try again.`);
  }
  if (causeMsg.includes('ETIMEDOUT') || causeMsg.includes('ENETUNREACH')) {
    return new TimeoutError(`Network unreachable or connection timed out for ${host}.`);
  }

  const msg = error instanceof Error ? error.message : 'Unknown error';
  const causeDetail = causeMsg ? ` (${causeMsg})` : '';
  return new NetworkError(`Failed to fetch: ${msg}${causeDetail}`);
}

interface TextResponse {
  status: number;
  url: string;
  body: string;
}

async function fetchText(url: string, headers: Record<string, string>, timeoutMs: number, abortSignal?: AbortSignal): Promise<TextResponse> {
  if (abortSignal?.aborted) throw new WatchMetaError('Request aborted', 'ABORTED');

  const timeoutController = new AbortController();
  const timer = setTimeout(() => timeoutController.abort(), timeoutMs);
  const signal = abortSignal
    ? AbortSignal.any([timeoutController.signal, abortSignal])
    : timeoutController.signal;

  try {
    const response = await undiciFetch(url, { headers, signal });
    const body = await response.text();
    return { status: response.status, url: response.url || url, body };
  } catch (error) {
    throw mapFetchError(error, url, timeoutMs, abortSignal?.aborted === true && !timeoutController.signal.aborted);
  } finally {
    clearTimeout(timer);
  }
}

export function isConsentPage(finalUrl: string, html: string): boolean {
  if (finalUrl.includes('consent.youtube.com')) return true;
  return html.includes('consent.youtube.com') && !html.includes('ytInitialPlayerResponse');
}

/**
 * Download a watch page. Throws `BlockedError` for consent and rate-limit
 * responses, `NetworkError` for other HTTP failures.
 */
export async function fetchWatchPage(videoId: string, options: WatchPageOptions = {}): Promise<string> {
  const timeoutMs = options.timeout ?? DEFAULT_TIMEOUT_MS;
  const userAgent = options.userAgent ?? getDesktopUserAgent();
  const url = buildWatchUrl(videoId);

  const response = await fetchText(url, buildRequestHeaders(userAgent), timeoutMs, options.signal);

  if (response.status === 403 || response.status === 429 || response.status === 503) {
    throw new BlockedError(`HTTP ${response.status}: YouTube is blocking or rate-limiting requests.`);
  }
  if (response.status < 200 || response.status >= 300) {
    throw new NetworkError(`HTTP ${response.status} for ${url}`, response.status);
  }
  if (!response.body) {
    throw new NetworkError('Empty response body', response.status);
  }
  if (isConsentPage(response.url, response.body)) {
    throw new BlockedError('YouTube served a consent page instead of the video.');
  }
  return response.body;
}

export interface RetryOptions {
  /** Total attempts, including the first */
  attempts?: number;
  baseDelayMs?: number;
  /** Aborting stops both the pending backoff wait and further attempts */
  signal?: AbortSignal;
}

function abortedError(): WatchMetaError {
  return new WatchMetaError('Request aborted', 'ABORTED');
}

function backoff(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function isRetryable(error: unknown): boolean {
  if (error instanceof BlockedError || error instanceof TimeoutError) return false;
  return !(error instanceof WatchMetaError && error.code === 'ABORTED');
}

/**
 * Run `fn` with exponential backoff between attempts. Blocked, timed-out
 * and aborted requests are not retried.
 */
export async function retryFetch<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_ATTEMPTS);
  const baseDelayMs = options.baseDelayMs ?? 1000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) throw error;
      const delay = baseDelayMs * Math.pow(2, attempt - 1);
      if (process.env.DEBUG) {
        console.debug('[watchmeta]', `watch page attempt ${attempt}/${attempts} failed, retrying in ${delay}ms:`, error instanceof Error ? error.message : error);
      }
      await backoff(delay, options.signal);
    }
  }
}

// ---------------------------------------------------------------------------
// Title / author fallbacks
// ---------------------------------------------------------------------------

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * Title and author from the oEmbed endpoint. Any failure is logged at debug
 * level and yields null.
 */
export async function fetchOEmbed(videoId: string, options: WatchPageOptions = {}): Promise<OEmbedInfo | null> {
  const timeoutMs = options.timeout ?? DEFAULT_TIMEOUT_MS;
  const url = buildOEmbedUrl(videoId);
  try {
    const response = await fetchText(url, { 'Accept': 'application/json' }, timeoutMs, options.signal);
    if (response.status < 200 || response.status >= 300) {
      throw new NetworkError(`oEmbed HTTP ${response.status}`, response.status);
    }
    const data: unknown = JSON.parse(response.body);
    if (typeof data !== 'object' || data === null) return null;
    const title = 'title' in data ? nonEmpty(data.title) : undefined;
    const author = ('author_name' in data ? nonEmpty(data.author_name) : undefined) ??
      ('author' in data ? nonEmpty(data.author) : undefined);
    return title || author ? { title, author } : null;
  } catch (e) {
    if (process.env.DEBUG) console.debug('[watchmeta]', 'oEmbed lookup failed:', e instanceof Error ? e.message : e);
    return null;
  }
}

/**
 * Title and author from the page's `<meta>` / microdata tags.
 */
export function metaTagInfo(html: string): OEmbedInfo {
  const $ = load(html);
  return {
    title: nonEmpty($('meta[property="og:title"]').attr('content')) ??
      nonEmpty($('meta[name="title"]').attr('content')),
    author: nonEmpty($('[itemprop="author"] [itemprop="name"]').attr('content')) ??
      nonEmpty($('link[itemprop="name"]').attr('content')),
  };
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

function withFallback(
  metadata: VideoMetadata,
  info: OEmbedInfo | null,
): VideoMetadata {
  if (!info) return metadata;
  const title = metadata.title || info.title || '';
  const author = metadata.author || info.author || '';
  if (title === metadata.title && author === metadata.author) return metadata;
  return Object.freeze({ ...metadata, title, author });
}

/**
 * Fetch and extract metadata for a video id or any YouTube URL.
 *
 * A missing title or author is filled from oEmbed (unless disabled), then
 * from the page's meta tags. The extractor's own fields always win.
 *
 * A page without a player response still throws `NoPlayerResponseFoundError`
 * unless oEmbed supplies a title or author; the partial record is then
 * returned with those filled in.
 */
export async function getVideoMetadata(idOrUrl: string, options: GetVideoMetadataOptions = {}): Promise<VideoMetadata> {
  const videoId = parseYouTubeUrl(idOrUrl);
  if (!videoId) {
    throw new WatchMetaError(`Not a valid YouTube video id or URL: ${idOrUrl}`, 'INVALID_URL');
  }

  const html = await retryFetch(() => fetchWatchPage(videoId, options), {
    attempts: options.retries,
    signal: options.signal,
  });

  let metadata: VideoMetadata;
  try {
    metadata = extractVideoMetadata(videoId, html, { now: options.now, language: options.language });
  } catch (error) {
    if (!(error instanceof NoPlayerResponseFoundError) || options.oembed === false) throw error;
    const degraded = withFallback(error.partial, await fetchOEmbed(videoId, options));
    if (!degraded.title && !degraded.author) throw error;
    if (process.env.DEBUG) console.debug('[watchmeta]', 'no player response, returning the oEmbed-backed partial record');
    return degraded;
  }

  if ((!metadata.title || !metadata.author) && options.oembed !== false) {
    metadata = withFallback(metadata, await fetchOEmbed(videoId, options));
  }
  if (!metadata.title || !metadata.author) {
    metadata = withFallback(metadata, metaTagInfo(html));
  }
  return metadata;
}

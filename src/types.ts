/**
 * Core types for watchmeta
 */

/** Display language for the canonical view-count and date strings. */
export type DisplayLanguage = 'en' | 'tr';

/**
 * Metadata recovered from a single watch page.
 *
 * Built once by the extractor and never mutated afterwards; caching and
 * persistence belong to the caller.
 */
export interface VideoMetadata {
  /** Caller-supplied video id (never derived from the page) */
  readonly id: string;
  readonly title: string;
  readonly author: string;
  readonly channelId?: string;
  readonly shortDescription: string;
  /** Only present when strictly longer than `shortDescription` */
  readonly longDescription?: string;
  /** Canonical display string, e.g. "1.2M views" */
  readonly viewCountText: string;
  /**
   * Raw view-count capture before normalization. Keeps live indicators
   * such as "1,234 watching now" intact.
   */
  readonly rawViewCountText: string;
  /** Canonical display string, e.g. "3 years ago" */
  readonly publishedTimeText: string;
  readonly durationSeconds?: number;
  /** "M:SS" or "H:MM:SS"; empty when the duration is unknown */
  readonly durationText: string;
}

export interface ExtractOptions {
  /** Reference time for relative date display (default: now) */
  now?: Date;
  /** Display language (default: "en") */
  language?: DisplayLanguage;
}

/** Subset of the page's `ytcfg` bootstrap object. */
export interface PageConfig {
  apiKey?: string;
  clientName?: string;
  clientVersion?: string;
  hl?: string;
  gl?: string;
  visitorData?: string;
}

export interface WatchPageOptions {
  /** Request timeout in milliseconds (default: 15000) */
  timeout?: number;
  /** Custom user agent (default: a realistic desktop Chrome UA) */
  userAgent?: string;
  /** Total attempts for transient network failures (default: 2) */
  retries?: number;
  signal?: AbortSignal;
}

export interface GetVideoMetadataOptions extends WatchPageOptions, ExtractOptions {
  /** Consult oEmbed when title or author stay empty (default: true) */
  oembed?: boolean;
}

/**
 * Returns the long description when present, else the short one.
 */
export function effectiveDescription(meta: VideoMetadata): string {
  return meta.longDescription ? meta.longDescription : meta.shortDescription;
}

export class WatchMetaError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'WatchMetaError';
  }
}

/**
 * No player-response object could be located in the page.
 *
 * `partial` holds whatever the HTML-only cascade recovered (view count,
 * publish date, long description), so callers can still return a degraded
 * record.
 */
export class NoPlayerResponseFoundError extends WatchMetaError {
  constructor(message: string, public readonly partial: VideoMetadata) {
    super(message, 'NO_PLAYER_RESPONSE');
    this.name = 'NoPlayerResponseFoundError';
  }
}

export class TimeoutError extends WatchMetaError {
  constructor(message: string) {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class BlockedError extends WatchMetaError {
  constructor(message: string) {
    super(message, 'BLOCKED');
    this.name = 'BlockedError';
  }
}

export class NetworkError extends WatchMetaError {
  constructor(message: string, public readonly statusCode?: number) {
    super(message, 'NETWORK');
    this.name = 'NetworkError';
  }
}

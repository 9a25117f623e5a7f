/**
 * watchmeta - YouTube video metadata from the public watch page
 *
 * Main library export
 *
 * @example
 * ```typescript
 * import { getVideoMetadata } from 'watchmeta';
 *
 * const meta = await getVideoMetadata('https://youtu.be/VIDEO_ID');
 * console.log(meta.title, meta.viewCountText); // "...", "1.2M views"
 * ```
 */

export * from './types.js';
export { extractVideoMetadata } from './core/extractor.js';
export {
  getVideoMetadata,
  fetchWatchPage,
  fetchOEmbed,
  metaTagInfo,
  retryFetch,
  buildWatchUrl,
  buildOEmbedUrl,
  type OEmbedInfo,
  type RetryOptions,
} from './core/watch-page.js';
export { extractYtConfig } from './core/page-config.js';
export {
  extractPlayerResponseBlob,
  extractInitialData,
  locateVariable,
  PLAYER_RESPONSE_MARKERS,
  INITIAL_DATA_MARKERS,
} from './core/variable-locator.js';
export { scanBalancedObject, extractBalancedObject, type ExtractedBlob, type ScanResult } from './core/document-scanner.js';
export { parseTree, select, selectFirst, textOf, type Tree, type PathSegment } from './core/structured-tree.js';
export { decodePlayerResponse, type PlayerResponse, type VideoDetails } from './core/player-response.js';
export {
  approxNumberFromText,
  formatViewCount,
  normalizeViewCountText,
  formatDuration,
  durationTextToSeconds,
  unescapeJsonFragment,
  escapeJsonFragment,
  decodeHtmlEntities,
  encodeHtmlEntities,
} from './core/normalizers.js';
export { normalizePublishedDisplay, formatRelativeDate, absoluteDateToISO, relativeStringToISO } from './core/dates.js';
export { parseYouTubeUrl, isValidVideoId } from './core/youtube-url.js';
export { loadConfig, type WatchMetaConfig } from './core/config.js';

/**
 * Watch-page metadata extraction.
 *
 * Locates the player response, decodes what it can, fills every remaining
 * field through the strategy cascade and canonicalizes the display strings
 * once at the end.
 */

import { acceptPositive, acceptText, runCascade } from './cascade.js';
import { normalizePublishedDisplay } from './dates.js';
import {
  AUTHOR_STRATEGIES,
  CHANNEL_ID_STRATEGIES,
  DURATION_STRATEGIES,
  PUBLISHED_STRATEGIES,
  SHORT_DESCRIPTION_STRATEGIES,
  TITLE_STRATEGIES,
  VIEW_COUNT_STRATEGIES,
  liveViewCountText,
  type ExtractionContext,
  type ViewCountCapture,
} from './field-strategies.js';
import { selectLongDescription } from './long-description.js';
import { formatDuration, normalizeViewCountText } from './normalizers.js';
import { decodePlayerResponse } from './player-response.js';
import { parseTree, type Tree } from './structured-tree.js';
import { extractInitialData, extractPlayerResponseBlob } from './variable-locator.js';
import { NoPlayerResponseFoundError, type ExtractOptions, type VideoMetadata } from '../types.js';

function lazy(load: () => Tree | null): () => Tree | undefined {
  let loaded = false;
  let value: Tree | undefined;
  return () => {
    if (!loaded) {
      value = load() ?? undefined;
      loaded = true;
    }
    return value;
  };
}

export function createExtractionContext(html: string, blob: string): ExtractionContext {
  const typed = blob ? decodePlayerResponse(blob) : null;
  return {
    html,
    blob,
    typed: typed?.videoDetails,
    initialData: lazy(() => extractInitialData(html)),
    playerTree: lazy(() => (blob ? parseTree(blob) : null)),
  };
}

function acceptCapture(value: ViewCountCapture): ViewCountCapture | null {
  return value.count ? value : null;
}

function assemble(videoId: string, ctx: ExtractionContext, options: ExtractOptions): VideoMetadata {
  const language = options.language ?? 'en';
  const now = options.now ?? new Date();
  const text = (hit: { value: string } | null): string => hit?.value ?? '';

  const shortDescription = text(runCascade('shortDescription', SHORT_DESCRIPTION_STRATEGIES, ctx, acceptText));
  const channelId = runCascade('channelId', CHANNEL_ID_STRATEGIES, ctx, acceptText)?.value;
  const longDescription = selectLongDescription(ctx, shortDescription);

  const views = runCascade('viewCount', VIEW_COUNT_STRATEGIES, ctx, acceptCapture)?.value;
  const live = liveViewCountText(ctx);
  const rawViewCountText = live ?? views?.raw.trim() ?? '';

  const published = text(runCascade('publishedTimeText', PUBLISHED_STRATEGIES, ctx, acceptText));
  const durationSeconds = runCascade('durationSeconds', DURATION_STRATEGIES, ctx, acceptPositive)?.value;

  return Object.freeze({
    id: videoId,
    title: text(runCascade('title', TITLE_STRATEGIES, ctx, acceptText)),
    author: text(runCascade('author', AUTHOR_STRATEGIES, ctx, acceptText)),
    ...(channelId !== undefined ? { channelId } : {}),
    shortDescription,
    ...(longDescription !== undefined ? { longDescription } : {}),
    viewCountText: views ? normalizeViewCountText(views.count, language) : '',
    rawViewCountText,
    publishedTimeText: normalizePublishedDisplay(published, { now, language }),
    ...(durationSeconds !== undefined ? { durationSeconds } : {}),
    durationText: durationSeconds !== undefined ? formatDuration(durationSeconds) : '',
  });
}

/**
 * Extract metadata for `videoId` from a watch page's HTML.
 *
 * Pure and synchronous: the page is only read. Fields that no strategy can
 * recover come back empty.
 *
 * @throws NoPlayerResponseFoundError when the page has no player response.
 *   The error's `partial` holds the fields recovered from the rest of the
 *   page.
 */
export function extractVideoMetadata(videoId: string, html: string, options: ExtractOptions = {}): VideoMetadata {
  const blob = extractPlayerResponseBlob(html);
  const metadata = assemble(videoId, createExtractionContext(html, blob?.text ?? ''), options);
  if (!blob) {
    throw new NoPlayerResponseFoundError(`No ytInitialPlayerResponse found for video ${videoId}`, metadata);
  }
  return metadata;
}

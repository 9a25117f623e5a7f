/**
 * Best-effort typed decode of the player response.
 *
 * Only the fields the extractor displays are read. Anything else in the
 * (very large) object is ignored, and a field with an unexpected JSON type
 * is dropped on its own rather than failing the whole decode.
 */

export interface VideoDetails {
  title?: string;
  author?: string;
  channelId?: string;
  shortDescription?: string;
  viewCount?: string;
  publishDate?: string;
  lengthSeconds?: string;
}

export interface PlayerResponse {
  videoDetails?: VideoDetails;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/** String field that YouTube sometimes serializes as a number. */
function numericStringField(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function decodeVideoDetails(value: unknown): VideoDetails | undefined {
  if (!isRecord(value)) return undefined;
  return {
    title: stringField(value, 'title'),
    author: stringField(value, 'author'),
    channelId: stringField(value, 'channelId'),
    shortDescription: stringField(value, 'shortDescription'),
    viewCount: numericStringField(value, 'viewCount'),
    publishDate: stringField(value, 'publishDate'),
    lengthSeconds: numericStringField(value, 'lengthSeconds'),
  };
}

/**
 * Decode the player-response JSON text. Returns null when the text is not a
 * JSON object; callers then fall back to regex and tree strategies.
 */
export function decodePlayerResponse(json: string): PlayerResponse | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    if (process.env.DEBUG) console.debug('[watchmeta]', 'player response decode failed:', e instanceof Error ? e.message : e);
    return null;
  }
  if (!isRecord(parsed)) return null;
  return { videoDetails: decodeVideoDetails(parsed.videoDetails) };
}

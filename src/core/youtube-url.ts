// ---------------------------------------------------------------------------
// Video id parsing
// ---------------------------------------------------------------------------

const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

export function isValidVideoId(id: string | undefined): id is string {
  return typeof id === 'string' && VIDEO_ID.test(id);
}

/**
 * Extract the video ID from a bare id or any common YouTube URL format.
 * Returns null if the input is neither.
 *
 * Supported formats:
 *   VIDEO_ID
 *   https://www.youtube.com/watch?v=VIDEO_ID
 *   https://youtu.be/VIDEO_ID
 *   https://www.youtube.com/embed/VIDEO_ID
 *   https://www.youtube.com/shorts/VIDEO_ID
 *   https://www.youtube.com/live/VIDEO_ID
 *   https://m.youtube.com/watch?v=VIDEO_ID
 *   URLs with extra params (&t=120, &list=PLxxx, etc.)
 */
export function parseYouTubeUrl(input: string): string | null {
  if (!input || typeof input !== 'string') return null;
  const trimmed = input.trim();
  if (isValidVideoId(trimmed)) return trimmed;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return null;
  }

  const host = parsed.hostname.toLowerCase().replace(/^www\./, '').replace(/^m\./, '');

  if (host === 'youtu.be') {
    // https://youtu.be/VIDEO_ID
    const id = parsed.pathname.slice(1).split('/')[0];
    return isValidVideoId(id) ? id : null;
  }

  if (host === 'youtube.com' || host === 'music.youtube.com') {
    if (parsed.pathname === '/watch' || parsed.pathname === '/watch/') {
      const id = parsed.searchParams.get('v') ?? undefined;
      return isValidVideoId(id) ? id : null;
    }

    // /embed/ID, /shorts/ID, /live/ID, /v/ID (old embed format)
    const [, kind, id] = parsed.pathname.split('/');
    if (kind === 'embed' || kind === 'shorts' || kind === 'live' || kind === 'v') {
      return isValidVideoId(id) ? id : null;
    }
  }

  return null;
}

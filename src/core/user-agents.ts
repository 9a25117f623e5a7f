/**
 * Desktop Chrome user agents for watch-page requests.
 *
 * YouTube serves a stripped mobile or consent page to unfamiliar clients, so
 * requests go out with a current desktop Chrome UA and the matching
 * Sec-CH-UA client hints.
 */

// ── Curated UA lists ──────────────────────────────────────────────────────────

const WINDOWS_UAS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/135.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36',
];

const MAC_UAS: readonly string[] = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/135.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36',
];

/** Every UA the rotation can return */
export const DESKTOP_USER_AGENTS: readonly string[] = [...WINDOWS_UAS, ...MAC_UAS];

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * A random desktop Chrome UA (Windows ~60%, macOS ~40%).
 */
export function getDesktopUserAgent(random: () => number = Math.random): string {
  const pool = random() < 0.6 ? WINDOWS_UAS : MAC_UAS;
  return pool[Math.floor(random() * pool.length)] ?? DESKTOP_USER_AGENTS[0];
}

/**
 * The "Not A Brand" token format varies by Chrome version.
 *
 * Chrome 132-133: `"Not_A Brand";v="8"`
 * Chrome 134-135: `"Not)A;Brand";v="99"`
 * Chrome 136+:    `"Not.A/Brand";v="24"`
 */
function getNotABrandToken(chromeVersion: number): string {
  if (chromeVersion >= 136) return '"Not.A/Brand";v="24"';
  if (chromeVersion >= 134) return '"Not)A;Brand";v="99"';
  return '"Not_A Brand";v="8"';
}

/**
 * Sec-CH-UA header value matching the Chrome version in `userAgent`, e.g.
 * `"Chromium";v="136", "Google Chrome";v="136", "Not.A/Brand";v="24"`.
 * Falls back to Chrome 136 when the UA carries no version.
 */
export function getSecCHUA(userAgent: string): string {
  const match = userAgent.match(/Chrome\/(\d+)/i);
  const version = match ? parseInt(match[1], 10) : 136;
  return `"Chromium";v="${version}", "Google Chrome";v="${version}", ${getNotABrandToken(version)}`;
}

export function getSecCHUAPlatform(userAgent: string): string {
  if (userAgent.includes('Windows')) return '"Windows"';
  if (userAgent.includes('Macintosh')) return '"macOS"';
  if (userAgent.includes('Linux')) return '"Linux"';
  return '"Unknown"';
}

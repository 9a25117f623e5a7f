/**
 * `ytcfg` bootstrap config reader.
 *
 * Watch pages call `ytcfg.set(...)` several times; only the call carrying
 * the InnerTube keys is useful, so candidates are validated by required
 * keys and scanning resumes past rejected ones.
 */

import type { ExtractedBlob } from './document-scanner.js';
import { asString, child, parseTree, type Tree } from './structured-tree.js';
import { extractStringLiteral, locateVariable } from './variable-locator.js';
import type { PageConfig } from '../types.js';

export const YT_CONFIG_MARKERS: readonly string[] = ['ytcfg.set(', 'ytcfg.data_ = '];

const REQUIRED_KEYS = ['INNERTUBE_API_KEY', 'INNERTUBE_CONTEXT'] as const;

function acceptConfig(blob: ExtractedBlob): Tree | null {
  const tree = parseTree(blob.text);
  if (!tree) return null;
  return REQUIRED_KEYS.some((key) => child(tree, key) !== undefined) ? tree : null;
}

function configFromTree(root: Tree): PageConfig {
  const client = child(child(root, 'INNERTUBE_CONTEXT'), 'client');
  const pick = (topKey: string, clientKey: string): string | undefined =>
    asString(child(root, topKey)) ?? asString(child(client, clientKey));

  const fields: [keyof PageConfig, string | undefined][] = [
    ['apiKey', asString(child(root, 'INNERTUBE_API_KEY'))],
    ['clientName', pick('INNERTUBE_CLIENT_NAME', 'clientName')],
    ['clientVersion', pick('INNERTUBE_CLIENT_VERSION', 'clientVersion')],
    ['hl', pick('HL', 'hl')],
    ['gl', pick('GL', 'gl')],
    ['visitorData', pick('VISITOR_DATA', 'visitorData')],
  ];

  // Unset keys are left out so JSON output stays compact
  const config: PageConfig = {};
  for (const [key, value] of fields) {
    if (value !== undefined) config[key] = value;
  }
  return config;
}

/**
 * Read the InnerTube config from a watch page. Returns null when neither a
 * valid `ytcfg` object nor a bare `INNERTUBE_API_KEY` literal is present.
 */
export function extractYtConfig(html: string): PageConfig | null {
  const root = locateVariable(html, YT_CONFIG_MARKERS, acceptConfig, { resume: true });
  if (root) return configFromTree(root);

  const apiKey = extractStringLiteral(html, 'INNERTUBE_API_KEY');
  return apiKey ? { apiKey } : null;
}

/**
 * Runtime configuration.
 *
 * Resolution order, later wins: built-in defaults, ~/.watchmeta/config.json,
 * WATCHMETA_* environment variables, explicit overrides (CLI flags).
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import type { DisplayLanguage } from '../types.js';

export const CONFIG_DIR = join(homedir(), '.watchmeta');
export const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

export interface WatchMetaConfig {
  /** Request timeout in milliseconds */
  timeout: number;
  /** Total fetch attempts */
  retries: number;
  /** Fixed user agent; a rotating desktop UA is used when unset */
  userAgent?: string;
  language: DisplayLanguage;
  /** Consult oEmbed for a missing title or author */
  oembed: boolean;
}

export const DEFAULT_CONFIG: Readonly<WatchMetaConfig> = {
  timeout: 15000,
  retries: 2,
  language: 'en',
  oembed: true,
};

export interface LoadConfigOptions {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLanguage(value: unknown): value is DisplayLanguage {
  return value === 'en' || value === 'tr';
}

function positiveInt(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : undefined;
}

function flag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return undefined;
  const v = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return undefined;
}

/** Keep only recognized, well-typed settings. */
export function sanitizeConfig(raw: Record<string, unknown>): Partial<WatchMetaConfig> {
  const config: Partial<WatchMetaConfig> = {};
  const timeout = positiveInt(raw.timeout);
  if (timeout !== undefined) config.timeout = timeout;
  const retries = positiveInt(raw.retries);
  if (retries !== undefined) config.retries = retries;
  if (typeof raw.userAgent === 'string' && raw.userAgent.trim()) config.userAgent = raw.userAgent.trim();
  if (isLanguage(raw.language)) config.language = raw.language;
  const oembed = flag(raw.oembed);
  if (oembed !== undefined) config.oembed = oembed;
  return config;
}

function readConfigFile(path: string): Partial<WatchMetaConfig> {
  try {
    if (!existsSync(path)) return {};
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return isRecord(parsed) ? sanitizeConfig(parsed) : {};
  } catch (error) {
    // A corrupted file falls back to defaults
    console.error(`Warning: Failed to read config: ${error instanceof Error ? error.message : 'Unknown error'}`);
    return {};
  }
}

function fromEnv(env: NodeJS.ProcessEnv): Partial<WatchMetaConfig> {
  return sanitizeConfig({
    timeout: env.WATCHMETA_TIMEOUT,
    retries: env.WATCHMETA_RETRIES,
    userAgent: env.WATCHMETA_USER_AGENT,
    language: env.WATCHMETA_LANG,
    oembed: env.WATCHMETA_OEMBED,
  });
}

/**
 * Load the effective config.
 */
export function loadConfig(overrides: Partial<WatchMetaConfig> = {}, options: LoadConfigOptions = {}): WatchMetaConfig {
  const { configFile = CONFIG_FILE, env = process.env } = options;
  return {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configFile),
    ...fromEnv(env),
    ...sanitizeConfig({ ...overrides }),
  };
}

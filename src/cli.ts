#!/usr/bin/env node

/**
 * watchmeta CLI
 *
 * Usage:
 *   watchmeta <video>                  - Print metadata for a video id or URL
 *   watchmeta <video> --json           - Output as JSON
 *   watchmeta <video> --lang tr        - Turkish view-count and date display
 *   watchmeta file page.html --id ID   - Extract from a saved watch page
 *   watchmeta config <video>           - Print the page's ytcfg values
 */

import { Command } from 'commander';
import ora from 'ora';
import { readFileSync } from 'fs';
import { loadConfig, type WatchMetaConfig } from './core/config.js';
import { extractVideoMetadata } from './core/extractor.js';
import { extractYtConfig } from './core/page-config.js';
import { fetchWatchPage, getVideoMetadata, retryFetch } from './core/watch-page.js';
import { isValidVideoId, parseYouTubeUrl } from './core/youtube-url.js';
import { formatError, formatMetadataText, formatPageConfigText, parseLanguage, parseTimeout } from './cli-format.js';
import { NoPlayerResponseFoundError, WatchMetaError, type DisplayLanguage, type VideoMetadata } from './types.js';

interface OutputOptions {
  json?: boolean;
  silent?: boolean;
}

interface FetchOptions extends OutputOptions {
  timeout?: number;
  userAgent?: string;
  lang?: DisplayLanguage;
  oembed?: boolean;
}

interface FileOptions extends OutputOptions {
  id: string;
  lang?: DisplayLanguage;
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

function resolveConfig(options: FetchOptions): WatchMetaConfig {
  return loadConfig({
    timeout: options.timeout,
    userAgent: options.userAgent,
    language: options.lang,
    // commander sets oembed=true unless --no-oembed is given
    oembed: options.oembed === false ? false : undefined,
  });
}

function printMetadata(meta: VideoMetadata, options: OutputOptions): void {
  console.log(options.json ? JSON.stringify(meta, null, 2) : formatMetadataText(meta));
}

function fail(error: unknown, options: OutputOptions): never {
  const err = error instanceof Error ? error : new Error('Unknown error occurred');
  if (options.json) {
    const code = err instanceof WatchMetaError && err.code ? err.code : 'UNKNOWN';
    console.error(JSON.stringify({ error: { code, message: err.message } }, null, 2));
  } else {
    console.error('\n' + formatError(err));
  }
  process.exit(1);
}

function requireVideoId(input: string): string {
  const videoId = parseYouTubeUrl(input);
  if (!videoId) {
    throw new WatchMetaError(`Not a valid YouTube video id or URL: ${input}`, 'INVALID_URL');
  }
  return videoId;
}

const program = new Command();

program
  .name('watchmeta')
  .description('Recover YouTube video metadata from the public watch page')
  .version(readVersion())
  .enablePositionalOptions();

program
  .argument('<video>', 'Video id or YouTube URL')
  .option('--json', 'Output as JSON')
  .option('-t, --timeout <ms>', 'Request timeout in milliseconds', parseTimeout)
  .option('--user-agent <ua>', 'Custom user agent')
  .option('--lang <lang>', 'Display language: en or tr', parseLanguage)
  .option('--no-oembed', 'Do not consult oEmbed for a missing title or author')
  .option('-s, --silent', 'Silent mode (no spinner)')
  .action(async (video: string, options: FetchOptions) => {
    const config = resolveConfig(options);
    const spinner = options.silent ? null : ora('Fetching watch page...').start();
    try {
      const meta = await getVideoMetadata(video, {
        timeout: config.timeout,
        userAgent: config.userAgent,
        retries: config.retries,
        language: config.language,
        oembed: config.oembed,
      });
      spinner?.succeed(`Fetched ${meta.id}`);
      printMetadata(meta, options);
    } catch (error) {
      spinner?.fail('Extraction failed');
      fail(error, options);
    }
  });

program
  .command('file <path>')
  .description('Extract metadata from a saved watch page')
  .requiredOption('--id <id>', 'Video id the page belongs to')
  .option('--lang <lang>', 'Display language: en or tr', parseLanguage)
  .option('--json', 'Output as JSON')
  .action((path: string, options: FileOptions) => {
    try {
      if (!isValidVideoId(options.id)) {
        throw new WatchMetaError(`Not a valid YouTube video id: ${options.id}`, 'INVALID_URL');
      }
      const html = readFileSync(path, 'utf-8');
      const language = loadConfig({ language: options.lang }).language;
      printMetadata(extractVideoMetadata(options.id, html, { language }), options);
    } catch (error) {
      if (error instanceof NoPlayerResponseFoundError) {
        console.error(formatError(error));
        printMetadata(error.partial, options);
        process.exit(1);
      }
      fail(error, options);
    }
  });

program
  .command('config <video>')
  .description("Print the watch page's ytcfg values (API key, client version, locale)")
  .option('-t, --timeout <ms>', 'Request timeout in milliseconds', parseTimeout)
  .option('--user-agent <ua>', 'Custom user agent')
  .option('--json', 'Output as JSON')
  .option('-s, --silent', 'Silent mode (no spinner)')
  .action(async (video: string, options: FetchOptions) => {
    const config = resolveConfig(options);
    const spinner = options.silent ? null : ora('Fetching watch page...').start();
    try {
      const videoId = requireVideoId(video);
      const html = await retryFetch(
        () => fetchWatchPage(videoId, { timeout: config.timeout, userAgent: config.userAgent }),
        { attempts: config.retries },
      );
      spinner?.stop();
      const pageConfig = extractYtConfig(html) ?? {};
      console.log(options.json ? JSON.stringify(pageConfig, null, 2) : formatPageConfigText(pageConfig));
    } catch (error) {
      spinner?.fail('Fetch failed');
      fail(error, options);
    }
  });

await program.parseAsync();

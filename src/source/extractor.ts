import { JSDOM } from 'jsdom';
import type { Config } from '../shared/config.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { normalizeName } from './normalize.js';

export interface NamedResource {
  readonly name: string;
  readonly url: string;
}

/**
 * A label/URL pair as it appears in the index document, before normalization.
 */
export interface RawRecord {
  label: string;
  url: string;
}

export type ExtractorStrategy = Config['index']['extractor'];

/**
 * Turns index document text into a name → playlist URL map.
 * Records are applied in document order; a later record with the same normalized name
 * replaces the earlier one.
 */
export interface LinkExtractor {
  readonly strategy: ExtractorStrategy;
  extract(documentText: string): Map<string, string>;
}

const PLAYLIST_URL = /\.m3u8?$/i;

/**
 * Normalize labels and fold records into a map, last write wins.
 * Records whose label normalizes to '' are skipped.
 */
export function collectLinks(records: Iterable<RawRecord>, log?: Logger): Map<string, string> {
  const links = new Map<string, string>();
  for (const record of records) {
    const name = normalizeName(record.label);
    if (!name) {
      log?.debug({ label: record.label, url: record.url }, 'Skipping record with empty name');
      continue;
    }
    const previous = links.get(name);
    if (previous !== undefined && previous !== record.url) {
      log?.warn({ playlist: name, replaced: previous, url: record.url }, 'Duplicate playlist name, keeping the later URL');
    }
    links.set(name, record.url);
  }
  return links;
}

export function toNamedResources(links: Map<string, string>): NamedResource[] {
  return Array.from(links, ([name, url]) => ({ name, url }));
}

function compilePattern(pattern: string): RegExp {
  let compiled: RegExp;
  try {
    compiled = new RegExp(pattern, 'g');
  } catch (err) {
    throw new ConfigError(`Invalid link pattern: ${errorMessage(err)}`, { pattern });
  }
  if (!pattern.includes('(?<name>') || !pattern.includes('(?<url>')) {
    throw new ConfigError('Link pattern must define the named groups "name" and "url"', { pattern });
  }
  return compiled;
}

/**
 * Pattern-driven extraction. The pattern must define the named groups `name` and `url`.
 */
export class RegexLinkExtractor implements LinkExtractor {
  readonly strategy = 'regex';
  private readonly pattern: RegExp;

  constructor(
    pattern: string,
    private readonly log?: Logger,
  ) {
    this.pattern = compilePattern(pattern);
  }

  extract(documentText: string): Map<string, string> {
    return collectLinks(this.records(documentText), this.log);
  }

  private *records(documentText: string): Generator<RawRecord> {
    for (const match of documentText.matchAll(this.pattern)) {
      const label = match.groups?.['name'];
      const url = match.groups?.['url'];
      if (label && url) {
        yield { label, url: url.trim() };
      }
    }
  }
}

/**
 * Reads the index as HTML: for every table row, the first cell is the label and the first
 * <code> element holding a .m3u/.m3u8 URL is the link.
 */
export class HtmlTableLinkExtractor implements LinkExtractor {
  readonly strategy = 'html-table';

  constructor(private readonly log?: Logger) {}

  extract(documentText: string): Map<string, string> {
    const dom = new JSDOM(documentText);
    const records: RawRecord[] = [];

    for (const row of Array.from(dom.window.document.querySelectorAll('tr'))) {
      const label = row.querySelector('td')?.textContent?.trim();
      if (!label) continue;

      const code = Array.from(row.querySelectorAll('code'))
        .map((el) => el.textContent?.trim() ?? '')
        .find((text) => PLAYLIST_URL.test(text));
      if (code) {
        records.push({ label, url: code });
      }
    }

    return collectLinks(records, this.log);
  }
}

export function createLinkExtractor(index: Config['index'], log?: Logger): LinkExtractor {
  switch (index.extractor) {
    case 'regex':
      return new RegexLinkExtractor(index.pattern, log);
    case 'html-table':
      return new HtmlTableLinkExtractor(log);
  }
}

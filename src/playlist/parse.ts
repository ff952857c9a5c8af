export interface PlaylistEntry {
  /** The #EXTINF line that preceded the URL, or '' when there was none. */
  readonly metadata: string;
  readonly url: string;
}

const METADATA_MARKER = '#EXTINF';
const URL_MARKER = 'http';

/**
 * Pair each #EXTINF line with the URL line that follows it.
 *
 * A newer #EXTINF replaces one still waiting for its URL, other lines (directives, comments,
 * blanks) are ignored, and metadata left pending at the end of input is dropped.
 */
export function parsePlaylist(text: string): PlaylistEntry[] {
  const entries: PlaylistEntry[] = [];
  let pendingMetadata = '';

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith(METADATA_MARKER)) {
      pendingMetadata = line;
    } else if (line.startsWith(URL_MARKER)) {
      entries.push({ metadata: pendingMetadata, url: line });
      pendingMetadata = '';
    }
  }

  return entries;
}

/**
 * Render entries in the partition file format: `<metadata>\n<url>` per entry, joined by '\n'.
 */
export function formatEntries(entries: readonly PlaylistEntry[]): string {
  return entries.map((e) => `${e.metadata}\n${e.url}`).join('\n');
}

/**
 * Entry segmentation for line-oriented dictionary text
 *
 * An entry starts at a line-initial headword marker and owns every following
 * line up to the next marker. Text before the first marker (title pages,
 * prefaces) is dropped. Segmentation never throws.
 */

/**
 * A segmented entry before ids and normalized keys are assigned
 */
export interface RawEntry {
  /** Headword as written in the source, diacritics and hyphens included */
  headword: string;
  /** Offset of the entry's first character in the source text */
  start: number;
  /** Offset one past the entry's last non-whitespace character */
  end: number;
  /** Raw entry text, i.e. `text.slice(start, end)` */
  body: string;
}

export interface SegmentOptions {
  /**
   * Line-initial marker. Capture group 1 must hold the headword; a line that
   * does not match, or whose group 1 is empty, continues the current entry.
   */
  headwordPattern?: RegExp;
}

/**
 * Default marker: optional homograph number ("1. "), a headword that begins
 * with a letter, then a comma or a spaced em/en dash.
 *
 * Matches `ăbălĭēno, āvi, ātum`, `2. ab, ā, abs` and `abalieno — to alienate`;
 * indented lines and lines opening with a quote, bracket or citation never match.
 */
export const DEFAULT_HEADWORD_PATTERN = /^(?:\d+\.\s+)?(\p{L}[^\s,;:()[\]]*)(?:,|\s+[—–](?:\s|$))/u;

/**
 * Effective marker pattern, as stored beside a persisted index
 */
export interface HeadwordMarker {
  source: string;
  flags: string;
}

export function headwordMarker(pattern?: RegExp): HeadwordMarker {
  const effective = pattern ?? DEFAULT_HEADWORD_PATTERN;
  // Global and sticky flags would make exec() stateful across lines
  return { source: effective.source, flags: effective.flags.replace(/[gy]/g, "") };
}

function compileMarker(pattern: RegExp | undefined): RegExp {
  const { source, flags } = headwordMarker(pattern);
  return new RegExp(source, flags);
}

interface OpenEntry {
  headword: string;
  start: number;
  end: number;
}

function close(text: string, entry: OpenEntry): RawEntry {
  const body = text.slice(entry.start, entry.end).trimEnd();
  return {
    headword: entry.headword,
    start: entry.start,
    end: entry.start + body.length,
    body,
  };
}

/**
 * Split dictionary text into entries, lazily and in source order
 * @param text - Complete dictionary text (BOM already removed)
 * @param options - Marker override
 */
export function* segmentEntries(
  text: string,
  options: SegmentOptions = {}
): Generator<RawEntry, void, undefined> {
  const marker = compileMarker(options.headwordPattern);
  let current: OpenEntry | null = null;
  let lineStart = 0;

  while (lineStart < text.length) {
    const newline = text.indexOf("\n", lineStart);
    const lineEnd = newline === -1 ? text.length : newline;
    const nextLine = newline === -1 ? text.length : newline + 1;

    let contentEnd = lineEnd;
    if (contentEnd > lineStart && text.charCodeAt(contentEnd - 1) === 13) {
      contentEnd--; // \r of a \r\n pair
    }

    const line = text.slice(lineStart, contentEnd);
    const headword = marker.exec(line)?.[1];

    if (headword) {
      if (current) yield close(text, current);
      current = { headword, start: lineStart, end: contentEnd };
    } else if (current && line.trim().length > 0) {
      current.end = contentEnd;
    }

    lineStart = nextLine;
  }

  if (current) yield close(text, current);
}

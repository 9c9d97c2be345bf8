/**
 * Output rendering helpers
 */

import type { LexiconStats, LookupResult } from "@lexicon/sdk";

type Color = "red" | "green" | "yellow" | "dim";

/**
 * Print pretty JSON to stdout
 */
export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Apply ANSI color only if output stream is a TTY and NO_COLOR is unset
 */
export function colorize(text: string, color: Color, stream: NodeJS.WriteStream = process.stdout): string {
  if (!(stream.isTTY ?? false) || process.env.NO_COLOR) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
    dim: "\x1b[2m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * Plain-text lookup output: prefix hits unlabelled, then the
 * "Found in:" and "Similar:" fallbacks
 */
export function renderLookup(result: LookupResult, paint: (text: string, color: Color) => string = (t) => t): string[] {
  const lines: string[] = [];
  const id = (entryId: number): string => paint(`#${entryId}`, "dim");

  for (const m of result.exactPrefixMatches) {
    lines.push(`${m.original} ${id(m.entryId)}`);
  }

  if (result.fullTextMatches.length > 0) {
    lines.push(paint("Found in:", "yellow"));
    for (const m of result.fullTextMatches) {
      lines.push(`  ${m.original} (${m.count}×) ${id(m.entryId)}`);
    }
  }

  if (result.fuzzyMatches.length > 0) {
    lines.push(paint("Similar:", "yellow"));
    for (const m of result.fuzzyMatches) {
      lines.push(`  ${m.original} ${id(m.entryId)}`);
    }
  }

  return lines;
}

/**
 * Plain-text index summary
 */
export function renderStats(stats: LexiconStats): string[] {
  return [
    `Entries: ${stats.entries}`,
    `Headwords: ${stats.headwords}`,
    `Tokens: ${stats.tokens}`,
    `Postings: ${stats.postings}`,
    `Origin: ${stats.origin} (${stats.reason})`,
    `Source: ${stats.sourcePath}`,
    `Cache: ${stats.cachePath}`,
  ];
}

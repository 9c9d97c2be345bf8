/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_SOURCE = "./dictionary.txt";
export const CACHE_SUFFIX = ".index.json";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the dictionary source path
 * Priority: CLI option > LEXICON_SOURCE env var > default "./dictionary.txt"
 */
export function resolveSourcePath(cliSource?: string): string {
  const source = cliSource ?? process.env.LEXICON_SOURCE ?? DEFAULT_SOURCE;
  return path.resolve(expandTilde(source));
}

/**
 * Resolve the index cache path
 * Priority: CLI option > LEXICON_CACHE env var > "<source>.index.json"
 */
export function resolveCachePath(sourcePath: string, cliCache?: string): string {
  const cache = cliCache ?? process.env.LEXICON_CACHE;
  return cache ? path.resolve(expandTilde(cache)) : `${sourcePath}${CACHE_SUFFIX}`;
}

/**
 * Check if timing metrics are enabled
 */
export function isVerbose(): boolean {
  return process.env.LEXICON_CLI_DEBUG === "1";
}

/**
 * File system test utilities
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { openLexicon } from "@lexicon/sdk";
import type { Lexicon, LexiconOptions } from "@lexicon/sdk";

const SAMPLE_DICTIONARY = fileURLToPath(new URL("../fixtures/sample-dictionary.txt", import.meta.url));

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "lexicon-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "lexicon-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Text of the bundled six-entry sample dictionary
 */
export async function readSampleDictionary(): Promise<string> {
  return await readFile(SAMPLE_DICTIONARY, "utf-8");
}

/**
 * Write a dictionary text into `dir`
 * @param text - Dictionary text (default: the sample dictionary)
 * @returns Path of the written file
 */
export async function writeDictionary(dir: string, text?: string, name = "dictionary.txt"): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, text ?? (await readSampleDictionary()), "utf-8");
  return path;
}

/**
 * Execute a function with a clean temp directory
 */
async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a lexicon opened over a dictionary in a temp directory
 * @param fn - Function to execute with the lexicon and the temp directory
 * @param options - Dictionary text and lexicon options (paths are overridden)
 */
export async function withTempLexicon<T>(
  fn: (lexicon: Lexicon, dir: string) => Promise<T>,
  options: { text?: string } & Partial<Omit<LexiconOptions, "sourcePath" | "cachePath">> = {}
): Promise<T> {
  const { text, ...lexiconOptions } = options;
  return withTempDir(async (dir) => {
    const sourcePath = await writeDictionary(dir, text);
    const lexicon = await openLexicon({
      ...lexiconOptions,
      sourcePath,
      cachePath: join(dir, "dictionary.index.json"),
    });
    return await fn(lexicon, dir);
  });
}

/**
 * Lexicon command line: lookup, entry, rebuild, stats
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import {
  EntryNotFoundError,
  loadIndex,
  logger,
  openLexicon,
  type Entry,
  type Lexicon,
} from "@lexicon/sdk";
import { parseEntryRef, parseNonNegativeInt } from "./lib/arg.js";
import { resolveCachePath, resolveSourcePath } from "./lib/env.js";
import { CliError } from "./lib/errors.js";
import { colorize, printJson, printLines, renderLookup, renderStats } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

/** Display limits of the interactive lookup */
export const DEFAULT_LIMITS = { prefix: 25, fullText: 6, fuzzy: 8 } as const;

export type GlobalOptions = {
  source?: string;
  cache?: string;
  verbose?: boolean;
  quiet?: boolean;
};

interface LookupCommandOptions {
  json?: boolean;
  limit?: number;
}

interface EntryCommandOptions {
  json?: boolean;
  all?: boolean;
}

interface StatsCommandOptions {
  json?: boolean;
}

const packageJson: { version: string } = JSON.parse(
  readFileSync(fileURLToPath(new URL("../package.json", import.meta.url)), "utf-8")
);

function entryJson(entry: Entry): Record<string, unknown> {
  return { id: entry.id, headword: entry.headword, body: entry.body };
}

/**
 * Build a fresh program; commander errors are thrown, never exit the process
 */
export function createProgram(): Command {
  const program = new Command();

  const paths = (): { sourcePath: string; cachePath: string } => {
    const opts = program.opts<GlobalOptions>();
    const sourcePath = resolveSourcePath(opts.source);
    return { sourcePath, cachePath: resolveCachePath(sourcePath, opts.cache) };
  };

  const open = async (fuzzyK: number = DEFAULT_LIMITS.fuzzy): Promise<Lexicon> =>
    await withTiming("cli.open", () => openLexicon({ ...paths(), fuzzy: { k: fuzzyK } }), (lexicon) => {
      const stats = lexicon.stats();
      return { origin: stats.origin, reason: stats.reason, entries: stats.entries };
    });

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("lexicon")
    .description("Lexicon - staged headword, full-text and fuzzy dictionary lookup")
    .version(packageJson.version)
    .option("--source <path>", "Dictionary text (default: $LEXICON_SOURCE or ./dictionary.txt)")
    .option("--cache <path>", "Index cache file (default: $LEXICON_CACHE or <source>.index.json)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .hook("preAction", () => {
      const opts = program.opts<GlobalOptions>();
      logger.setLevel(opts.verbose ? "debug" : opts.quiet ? "error" : "warn");
    });

  // Lookup command
  program
    .command("lookup <query...>")
    .description("Headwords starting with the query, else entries containing it, else similar headwords")
    .option("--json", "Output as JSON for machine consumption")
    .option("--limit <n>", "Maximum results per list (default: 25 prefix, 6 full-text, 8 similar)", (v) =>
      parseNonNegativeInt(v, "--limit")
    )
    .action(async (words: string[], options: LookupCommandOptions) => {
      const query = words.join(" ");
      const lexicon = await open(options.limit ?? DEFAULT_LIMITS.fuzzy);

      const result = await withTiming(
        "cli.lookup",
        async () =>
          lexicon.lookup(query, {
            limits: {
              prefix: options.limit ?? DEFAULT_LIMITS.prefix,
              fullText: options.limit ?? DEFAULT_LIMITS.fullText,
            },
          }),
        (r) => ({
          prefix: r.exactPrefixMatches.length,
          fullText: r.fullTextMatches.length,
          fuzzy: r.fuzzyMatches.length,
        })
      );

      if (options.json) {
        printJson(result);
        return;
      }

      const lines = renderLookup(result, (text, color) => colorize(text, color));
      if (lines.length > 0) {
        printLines(lines);
      } else if (!program.opts<GlobalOptions>().quiet) {
        console.log(`No matches for "${query}"`);
      }
    });

  // Entry command
  program
    .command("entry")
    .description("Print the raw text of an entry")
    .argument("<ref>", "Headword, or #id", parseEntryRef)
    .option("--json", "Output as JSON for machine consumption")
    .option("--all", "Print every entry sharing the headword")
    .action(async (ref: number | string, options: EntryCommandOptions) => {
      const lexicon = await open();

      if (options.json || options.all) {
        const entries =
          typeof ref === "number"
            ? [lexicon.snapshot.entry(ref)].filter((e): e is Entry => e !== undefined)
            : lexicon.getEntries(ref);
        if (entries.length === 0) throw new EntryNotFoundError(ref);

        const shown = options.all ? entries : entries.slice(0, 1);
        if (options.json) {
          printJson(shown.map(entryJson));
        } else {
          console.log(shown.map((entry) => entry.body).join("\n\n"));
        }
        return;
      }

      const body = lexicon.getEntry(ref);
      if (body === null) throw new EntryNotFoundError(ref);
      console.log(body);
    });

  // Rebuild command
  program
    .command("rebuild")
    .description("Discard the index cache and rebuild it from the dictionary text")
    .action(async () => {
      const { sourcePath, cachePath } = paths();
      const report = await withTiming("cli.rebuild", () => loadIndex(sourcePath, cachePath, { force: true }));

      if (!report.persisted) {
        throw new CliError(`Index built but could not be written to ${cachePath}`);
      }
      if (!program.opts<GlobalOptions>().quiet) {
        console.log(`Rebuilt index: ${report.snapshot.entries.length} entries -> ${cachePath}`);
      }
    });

  // Stats command
  program
    .command("stats")
    .description("Show index statistics")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: StatsCommandOptions) => {
      const lexicon = await open();
      const stats = lexicon.stats();

      if (options.json) {
        printJson(stats);
        return;
      }
      printLines(renderStats(stats));
    });

  return program;
}

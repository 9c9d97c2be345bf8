/**
 * Basic Usage Example
 *
 * Builds an index over a small dictionary text and runs the three lookup stages.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { openLexicon } from "@lexicon/sdk";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

const DICTIONARY = `A SMALL LATIN LEXICON

ăbăcus, i, m., a sideboard; a counting board.
ăbălĭēno, āvi, ātum, 1, v. a., to make another's, to alienate.
tĕgo, xi, ctum, 3, v. a., to cover; tectum texit, he covered the roof.
texo, xui, xtum, 3, v. a., to weave; texit telam, she weaves a web.
`;

async function main(): Promise<void> {
  // Setup: write the dictionary into a scratch directory
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });
  await mkdir(dataDir, { recursive: true });
  const sourcePath = join(dataDir, "dictionary.txt");
  await writeFile(sourcePath, DICTIONARY, "utf-8");

  // The first open builds the index and writes the cache file
  console.log("📂 Opening lexicon...");
  const lexicon = await openLexicon({ sourcePath, cachePath: join(dataDir, "dictionary.index.json") });
  const stats = lexicon.stats();
  console.log(`✅ ${stats.entries} entries (${stats.origin}: ${stats.reason})`);

  // Stage 1: headword prefix, diacritics ignored
  console.log("\n🔎 lookup('aba')");
  for (const m of lexicon.lookup("aba").exactPrefixMatches) {
    console.log(`   ${m.original} #${m.entryId}`);
  }

  // Stage 2: no headword starts with "texit", so entries containing it are ranked by count
  console.log("\n🔎 lookup('texit')");
  for (const m of lexicon.lookup("texit").fullTextMatches) {
    console.log(`   ${m.original} (${m.count}×)`);
  }

  // Stage 3: a misspelling falls through to similar headwords
  console.log("\n🔎 lookup('texxo')");
  for (const m of lexicon.lookup("texxo").fuzzyMatches) {
    console.log(`   ${m.original} (distance ${m.score})`);
  }

  // Full entry text
  console.log("\n📖 getEntry('abalieno')");
  console.log(`   ${lexicon.getEntry("abalieno") ?? "(not found)"}`);

  // A second open is served from the cache
  const reopened = await openLexicon({ sourcePath, cachePath: join(dataDir, "dictionary.index.json") });
  console.log(`\n♻️  Reopened from ${reopened.stats().origin}`);

  // Cleanup
  await rm(dataDir, { recursive: true, force: true });
}

main().catch((err: unknown) => {
  console.error("❌ Error:", err);
  process.exit(1);
});

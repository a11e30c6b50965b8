/**
 * CLI to load a slot snapshot and inspect what the engine does with it.
 *
 * Usage:
 *   tsx src/cli.ts --slots slots.json                              # Stats and slot list
 *   tsx src/cli.ts --slots slots.json --search "pricing AND NOT archived"
 *   tsx src/cli.ts --slots slots.json --search "invoice \d+" --regex
 *   tsx src/cli.ts --slots slots.json --query "What did we decide about pricing?"
 *   tsx src/cli.ts --slots slots.json --merge a,b --target ab [--threshold 0.8]
 *   tsx src/cli.ts --slots slots.json --suggest
 */

import { loadConfig } from "./config";
import { Engine } from "./engine";
import { renderHighlights } from "./search";
import { InMemorySlotRepository, loadSlotsFile } from "./slot-store";

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

async function main(): Promise<void> {
  const slotsPath = getArg("slots") || process.env.MEMSLOT_SLOTS;
  if (!slotsPath) {
    console.error("Usage: cli.ts --slots <file.json> [--search q [--regex] | --query q | --merge a,b --target t | --suggest]");
    process.exitCode = 2;
    return;
  }

  console.log(`\n📁 Loading: ${slotsPath}\n`);
  const engine = new Engine(new InMemorySlotRepository(await loadSlotsFile(slotsPath)), loadConfig());
  await engine.load();

  const stats = engine.getStats();
  console.log(`📊 Index Stats:`);
  console.log(`   Slots:         ${stats.slot_count}`);
  console.log(`   Entries:       ${stats.entry_count}`);
  console.log(`   Indexed terms: ${stats.indexed_terms.toLocaleString()}`);
  console.log(`   Postings:      ${stats.total_postings.toLocaleString()}`);

  const search = getArg("search");
  if (search) {
    console.log(`\n🔍 Search: "${search}"\n`);
    const results = await engine.search(search, { max_results: 10, use_regex: args.includes("--regex") });
    if (results.length === 0) console.log("  No results found.");
    for (const r of results) {
      console.log(`  ${r.score.toFixed(2)} │ [${r.slot_name}/${r.entry_id}] ${r.timestamp.toISOString()}`);
      console.log(`       ${renderHighlights(r.snippet, r.highlights)}`);
      console.log();
    }
  }

  const question = getArg("query");
  if (question) {
    console.log(`\n💬 Question: "${question}"\n`);
    const answer = await engine.query(question);
    console.log(`  type: ${answer.question_type}${answer.classified ? "" : " (default)"}`);
    console.log(`  query: ${answer.synthesized_query || "(none)"}`);
    if (answer.time_range) {
      console.log(
        `  window: ${answer.time_range.from.toISOString()} … ${answer.time_range.to.toISOString()} ("${answer.time_range.phrase}")`
      );
    }
    console.log(`\n${answer.answer}`);
  }

  const merge = getArg("merge");
  if (merge) {
    const target = getArg("target") ?? "";
    const thresholdArg = getArg("threshold");
    const preview = await engine.previewMerge({
      source_slots: merge.split(","),
      target_slot: target,
      similarity_threshold: thresholdArg === undefined ? undefined : Number(thresholdArg),
    });
    console.log(`\n🔀 Merge preview → ${preview.target_slot}${preview.target_exists ? " (exists)" : ""}\n`);
    console.log(`   Entries:    ${preview.entries_kept} kept / ${preview.total_entries} total`);
    console.log(`   Duplicates: ${preview.duplicates_removed} (threshold ${preview.similarity_threshold})`);
    console.log(`   Tags:       ${preview.merged_tags.join(", ") || "(none)"}`);
    console.log(`   Group:      ${preview.group_path ?? "(none)"}`);
    console.log(`\n${preview.content_preview}`);
  }

  if (args.includes("--suggest")) {
    console.log(`\n🧩 Merge suggestions:\n`);
    const groups = await engine.suggestMerges();
    if (groups.length === 0) console.log("  No candidates.");
    for (const group of groups) console.log(`  ${group.join(" + ")}`);
  }

  if (!search && !question && !merge && !args.includes("--suggest")) {
    console.log(`\n📋 Slots:\n`);
    for (const s of engine.listSlots()) {
      const tags = s.tags.length ? ` [${s.tags.join(", ")}]` : "";
      console.log(`  ${s.name}${tags} • ${s.entry_count} entries${s.group_path ? ` • ${s.group_path}` : ""}`);
    }
    console.log(`\n  Use --search "query", --query "question", --merge a,b --target t or --suggest`);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? `Error: ${err.message}` : err);
  process.exitCode = 1;
});

#!/usr/bin/env node
// ─── midinorm: CLI Entry Point ──────────────────────────────────────────────
//
// Usage:
//   midinorm                              # Show help
//   midinorm info <file>                  # Summarize a .mid or .json file
//   midinorm normalize <in> <out>         # Normalize and write .mid or .json
//   midinorm to-json <in.mid> [out.json]  # Dictionary form (stdout if no out)
//   midinorm from-json <in.json> <out.mid>
//   midinorm hash <file>                  # Content hash
//   midinorm test <file>                  # Run the configured filter tests
//   midinorm batch <dir> <outdir>         # Test + normalize every file in dir
// ─────────────────────────────────────────────────────────────────────────────

import { readdirSync } from "node:fs";
import { basename, extname, join, parse as parsePath } from "node:path";
import { loadConfig } from "./config/loader.js";
import type { Config } from "./config/schema.js";
import { saveMidiFile, saveMidiDictJson, loadMidiFile, loadMidiDictJson } from "./midi/loader.js";
import type { MidiDict } from "./midi/midi-dict.js";
import { runTests, type NamedTestResult } from "./plugins/filters.js";
import {
  isJsonPath,
  loadAny,
  normalize,
  summarize,
  formatSummary,
  type NormalizeOptions,
} from "./pipeline.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Flags that take a value; their values are not positionals. */
const VALUE_FLAGS = new Set(["--config"]);

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/** Get the value following a flag, or null. */
function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1] ?? null;
}

/** Arguments that are neither flags nor flag values. */
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith("--")) {
      if (VALUE_FLAGS.has(arg)) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

function usage(line: string): never {
  console.error(`Usage: ${line}`);
  process.exit(1);
}

function configFrom(args: string[]): Config {
  return loadConfig(getFlag(args, "--config") ?? undefined);
}

function normalizeOptionsFrom(args: string[]): NormalizeOptions {
  return {
    removeInstruments: hasFlag(args, "--remove-instruments"),
    resolvePedal: hasFlag(args, "--resolve-pedal"),
    resolveOverlaps: hasFlag(args, "--resolve-overlaps"),
    pruneRedundantPedals: hasFlag(args, "--prune-pedals"),
  };
}

/** Write .json paths in dictionary form and anything else as a .mid file. */
function saveAny(doc: MidiDict, filePath: string): void {
  if (isJsonPath(filePath)) {
    saveMidiDictJson(doc, filePath);
  } else {
    saveMidiFile(doc, filePath);
  }
}

function printTestResults(results: NamedTestResult[]): void {
  if (results.length === 0) {
    console.log("  (no tests enabled)");
    return;
  }
  for (const r of results) {
    const mark = r.passed ? "pass" : "FAIL";
    console.log(`  ${mark}  ${r.name.padEnd(32)} ${formatValue(r.value)}`);
  }
}

function formatValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}

function isMidiPath(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return ext === ".mid" || ext === ".midi";
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdInfo(args: string[]): void {
  const [file] = positionals(args);
  if (!file) usage("midinorm info <file.mid | file.json>");

  const doc = loadAny(file, configFrom(args));
  console.log(`\n${formatSummary(basename(file), summarize(doc))}\n`);
}

function cmdNormalize(args: string[]): void {
  const [input, output] = positionals(args);
  if (!input || !output) {
    usage("midinorm normalize <in> <out> [--remove-instruments] [--resolve-pedal] [--resolve-overlaps] [--prune-pedals]");
  }

  const config = configFrom(args);
  const doc = normalize(loadAny(input, config), config, normalizeOptionsFrom(args));
  saveAny(doc, output);

  const summary = summarize(doc);
  console.log(`Wrote ${output} (${summary.noteCount} notes, ${summary.pedalCount} pedal msgs, hash ${summary.hash})`);
}

function cmdToJson(args: string[]): void {
  const [input, output] = positionals(args);
  if (!input) usage("midinorm to-json <in.mid> [out.json]");

  const doc = loadMidiFile(input, { metadataFunctions: configFrom(args).data.metadata.functions });
  if (output) {
    saveMidiDictJson(doc, output);
    console.log(`Wrote ${output}`);
  } else {
    console.log(JSON.stringify(doc, null, 2));
  }
}

function cmdFromJson(args: string[]): void {
  const [input, output] = positionals(args);
  if (!input || !output) usage("midinorm from-json <in.json> <out.mid>");

  saveMidiFile(loadMidiDictJson(input), output);
  console.log(`Wrote ${output}`);
}

function cmdHash(args: string[]): void {
  const [file] = positionals(args);
  if (!file) usage("midinorm hash <file.mid | file.json>");

  console.log(loadAny(file, configFrom(args)).calculateHash());
}

function cmdTest(args: string[]): void {
  const [file] = positionals(args);
  if (!file) usage("midinorm test <file.mid | file.json>");

  const config = configFrom(args);
  const results = runTests(loadAny(file, config), config.data.tests);

  console.log(`\n${basename(file)}`);
  printTestResults(results);
  console.log();

  if (results.some(r => !r.passed)) process.exitCode = 2;
}

function cmdBatch(args: string[]): void {
  const [dir, outDir] = positionals(args);
  if (!dir || !outDir) {
    usage("midinorm batch <dir> <outdir> [--json] [normalize options]");
  }

  const config = configFrom(args);
  const options = normalizeOptionsFrom(args);
  const ext = hasFlag(args, "--json") ? ".json" : ".mid";
  const files = readdirSync(dir).filter(isMidiPath).sort();

  let written = 0;
  let rejected = 0;
  let failed = 0;

  for (const name of files) {
    const input = join(dir, name);
    try {
      const doc = loadMidiFile(input, { metadataFunctions: config.data.metadata.functions });
      const failures = runTests(doc, config.data.tests).filter(r => !r.passed);
      if (failures.length > 0) {
        rejected++;
        const reasons = failures.map(r => `${r.name}=${formatValue(r.value)}`).join(", ");
        console.log(`  skip  ${name} (${reasons})`);
        continue;
      }

      const output = join(outDir, `${parsePath(name).name}${ext}`);
      saveAny(normalize(doc, config, options), output);
      written++;
      console.log(`  ok    ${name}`);
    } catch (err) {
      failed++;
      console.error(`  error ${name}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  console.log(`\n${files.length} file(s): ${written} written, ${rejected} rejected, ${failed} failed.\n`);
  if (failed > 0) process.exitCode = 1;
}

function cmdHelp(): void {
  console.log(`
midinorm — Normalize MIDI files into a canonical, hashable form

Commands:
  info <file>                Summarize a .mid/.midi or .json file
  normalize <in> <out>       Normalize a file; writes .json if <out> ends in .json
  to-json <in.mid> [out]     Convert to dictionary form (stdout if no out)
  from-json <in.json> <out>  Write a dictionary back to a .mid file
  hash <file>                Print the content hash
  test <file>                Run the configured filter tests (exit 2 on failure)
  batch <dir> <outdir>       Test every .mid in <dir>, normalize and write the passing ones
  help                       Show this help

Normalize options (normalize, batch):
  --remove-instruments       Drop channels playing instrument families flagged in config
  --resolve-pedal            Extend notes through sustain pedal
  --resolve-overlaps         Trim overlapping notes of the same pitch and channel
  --prune-pedals             Remove pedal presses that sustain nothing

Other options:
  --config <path>            Config file (default: bundled config/config.json)
  --json                     batch: write .json instead of .mid

Examples:
  midinorm info prelude.mid
  midinorm normalize prelude.mid out.mid --resolve-pedal --prune-pedals
  midinorm to-json prelude.mid prelude.json
  midinorm batch ./raw ./clean --remove-instruments --resolve-pedal
`);
}

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";
  const rest = args.slice(1);

  switch (command) {
    case "info":
      cmdInfo(rest);
      break;
    case "normalize":
      cmdNormalize(rest);
      break;
    case "to-json":
      cmdToJson(rest);
      break;
    case "from-json":
      cmdFromJson(rest);
      break;
    case "hash":
      cmdHash(rest);
      break;
    case "test":
      cmdTest(rest);
      break;
    case "batch":
      cmdBatch(rest);
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      console.error(`Unknown command: "${command}". Run 'midinorm help' for usage.`);
      process.exit(1);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

#!/usr/bin/env node
// ─── midinorm: MCP Server ────────────────────────────────────────────────────
//
// Exposes MIDI inspection and normalization as MCP tools, so an LLM can
// summarize, clean up and screen MIDI files on the local disk.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   midi_info       — summarize a .mid or .json file
//   normalize_midi  — normalize a file and write the result
//   midi_hash       — content hash of a file
//   run_filters     — run the configured filter tests
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig } from "./config/loader.js";
import { loadMidiFile, loadMidiDictJson, saveMidiFile, saveMidiDictJson } from "./midi/loader.js";
import { runTests } from "./plugins/filters.js";
import { isJsonPath, loadAny, normalize, summarize, formatSummary } from "./pipeline.js";

// ─── Server ──────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "midinorm",
  version: "0.1.0",
});

const configParam = z
  .string()
  .optional()
  .describe("Path to a config JSON file (default: bundled config)");

function errorResult(err: unknown) {
  return {
    content: [{ type: "text" as const, text: `Error: ${err instanceof Error ? err.message : String(err)}` }],
    isError: true,
  };
}

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

// ─── Tool: midi_info ─────────────────────────────────────────────────────────

server.tool(
  "midi_info",
  "Summarize a MIDI file (.mid/.midi) or its JSON dictionary form: duration, note and pedal counts, channels, programs, metadata and content hash.",
  {
    path: z.string().describe("Path to a .mid, .midi or .json file"),
    config: configParam,
  },
  async ({ path, config }) => {
    try {
      const doc = loadAny(path, loadConfig(config));
      return textResult(formatSummary(path, summarize(doc)));
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: normalize_midi ────────────────────────────────────────────────────

server.tool(
  "normalize_midi",
  "Normalize a MIDI file and write the result. Output ending in .json is written in dictionary form, anything else as a format-0 .mid file.",
  {
    input: z.string().describe("Path to the source .mid, .midi or .json file"),
    output: z.string().describe("Path to write"),
    removeInstruments: z.boolean().optional().describe("Drop channels whose instrument family the config flags"),
    resolvePedal: z.boolean().optional().describe("Extend notes through sustain pedal"),
    resolveOverlaps: z.boolean().optional().describe("Trim overlapping notes of the same pitch and channel"),
    pruneRedundantPedals: z.boolean().optional().describe("Remove pedal presses that sustain nothing"),
    config: configParam,
  },
  async ({ input, output, config, ...options }) => {
    try {
      const cfg = loadConfig(config);
      const doc = normalize(loadAny(input, cfg), cfg, options);
      if (isJsonPath(output)) {
        saveMidiDictJson(doc, output);
      } else {
        saveMidiFile(doc, output);
      }
      return textResult(`Wrote ${output}\n\n${formatSummary(output, summarize(doc))}`);
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: midi_hash ─────────────────────────────────────────────────────────

server.tool(
  "midi_hash",
  "Content hash of a MIDI file. Two files with the same tempo, pedal, instrument and note messages hash the same regardless of text events, resolution or metadata.",
  {
    path: z.string().describe("Path to a .mid, .midi or .json file"),
  },
  async ({ path }) => {
    try {
      // Metadata does not enter the hash, so skip the metadata functions.
      const doc = isJsonPath(path)
        ? loadMidiDictJson(path)
        : loadMidiFile(path, { metadataFunctions: {} });
      return textResult(doc.calculateHash());
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: run_filters ───────────────────────────────────────────────────────

server.tool(
  "run_filters",
  "Run the filter tests enabled in config against a MIDI file and report each verdict with the value it measured.",
  {
    path: z.string().describe("Path to a .mid, .midi or .json file"),
    config: configParam,
  },
  async ({ path, config }) => {
    try {
      const cfg = loadConfig(config);
      const results = runTests(loadAny(path, cfg), cfg.data.tests);
      if (results.length === 0) return textResult("No tests are enabled in the config.");

      const passed = results.every(r => r.passed);
      const lines = results.map(r => `- ${r.passed ? "pass" : "FAIL"} ${r.name}: ${r.value}`);
      return textResult(`${passed ? "PASSED" : "REJECTED"}\n\n${lines.join("\n")}`);
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("midinorm MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});

// ─── Normalization Pipeline ──────────────────────────────────────────────────
//
// The steps the CLI and MCP server share: load a file in either form,
// apply the chosen normalizations in a fixed order, and summarize the
// result.
// ─────────────────────────────────────────────────────────────────────────────

import { extname } from "node:path";
import { MidiDict } from "./midi/midi-dict.js";
import { loadMidiFile, loadMidiDictJson } from "./midi/loader.js";
import { programToInstrument } from "./midi/instruments.js";
import type { Config } from "./config/schema.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface NormalizeOptions {
  /** Remove channels whose instrument family the config flags. */
  removeInstruments?: boolean;
  /** Extend notes through sustain pedal and resolve the resulting overlaps. */
  resolvePedal?: boolean;
  /** Drop pedal presses that never sustain a note. */
  pruneRedundantPedals?: boolean;
  /** Trim same-pitch overlaps even without pedal resolution. */
  resolveOverlaps?: boolean;
}

export interface MidiSummary {
  ticksPerBeat: number;
  durationMs: number;
  noteCount: number;
  pedalCount: number;
  tempoCount: number;
  channels: number[];
  programs: Array<{ channel: number; program: number; instrument: string }>;
  metaText: string[];
  metadata: Record<string, unknown>;
  pedalResolved: boolean;
  hash: string;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/** Whether a path names the JSON dictionary form rather than a .mid file. */
export function isJsonPath(filePath: string): boolean {
  return extname(filePath).toLowerCase() === ".json";
}

/**
 * Load a .mid/.midi file (running the config's metadata functions) or a
 * .json dictionary.
 */
export function loadAny(filePath: string, config: Config): MidiDict {
  if (isJsonPath(filePath)) return loadMidiDictJson(filePath);
  return loadMidiFile(filePath, { metadataFunctions: config.data.metadata.functions });
}

/**
 * Apply the requested normalizations in place: instrument removal first
 * (so pedal work never touches dropped channels), then pedal resolution,
 * then overlap trimming, then pedal pruning.
 */
export function normalize(doc: MidiDict, config: Config, options: NormalizeOptions): MidiDict {
  if (options.removeInstruments) {
    doc.removeInstruments(config.data.preprocessing.remove_instruments);
  }
  if (options.resolvePedal) {
    doc.resolvePedal();
  }
  if (options.resolveOverlaps) {
    doc.resolveOverlaps();
  }
  if (options.pruneRedundantPedals) {
    doc.removeRedundantPedals();
  }
  return doc;
}

/** Last tick any note sounds, or 0 for an empty file. */
export function lastNoteTick(doc: MidiDict): number {
  let last = 0;
  for (const msg of doc.noteMsgs) {
    if (msg.data.end > last) last = msg.data.end;
  }
  return last;
}

export function summarize(doc: MidiDict): MidiSummary {
  const channels = [...new Set(doc.noteMsgs.map(msg => msg.channel))].sort((a, b) => a - b);

  return {
    ticksPerBeat: doc.ticksPerBeat,
    durationMs: doc.tickToMs(lastNoteTick(doc)),
    noteCount: doc.noteMsgs.length,
    pedalCount: doc.pedalMsgs.length,
    tempoCount: doc.tempoMsgs.length,
    channels,
    programs: doc.instrumentMsgs.map(msg => ({
      channel: msg.channel,
      program: msg.data,
      instrument: programToInstrument(msg.data),
    })),
    metaText: doc.metaMsgs.map(msg => msg.data),
    metadata: doc.metadata,
    pedalResolved: doc.pedalResolved,
    hash: doc.calculateHash(),
  };
}

/** Multi-line plain-text rendering of a summary. */
export function formatSummary(name: string, summary: MidiSummary): string {
  const lines = [
    `${name}`,
    `  Duration: ${(summary.durationMs / 1000).toFixed(1)}s | Resolution: ${summary.ticksPerBeat} ticks/beat`,
    `  Notes: ${summary.noteCount} | Pedal msgs: ${summary.pedalCount} | Tempo changes: ${summary.tempoCount}`,
    `  Channels: ${summary.channels.length > 0 ? summary.channels.join(", ") : "none"}`,
    `  Programs: ${summary.programs.map(p => `ch${p.channel}=${p.program} (${p.instrument})`).join(", ")}`,
    `  Hash: ${summary.hash}`,
  ];

  const metadataEntries = Object.entries(summary.metadata);
  if (metadataEntries.length > 0) {
    lines.push(`  Metadata: ${metadataEntries.map(([k, v]) => `${k}=${String(v)}`).join(", ")}`);
  }
  if (summary.metaText.length > 0) {
    lines.push(`  Text: ${summary.metaText.join(" | ")}`);
  }

  return lines.join("\n");
}

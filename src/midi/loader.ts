// ─── MidiDict File I/O ───────────────────────────────────────────────────────
//
// Reads and writes .mid files and their JSON dictionary form.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { MidiDict } from "./midi-dict.js";
import type { PluginConfigMap } from "../config/schema.js";
import { loadConfig } from "../config/loader.js";

export interface LoadMidiOptions {
  /**
   * Metadata functions to run. Defaults to those in the bundled config;
   * pass `{}` to run none.
   */
  metadataFunctions?: PluginConfigMap;
}

/**
 * Load a Standard MIDI File from disk.
 */
export function loadMidiFile(filePath: string, options: LoadMidiOptions = {}): MidiDict {
  if (!existsSync(filePath)) {
    throw new Error(`MIDI file not found: ${filePath}`);
  }

  const metadataFunctions = options.metadataFunctions ?? loadConfig().data.metadata.functions;
  return MidiDict.fromMidiBuffer(readFileSync(filePath), {
    source: { filename: filePath },
    metadataFunctions,
  });
}

/**
 * Write a MidiDict as a format-0 Standard MIDI File.
 * Creates the parent directory if needed. Returns the path written.
 */
export function saveMidiFile(doc: MidiDict, filePath: string): string {
  ensureParentDir(filePath);
  writeFileSync(filePath, doc.toMidiBuffer());
  return filePath;
}

/**
 * Load a MidiDict from its JSON dictionary form.
 * Throws if the structure does not have exactly the canonical keys.
 */
export function loadMidiDictJson(filePath: string): MidiDict {
  if (!existsSync(filePath)) {
    throw new Error(`JSON file not found: ${filePath}`);
  }

  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  try {
    return MidiDict.fromMsgDict(raw);
  } catch (err) {
    throw new Error(`${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Save a MidiDict's dictionary form as JSON.
 * Creates the parent directory if needed. Returns the path written.
 */
export function saveMidiDictJson(doc: MidiDict, filePath: string): string {
  ensureParentDir(filePath);
  writeFileSync(filePath, JSON.stringify(doc.getMsgDict(), null, 2) + "\n", "utf8");
  return filePath;
}

function ensureParentDir(filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

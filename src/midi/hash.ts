// ─── Content Hash ────────────────────────────────────────────────────────────
//
// A stable identity for a MidiDict's musical content. Text meta messages,
// resolution and metadata are excluded, so retagging a file or copying its
// copyright notice never changes the hash.
// ─────────────────────────────────────────────────────────────────────────────

import { createHash } from "node:crypto";
import type { MidiDictData } from "./types.js";

/**
 * Serialize with sorted object keys and `", "` / `": "` separators.
 *
 * For the values a MidiDict holds (integers, ASCII strings, arrays and
 * plain objects) this matches the sorted-key, space-separated JSON that
 * existing datasets of these dictionaries were hashed with.
 */
export function canonicalJson(value: unknown): string {
  if (
    value === null ||
    typeof value === "boolean" ||
    typeof value === "number" ||
    typeof value === "string"
  ) {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(", ")}]`;
  }
  if (typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}: ${canonicalJson(v)}`);
    return `{${entries.join(", ")}}`;
  }
  throw new Error(`Cannot serialize value of type ${typeof value}`);
}

/**
 * MD5 hex digest of the tempo, pedal, instrument and note sequences.
 * Sensitive to message order within each sequence.
 */
export function calculateHash(data: MidiDictData): string {
  const hashed = {
    tempo_msgs: data.tempo_msgs,
    pedal_msgs: data.pedal_msgs,
    instrument_msgs: data.instrument_msgs,
    note_msgs: data.note_msgs,
  };
  return createHash("md5").update(canonicalJson(hashed)).digest("hex");
}

// ─── MidiDict → MIDI ─────────────────────────────────────────────────────────
//
// Wraps the assembled track as a format-0 file and encodes it with
// midi-file.
// ─────────────────────────────────────────────────────────────────────────────

import { writeMidi, type MidiData } from "midi-file";
import type { MidiDictData } from "./types.js";
import { assembleTrack } from "./assembler.js";

/**
 * Build a single-track (format 0) MidiData from dictionary form.
 * Text meta messages and metadata are not written.
 */
export function dictToMidi(data: MidiDictData): MidiData {
  return {
    header: { format: 0, numTracks: 1, ticksPerBeat: data.ticks_per_beat },
    tracks: [assembleTrack(data)],
  };
}

/**
 * Encode dictionary form as Standard MIDI File bytes.
 */
export function writeMidiBuffer(data: MidiDictData): Uint8Array {
  return Uint8Array.from(writeMidi(dictToMidi(data)));
}

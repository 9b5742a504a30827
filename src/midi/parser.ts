// ─── MIDI → MidiDict ─────────────────────────────────────────────────────────
//
// Decodes a Standard MIDI File with midi-file, pairs each track's events,
// merges the tracks, and runs the configured metadata functions.
// ─────────────────────────────────────────────────────────────────────────────

import { parseMidi, type MidiData } from "midi-file";
import type { MidiDictData, MidiSource } from "./types.js";
import type { PluginConfigMap } from "../config/schema.js";
import { toAbsoluteTicks, extractTrackData } from "./pairing.js";
import { runMetadataFunctions } from "../plugins/metadata.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** Resolution used when the header gives SMPTE timing instead of PPQ. */
export const DEFAULT_TICKS_PER_BEAT = 480;

// ─── Types ───────────────────────────────────────────────────────────────────

export interface MidiToDictOptions {
  /** Where the file came from, for metadata functions that read its name. */
  source?: MidiSource;
  /** Metadata functions to run, in order. None run when omitted. */
  metadataFunctions?: PluginConfigMap;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Convert decoded MIDI data into dictionary form.
 *
 * Tracks are paired independently (a note-on in one track is never closed
 * by a note-off in another) and their messages concatenated in track order,
 * then every tick-bearing list is stable-sorted by tick.
 */
export function midiToDict(midi: MidiData, options: MidiToDictOptions = {}): MidiDictData {
  const data: MidiDictData = {
    meta_msgs: [],
    tempo_msgs: [],
    pedal_msgs: [],
    instrument_msgs: [],
    note_msgs: [],
    ticks_per_beat: midi.header.ticksPerBeat ?? DEFAULT_TICKS_PER_BEAT,
    metadata: {},
  };

  for (const track of midi.tracks) {
    const trackData = extractTrackData(toAbsoluteTicks(track));
    data.meta_msgs = data.meta_msgs.concat(trackData.metaMsgs);
    data.tempo_msgs = data.tempo_msgs.concat(trackData.tempoMsgs);
    data.pedal_msgs = data.pedal_msgs.concat(trackData.pedalMsgs);
    data.instrument_msgs = data.instrument_msgs.concat(trackData.instrumentMsgs);
    data.note_msgs = data.note_msgs.concat(trackData.noteMsgs);
  }

  data.tempo_msgs.sort((a, b) => a.tick - b.tick);
  data.pedal_msgs.sort((a, b) => a.tick - b.tick);
  data.instrument_msgs.sort((a, b) => a.tick - b.tick);
  data.note_msgs.sort((a, b) => a.tick - b.tick);

  if (options.metadataFunctions) {
    runMetadataFunctions(options.source ?? {}, data, options.metadataFunctions);
  }

  return data;
}

/**
 * Decode an SMF byte buffer into dictionary form.
 */
export function parseMidiBuffer(
  buffer: Uint8Array,
  options: MidiToDictOptions = {},
): MidiDictData {
  return midiToDict(parseMidi(buffer), options);
}

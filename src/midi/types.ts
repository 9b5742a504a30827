// ─── MIDI Normalization Types ───────────────────────────────────────────────
//
// Tick-based types shared by the pairing, pedal, and assembly stages.
// Message shapes live in schema.ts (derived from the zod schemas); this file
// adds the transient structures that never leave the pipeline.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiEvent } from "midi-file";
import type {
  MetaMessage,
  TempoMessage,
  PedalMessage,
  InstrumentMessage,
  NoteMessage,
} from "./schema.js";

export type {
  MetaMessage,
  TempoMessage,
  PedalMessage,
  InstrumentMessage,
  NoteData,
  NoteMessage,
  MidiMessage,
  MidiDictData,
} from "./schema.js";

/** A codec event placed at an absolute tick instead of a delta. */
export interface AbsoluteEvent {
  /** Ticks from the start of the track. */
  tick: number;
  /** The event as decoded by midi-file (its deltaTime is ignored). */
  event: MidiEvent;
}

/** Messages extracted from a single track, each list sorted by tick. */
export interface TrackData {
  metaMsgs: MetaMessage[];
  tempoMsgs: TempoMessage[];
  pedalMsgs: PedalMessage[];
  instrumentMsgs: InstrumentMessage[];
  noteMsgs: NoteMessage[];
}

/** A closed sustain interval `[start, end]` in ticks. */
export type PedalInterval = [start: number, end: number];

/** Channel → ordered, non-overlapping sustain intervals. */
export type PedalIntervals = Map<number, PedalInterval[]>;

/**
 * Where a MidiDict came from. Metadata functions read the file name;
 * documents built from raw buffers simply have none.
 */
export interface MidiSource {
  filename?: string;
}

// ─── MidiDict ────────────────────────────────────────────────────────────────
//
// The canonical, structured form of a MIDI file: five ordered message lists
// plus resolution and metadata. Every transformation edits the lists in
// place and returns the same instance, so calls chain:
//
//   loadMidiFile(path).resolvePedal().removeRedundantPedals().toMidiBuffer()
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiData } from "midi-file";
import type {
  MetaMessage,
  TempoMessage,
  PedalMessage,
  InstrumentMessage,
  NoteMessage,
  MidiDictData,
  PedalIntervals,
} from "./types.js";
import { parseMidiDictData } from "./schema.js";
import { DEFAULT_TEMPO, getDurationMs } from "./tempo.js";
import { resolveOverlaps } from "./overlaps.js";
import { buildPedalIntervals, extendNotesWithPedal, pruneRedundantPedals } from "./pedal.js";
import { channelsToRemove, type InstrumentFamily } from "./instruments.js";
import { calculateHash } from "./hash.js";
import { midiToDict, parseMidiBuffer, type MidiToDictOptions } from "./parser.js";
import { dictToMidi, writeMidiBuffer } from "./writer.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/** Constructor input. Missing lists start empty; metadata starts `{}`. */
export interface MidiDictInit {
  metaMsgs?: MetaMessage[];
  tempoMsgs?: TempoMessage[];
  pedalMsgs?: PedalMessage[];
  instrumentMsgs?: InstrumentMessage[];
  noteMsgs?: NoteMessage[];
  ticksPerBeat: number;
  metadata?: Record<string, unknown>;
}

export interface ResolvePedalOptions {
  /** Throw instead of warning when pedal has already been resolved. */
  strict?: boolean;
}

// ─── MidiDict ────────────────────────────────────────────────────────────────

export class MidiDict {
  metaMsgs: MetaMessage[];
  tempoMsgs: TempoMessage[];
  pedalMsgs: PedalMessage[];
  instrumentMsgs: InstrumentMessage[];
  noteMsgs: NoteMessage[];
  ticksPerBeat: number;
  metadata: Record<string, unknown>;

  /**
   * Set once resolvePedal() has run. Advisory only: resolving again warns
   * (or throws in strict mode) but is otherwise not prevented.
   */
  pedalResolved = false;

  /**
   * Takes ownership of the given messages. The note list is stable-sorted
   * by tick in place.
   * A file with no tempo gets 120 BPM at tick 0; one with no program
   * change gets piano (program 0) on channel 0.
   */
  constructor(init: MidiDictInit) {
    this.metaMsgs = init.metaMsgs ?? [];
    this.tempoMsgs = init.tempoMsgs ?? [];
    this.pedalMsgs = init.pedalMsgs ?? [];
    this.instrumentMsgs = init.instrumentMsgs ?? [];
    this.noteMsgs = (init.noteMsgs ?? []).sort((a, b) => a.tick - b.tick);
    this.ticksPerBeat = init.ticksPerBeat;
    this.metadata = init.metadata ?? {};

    if (this.tempoMsgs.length === 0) {
      this.tempoMsgs = [{ type: "tempo", data: DEFAULT_TEMPO, tick: 0 }];
    }
    if (this.instrumentMsgs.length === 0) {
      this.instrumentMsgs = [{ type: "instrument", data: 0, tick: 0, channel: 0 }];
    }
  }

  // ─── Construction ──────────────────────────────────────────────────────

  /** Wrap data in dictionary form. The lists are owned, not copied. */
  static fromData(data: MidiDictData): MidiDict {
    return new MidiDict({
      metaMsgs: data.meta_msgs,
      tempoMsgs: data.tempo_msgs,
      pedalMsgs: data.pedal_msgs,
      instrumentMsgs: data.instrument_msgs,
      noteMsgs: data.note_msgs,
      ticksPerBeat: data.ticks_per_beat,
      metadata: data.metadata,
    });
  }

  /**
   * Validate and copy an interchange structure (e.g. parsed JSON).
   * Throws if a top-level key is missing or extra, or a message is malformed.
   */
  static fromMsgDict(value: unknown): MidiDict {
    return MidiDict.fromData(structuredClone(parseMidiDictData(value)));
  }

  /** Build from decoded MIDI data. */
  static fromMidi(midi: MidiData, options?: MidiToDictOptions): MidiDict {
    return MidiDict.fromData(midiToDict(midi, options));
  }

  /** Build from Standard MIDI File bytes. */
  static fromMidiBuffer(buffer: Uint8Array, options?: MidiToDictOptions): MidiDict {
    return MidiDict.fromData(parseMidiBuffer(buffer, options));
  }

  /** An independent deep copy, including the pedalResolved flag. */
  clone(): MidiDict {
    const copy = MidiDict.fromData(structuredClone(this.getMsgDict()));
    copy.pedalResolved = this.pedalResolved;
    return copy;
  }

  // ─── Views ─────────────────────────────────────────────────────────────

  /**
   * Dictionary form. The lists are this instance's own, not copies; use
   * clone() first to get data that can be edited independently.
   */
  getMsgDict(): MidiDictData {
    return {
      meta_msgs: this.metaMsgs,
      tempo_msgs: this.tempoMsgs,
      pedal_msgs: this.pedalMsgs,
      instrument_msgs: this.instrumentMsgs,
      note_msgs: this.noteMsgs,
      ticks_per_beat: this.ticksPerBeat,
      metadata: this.metadata,
    };
  }

  toJSON(): MidiDictData {
    return this.getMsgDict();
  }

  toMidi(): MidiData {
    return dictToMidi(this.getMsgDict());
  }

  toMidiBuffer(): Uint8Array {
    return writeMidiBuffer(this.getMsgDict());
  }

  /** See calculateHash in hash.ts. */
  calculateHash(): string {
    return calculateHash(this.getMsgDict());
  }

  /** Milliseconds from the start of the file to `tick`. */
  tickToMs(tick: number): number {
    return getDurationMs(0, tick, this.tempoMsgs, this.ticksPerBeat);
  }

  /** Per-channel sustain intervals. Sorts pedalMsgs by tick as a side effect. */
  buildPedalIntervals(): PedalIntervals {
    return buildPedalIntervals(this.pedalMsgs, this.noteMsgs);
  }

  // ─── Transformations ───────────────────────────────────────────────────

  /** Trim same-pitch, same-channel overlaps. */
  resolveOverlaps(): this {
    resolveOverlaps(this.noteMsgs);
    return this;
  }

  /**
   * Extend note ends through sustain intervals, then resolve overlaps.
   *
   * Calling this twice is allowed but not a no-op: the second call logs a
   * warning and extends again.
   */
  resolvePedal(options: ResolvePedalOptions = {}): this {
    if (this.pedalResolved) {
      if (options.strict) {
        throw new Error("Pedal has already been resolved");
      }
      console.error("Pedal has already been resolved");
    }

    extendNotesWithPedal(this.noteMsgs, this.pedalMsgs);
    this.pedalResolved = true;
    return this;
  }

  /** Drop pedal messages that never sustain a note. */
  removeRedundantPedals(): this {
    this.pedalMsgs = pruneRedundantPedals(this.pedalMsgs, this.noteMsgs);
    return this;
  }

  /**
   * Remove every channel-bearing message on channels that play a program
   * from a flagged family. Channel 9 (drums) is always kept; tempo and
   * meta messages have no channel and are kept too.
   */
  removeInstruments(flags: Partial<Record<InstrumentFamily, boolean>>): this {
    const channels = channelsToRemove(this.getMsgDict(), flags);
    if (channels.size === 0) return this;

    this.pedalMsgs = this.pedalMsgs.filter(msg => !channels.has(msg.channel));
    this.instrumentMsgs = this.instrumentMsgs.filter(msg => !channels.has(msg.channel));
    this.noteMsgs = this.noteMsgs.filter(msg => !channels.has(msg.channel));
    return this;
  }
}

// ─── midinorm ───────────────────────────────────────────────────────────────
//
// MIDI normalization — parses Standard MIDI Files into a canonical message
// dictionary, cleans up pedal and overlaps, and writes them back.
//
// Usage:
//   import { loadMidiFile, saveMidiFile } from "midinorm";
//   const doc = loadMidiFile("in.mid").resolvePedal().removeRedundantPedals();
//   saveMidiFile(doc, "out.mid");
// ─────────────────────────────────────────────────────────────────────────────

// Document model
export { MidiDict } from "./midi/midi-dict.js";
export type { MidiDictInit, ResolvePedalOptions } from "./midi/midi-dict.js";

// File I/O
export { loadMidiFile, saveMidiFile, loadMidiDictJson, saveMidiDictJson } from "./midi/loader.js";
export type { LoadMidiOptions } from "./midi/loader.js";

// Codec
export { midiToDict, parseMidiBuffer, DEFAULT_TICKS_PER_BEAT } from "./midi/parser.js";
export type { MidiToDictOptions } from "./midi/parser.js";
export { dictToMidi, writeMidiBuffer } from "./midi/writer.js";
export { assembleAbsoluteEvents, assembleTrack, collectNoteOffs } from "./midi/assembler.js";
export { toAbsoluteTicks, extractTrackData, SUSTAIN_CONTROLLER } from "./midi/pairing.js";

// Timing
export { DEFAULT_TEMPO, ticksToSeconds, getDurationMs, roundHalfEven } from "./midi/tempo.js";

// Pedal and overlaps
export {
  buildPedalIntervals,
  extendNotesWithPedal,
  isPedalUseful,
  pruneRedundantPedals,
} from "./midi/pedal.js";
export { resolveOverlaps, groupByChannelPitch } from "./midi/overlaps.js";

// Instruments
export {
  INSTRUMENT_FAMILIES,
  DRUM_CHANNEL,
  programToInstrument,
  programsToRemove,
  channelsToRemove,
} from "./midi/instruments.js";
export type { InstrumentFamily } from "./midi/instruments.js";

// Hashing
export { calculateHash, canonicalJson } from "./midi/hash.js";

// Schemas and types
export { MidiDictDataSchema, parseMidiDictData } from "./midi/schema.js";
export type {
  MetaMessage,
  TempoMessage,
  PedalMessage,
  InstrumentMessage,
  NoteMessage,
  NoteData,
  MidiMessage,
  MidiDictData,
  AbsoluteEvent,
  TrackData,
  PedalInterval,
  PedalIntervals,
  MidiSource,
} from "./midi/types.js";

// Config
export { loadConfig, defaultConfigPath } from "./config/loader.js";
export { ConfigSchema, validateConfig } from "./config/schema.js";
export type { Config, ConfigError, PluginConfig, PluginConfigMap } from "./config/schema.js";

// Plugins
export {
  METADATA_FUNCTIONS,
  getMetadataFn,
  runMetadataFunctions,
  matchWord,
} from "./plugins/metadata.js";
export type { MetadataFn, MetadataFunctionName } from "./plugins/metadata.js";
export { TEST_FUNCTIONS, getTestFn, runTests } from "./plugins/filters.js";
export type { TestFn, TestResult, NamedTestResult, TestFunctionName } from "./plugins/filters.js";

// Pipeline
export { normalize, summarize, formatSummary, loadAny } from "./pipeline.js";
export type { NormalizeOptions, MidiSummary } from "./pipeline.js";

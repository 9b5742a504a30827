// ─── Instrument Families ─────────────────────────────────────────────────────
//
// General MIDI program → instrument family, and channel removal by family.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiDictData } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** The sixteen General MIDI families, eight programs each, in program order. */
export const INSTRUMENT_FAMILIES = [
  "piano",
  "chromatic",
  "organ",
  "guitar",
  "bass",
  "strings",
  "ensemble",
  "brass",
  "reed",
  "pipe",
  "synth_lead",
  "synth_pad",
  "synth_effect",
  "ethnic",
  "percussive",
  "sfx",
] as const;

export type InstrumentFamily = (typeof INSTRUMENT_FAMILIES)[number];

/** Channel 9 carries percussion in General MIDI and is never removed. */
export const DRUM_CHANNEL = 9;

// ─── Public API ──────────────────────────────────────────────────────────────

/** Family of a program number (0–127). */
export function programToInstrument(program: number): InstrumentFamily {
  const family = INSTRUMENT_FAMILIES[Math.floor(program / 8)];
  if (family === undefined || !Number.isInteger(program) || program < 0) {
    throw new Error(`Program out of range: ${program}`);
  }
  return family;
}

/** Programs whose family is flagged `true`. */
export function programsToRemove(
  flags: Partial<Record<InstrumentFamily, boolean>>,
): Set<number> {
  const programs = new Set<number>();
  for (let program = 0; program <= 127; program++) {
    if (flags[programToInstrument(program)] === true) programs.add(program);
  }
  return programs;
}

/**
 * Channels playing a flagged program at any point, minus the drum channel.
 */
export function channelsToRemove(
  data: Pick<MidiDictData, "instrument_msgs">,
  flags: Partial<Record<InstrumentFamily, boolean>>,
): Set<number> {
  const programs = programsToRemove(flags);
  const channels = new Set<number>();
  for (const msg of data.instrument_msgs) {
    if (programs.has(msg.data) && msg.channel !== DRUM_CHANNEL) {
      channels.add(msg.channel);
    }
  }
  return channels;
}

// ─── Stream Assembly ─────────────────────────────────────────────────────────
//
// Flattens a MidiDict back into one ordered, delta-timed event track.
// The ordering rules here decide how overlapping and retriggered notes
// re-pair when the file is read again, so they must stay exactly as is.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiEvent } from "midi-file";
import type { AbsoluteEvent, MidiDictData, NoteMessage } from "./types.js";
import { groupByChannelPitch } from "./overlaps.js";
import { SUSTAIN_CONTROLLER } from "./pairing.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** Sort key for events without a velocity; above any valid velocity. */
const NO_VELOCITY = 1000;

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Note-offs that can be written without cutting another note short.
 *
 * An off at `end` is suppressed when another note on the same key starts
 * inside `(start, end)` and ends after it: written out, that off would be
 * read back as the release of the later note.
 */
export function collectNoteOffs(
  noteMsgs: readonly NoteMessage[],
): Array<{ tick: number; channel: number; pitch: number }> {
  const offs: Array<{ tick: number; channel: number; pitch: number }> = [];

  for (const group of groupByChannelPitch(noteMsgs).values()) {
    for (const msg of group) {
      const { start, end } = msg.data;
      const interrupted = group.some(
        other => start < other.data.start && other.data.start < end && end < other.data.end,
      );
      if (!interrupted) {
        offs.push({ tick: end, channel: msg.channel, pitch: msg.data.pitch });
      }
    }
  }

  return offs;
}

/**
 * All tempo, pedal, program and note events at absolute ticks, in output
 * order: by tick, then by velocity, with velocity-less events last. So at
 * a shared tick note-offs (velocity 0) come first, then note-ons from
 * quietest to loudest, then everything else.
 */
export function assembleAbsoluteEvents(data: MidiDictData): AbsoluteEvent[] {
  const events: AbsoluteEvent[] = [];

  for (const msg of data.tempo_msgs) {
    events.push({
      tick: msg.tick,
      event: { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: msg.data },
    });
  }

  for (const msg of data.pedal_msgs) {
    events.push({
      tick: msg.tick,
      event: {
        deltaTime: 0,
        type: "controller",
        channel: msg.channel,
        controllerType: SUSTAIN_CONTROLLER,
        value: msg.data * 127,
      },
    });
  }

  for (const msg of data.instrument_msgs) {
    events.push({
      tick: msg.tick,
      event: { deltaTime: 0, type: "programChange", channel: msg.channel, programNumber: msg.data },
    });
  }

  for (const msg of data.note_msgs) {
    events.push({
      tick: msg.data.start,
      event: {
        deltaTime: 0,
        type: "noteOn",
        channel: msg.channel,
        noteNumber: msg.data.pitch,
        velocity: msg.data.velocity,
      },
    });
  }

  for (const off of collectNoteOffs(data.note_msgs)) {
    events.push({
      tick: off.tick,
      event: { deltaTime: 0, type: "noteOn", channel: off.channel, noteNumber: off.pitch, velocity: 0 },
    });
  }

  return events.sort((a, b) => a.tick - b.tick || tieBreak(a.event) - tieBreak(b.event));
}

/**
 * Assemble a single delta-timed track terminated by endOfTrack.
 */
export function assembleTrack(data: MidiDictData): MidiEvent[] {
  const track: MidiEvent[] = [];
  let previousTick = 0;

  for (const { tick, event } of assembleAbsoluteEvents(data)) {
    event.deltaTime = tick - previousTick;
    previousTick = tick;
    track.push(event);
  }

  track.push({ deltaTime: 0, meta: true, type: "endOfTrack" });
  return track;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function tieBreak(event: MidiEvent): number {
  if (event.type === "noteOn" || event.type === "noteOff") return event.velocity;
  return NO_VELOCITY;
}

// ─── Note Pairing ────────────────────────────────────────────────────────────
//
// Turns one track's raw channel events into MidiDict messages. Note-ons are
// held open per (pitch, channel) until a matching release arrives; tempo,
// program, sustain and text events are classified without pairing.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiEvent } from "midi-file";
import type { AbsoluteEvent, TrackData, NoteMessage } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

/** Controller number of the damper (sustain) pedal. */
export const SUSTAIN_CONTROLLER = 64;

/** Controller values at or above this count as pedal down. */
const PEDAL_ON_THRESHOLD = 64;

// ─── Types ───────────────────────────────────────────────────────────────────

/** A note-on still waiting for its release. */
interface OpenNote {
  start: number;
  velocity: number;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Convert a track's delta times into absolute ticks.
 * The events themselves are not copied or modified.
 */
export function toAbsoluteTicks(track: readonly MidiEvent[]): AbsoluteEvent[] {
  const events: AbsoluteEvent[] = [];
  let tick = 0;
  for (const event of track) {
    tick += event.deltaTime;
    events.push({ tick, event });
  }
  return events;
}

/**
 * Extract meta, tempo, pedal, instrument and note messages from one track.
 *
 * Retriggering a pitch before it is released is legal, so each
 * (pitch, channel) key holds a list of open note-ons. A release closes
 * every open note on that key except those that started on the release
 * tick itself; those stay open, since a zero-length note followed by a
 * retrigger on the same tick should keep sounding. Releases with nothing
 * open are dropped.
 */
export function extractTrackData(events: readonly AbsoluteEvent[]): TrackData {
  const data: TrackData = {
    metaMsgs: [],
    tempoMsgs: [],
    pedalMsgs: [],
    instrumentMsgs: [],
    noteMsgs: [],
  };
  const open = new Map<string, OpenNote[]>();

  for (const { tick, event } of events) {
    switch (event.type) {
      case "text":
        data.metaMsgs.push({ type: "text", data: event.text });
        break;
      case "copyrightNotice":
        data.metaMsgs.push({ type: "copyright", data: event.text });
        break;
      case "setTempo":
        data.tempoMsgs.push({ type: "tempo", data: event.microsecondsPerBeat, tick });
        break;
      case "programChange":
        data.instrumentMsgs.push({
          type: "instrument",
          data: event.programNumber,
          tick,
          channel: event.channel,
        });
        break;
      case "controller":
        if (event.controllerType === SUSTAIN_CONTROLLER) {
          data.pedalMsgs.push({
            type: "pedal",
            data: event.value >= PEDAL_ON_THRESHOLD ? 1 : 0,
            tick,
            channel: event.channel,
          });
        }
        break;
      case "noteOn":
        if (event.velocity > 0) {
          openNote(open, event.noteNumber, event.channel, tick, event.velocity);
        } else {
          closeNotes(open, event.noteNumber, event.channel, tick, data.noteMsgs);
        }
        break;
      case "noteOff":
        closeNotes(open, event.noteNumber, event.channel, tick, data.noteMsgs);
        break;
    }
  }

  data.tempoMsgs.sort((a, b) => a.tick - b.tick);
  data.pedalMsgs.sort((a, b) => a.tick - b.tick);
  data.instrumentMsgs.sort((a, b) => a.tick - b.tick);
  data.noteMsgs.sort((a, b) => a.tick - b.tick);

  return data;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function noteKey(pitch: number, channel: number): string {
  return `${pitch}:${channel}`;
}

function openNote(
  open: Map<string, OpenNote[]>,
  pitch: number,
  channel: number,
  tick: number,
  velocity: number,
): void {
  const key = noteKey(pitch, channel);
  const pending = open.get(key);
  if (pending) {
    pending.push({ start: tick, velocity });
  } else {
    open.set(key, [{ start: tick, velocity }]);
  }
}

function closeNotes(
  open: Map<string, OpenNote[]>,
  pitch: number,
  channel: number,
  tick: number,
  out: NoteMessage[],
): void {
  const key = noteKey(pitch, channel);
  const pending = open.get(key);
  if (!pending) return;

  const retained: OpenNote[] = [];
  for (const note of pending) {
    if (note.start === tick) {
      retained.push(note);
      continue;
    }
    out.push({
      type: "note",
      data: { pitch, start: note.start, end: tick, velocity: note.velocity },
      tick: note.start,
      channel,
    });
  }

  if (retained.length > 0) {
    open.set(key, retained);
  } else {
    open.delete(key);
  }
}

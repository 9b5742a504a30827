import { describe, it, expect } from "vitest";
import type { MidiEvent } from "midi-file";
import { collectNoteOffs, assembleAbsoluteEvents, assembleTrack } from "./assembler.js";
import type { MidiDictData, NoteMessage } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

function note(pitch: number, start: number, end: number, velocity = 80, channel = 0): NoteMessage {
  return { type: "note", data: { pitch, start, end, velocity }, tick: start, channel };
}

function dict(overrides: Partial<MidiDictData> = {}): MidiDictData {
  return {
    meta_msgs: [],
    tempo_msgs: [{ type: "tempo", data: 500_000, tick: 0 }],
    pedal_msgs: [],
    instrument_msgs: [{ type: "instrument", data: 0, tick: 0, channel: 0 }],
    note_msgs: [],
    ticks_per_beat: 480,
    metadata: {},
    ...overrides,
  };
}

/** Compact view of an event for assertions. */
function describeEvent(event: MidiEvent): string {
  switch (event.type) {
    case "noteOn":
      return event.velocity === 0 ? `off ${event.noteNumber}` : `on ${event.noteNumber}/${event.velocity}`;
    case "setTempo":
      return `tempo ${event.microsecondsPerBeat}`;
    case "programChange":
      return `program ${event.programNumber}`;
    case "controller":
      return `cc${event.controllerType}=${event.value}`;
    default:
      return event.type;
  }
}

// ─── collectNoteOffs ────────────────────────────────────────────────────────

describe("collectNoteOffs", () => {
  it("emits one off per note", () => {
    expect(collectNoteOffs([note(60, 0, 100), note(64, 0, 50)])).toEqual([
      { tick: 100, channel: 0, pitch: 60 },
      { tick: 50, channel: 0, pitch: 64 },
    ]);
  });

  it("suppresses an off that would release a later overlapping note", () => {
    expect(collectNoteOffs([note(60, 0, 200), note(60, 100, 300)])).toEqual([
      { tick: 300, channel: 0, pitch: 60 },
    ]);
  });

  it("keeps the off of a note that contains the next one", () => {
    expect(collectNoteOffs([note(60, 0, 300), note(60, 100, 200)])).toEqual([
      { tick: 300, channel: 0, pitch: 60 },
      { tick: 200, channel: 0, pitch: 60 },
    ]);
  });
});

// ─── assembleAbsoluteEvents ─────────────────────────────────────────────────

describe("assembleAbsoluteEvents", () => {
  it("orders offs, then quieter ons, then louder ons, then other events at a tick", () => {
    const events = assembleAbsoluteEvents(
      dict({
        pedal_msgs: [{ type: "pedal", data: 1, tick: 100, channel: 0 }],
        note_msgs: [note(60, 0, 100), note(62, 100, 200, 90), note(64, 100, 200, 50)],
      }),
    );
    expect(events.map(e => `${e.tick} ${describeEvent(e.event)}`)).toEqual([
      "0 on 60/80",
      "0 tempo 500000",
      "0 program 0",
      "100 off 60",
      "100 on 64/50",
      "100 on 62/90",
      "100 cc64=127",
      "200 off 62",
      "200 off 64",
    ]);
  });

  it("writes a released pedal as controller value 0", () => {
    const events = assembleAbsoluteEvents(
      dict({ instrument_msgs: [], tempo_msgs: [], pedal_msgs: [{ type: "pedal", data: 0, tick: 5, channel: 2 }] }),
    );
    expect(events).toEqual([
      {
        tick: 5,
        event: { deltaTime: 0, type: "controller", channel: 2, controllerType: 64, value: 0 },
      },
    ]);
  });
});

// ─── assembleTrack ──────────────────────────────────────────────────────────

describe("assembleTrack", () => {
  it("converts to delta times and ends the track", () => {
    const track = assembleTrack(dict({ note_msgs: [note(60, 0, 480), note(62, 480, 960)] }));
    expect(track.map(e => [e.deltaTime, describeEvent(e)])).toEqual([
      [0, "on 60/80"],
      [0, "tempo 500000"],
      [0, "program 0"],
      [480, "off 60"],
      [0, "on 62/80"],
      [480, "off 62"],
      [0, "endOfTrack"],
    ]);
  });

  it("does not write meta messages", () => {
    const track = assembleTrack(dict({ meta_msgs: [{ type: "text", data: "hello" }] }));
    expect(track.map(describeEvent)).toEqual(["tempo 500000", "program 0", "endOfTrack"]);
  });
});

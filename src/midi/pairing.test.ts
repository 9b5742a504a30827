import { describe, it, expect } from "vitest";
import type { MidiEvent } from "midi-file";
import { toAbsoluteTicks, extractTrackData } from "./pairing.js";
import type { AbsoluteEvent } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

function on(tick: number, pitch: number, velocity: number, channel = 0): AbsoluteEvent {
  return { tick, event: { deltaTime: 0, type: "noteOn", channel, noteNumber: pitch, velocity } };
}

function off(tick: number, pitch: number, channel = 0): AbsoluteEvent {
  return { tick, event: { deltaTime: 0, type: "noteOff", channel, noteNumber: pitch, velocity: 0 } };
}

function cc(tick: number, controllerType: number, value: number, channel = 0): AbsoluteEvent {
  return { tick, event: { deltaTime: 0, type: "controller", channel, controllerType, value } };
}

// ─── toAbsoluteTicks ────────────────────────────────────────────────────────

describe("toAbsoluteTicks", () => {
  it("accumulates delta times", () => {
    const track: MidiEvent[] = [
      { deltaTime: 0, type: "noteOn", channel: 0, noteNumber: 60, velocity: 80 },
      { deltaTime: 100, type: "noteOff", channel: 0, noteNumber: 60, velocity: 0 },
      { deltaTime: 50, meta: true, type: "endOfTrack" },
    ];
    expect(toAbsoluteTicks(track).map(e => e.tick)).toEqual([0, 100, 150]);
  });

  it("keeps the original event objects", () => {
    const track: MidiEvent[] = [{ deltaTime: 7, meta: true, type: "endOfTrack" }];
    expect(toAbsoluteTicks(track)[0]?.event).toBe(track[0]);
  });
});

// ─── extractTrackData: notes ────────────────────────────────────────────────

describe("extractTrackData notes", () => {
  it("pairs a note-on with its note-off", () => {
    const data = extractTrackData([on(0, 60, 80), off(480, 60)]);
    expect(data.noteMsgs).toEqual([
      { type: "note", data: { pitch: 60, start: 0, end: 480, velocity: 80 }, tick: 0, channel: 0 },
    ]);
  });

  it("treats a velocity-0 note-on as a release", () => {
    const data = extractTrackData([on(10, 64, 90), on(20, 64, 0)]);
    expect(data.noteMsgs).toEqual([
      { type: "note", data: { pitch: 64, start: 10, end: 20, velocity: 90 }, tick: 10, channel: 0 },
    ]);
  });

  it("closes every retriggered note on one release", () => {
    const data = extractTrackData([on(0, 60, 80), on(100, 60, 90), off(200, 60)]);
    expect(data.noteMsgs.map(n => n.data)).toEqual([
      { pitch: 60, start: 0, end: 200, velocity: 80 },
      { pitch: 60, start: 100, end: 200, velocity: 90 },
    ]);
  });

  it("keeps a note open when released on its own start tick", () => {
    const data = extractTrackData([
      on(0, 60, 80),
      on(100, 60, 90),
      off(100, 60),
      off(250, 60),
    ]);
    expect(data.noteMsgs.map(n => n.data)).toEqual([
      { pitch: 60, start: 0, end: 100, velocity: 80 },
      { pitch: 60, start: 100, end: 250, velocity: 90 },
    ]);
  });

  it("drops releases with nothing open", () => {
    const data = extractTrackData([off(50, 60), on(60, 60, 70), off(90, 60)]);
    expect(data.noteMsgs.map(n => n.data)).toEqual([
      { pitch: 60, start: 60, end: 90, velocity: 70 },
    ]);
  });

  it("drops notes that are never released", () => {
    expect(extractTrackData([on(0, 60, 80)]).noteMsgs).toEqual([]);
  });

  it("does not pair across channels", () => {
    const data = extractTrackData([on(0, 60, 80, 0), off(10, 60, 1)]);
    expect(data.noteMsgs).toEqual([]);
  });

  it("sorts notes by start tick", () => {
    const data = extractTrackData([
      on(0, 60, 80),
      on(10, 62, 80),
      off(20, 62),
      off(30, 60),
    ]);
    expect(data.noteMsgs.map(n => n.tick)).toEqual([0, 10]);
  });
});

// ─── extractTrackData: other events ─────────────────────────────────────────

describe("extractTrackData other events", () => {
  it("classifies sustain by the 64 threshold", () => {
    const data = extractTrackData([cc(0, 64, 127), cc(10, 64, 63), cc(20, 64, 64), cc(30, 64, 0, 3)]);
    expect(data.pedalMsgs).toEqual([
      { type: "pedal", data: 1, tick: 0, channel: 0 },
      { type: "pedal", data: 0, tick: 10, channel: 0 },
      { type: "pedal", data: 1, tick: 20, channel: 0 },
      { type: "pedal", data: 0, tick: 30, channel: 3 },
    ]);
  });

  it("ignores other controllers", () => {
    expect(extractTrackData([cc(0, 7, 100), cc(0, 1, 127)]).pedalMsgs).toEqual([]);
  });

  it("extracts tempo, program and text events", () => {
    const data = extractTrackData([
      { tick: 0, event: { deltaTime: 0, meta: true, type: "text", text: "Prelude" } },
      { tick: 0, event: { deltaTime: 0, meta: true, type: "copyrightNotice", text: "Public domain" } },
      { tick: 0, event: { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: 600_000 } },
      { tick: 5, event: { deltaTime: 0, type: "programChange", channel: 2, programNumber: 40 } },
    ]);
    expect(data.metaMsgs).toEqual([
      { type: "text", data: "Prelude" },
      { type: "copyright", data: "Public domain" },
    ]);
    expect(data.tempoMsgs).toEqual([{ type: "tempo", data: 600_000, tick: 0 }]);
    expect(data.instrumentMsgs).toEqual([{ type: "instrument", data: 40, tick: 5, channel: 2 }]);
  });

  it("ignores unrelated meta events", () => {
    const data = extractTrackData([
      { tick: 0, event: { deltaTime: 0, meta: true, type: "trackName", text: "Piano" } },
      { tick: 0, event: { deltaTime: 0, meta: true, type: "endOfTrack" } },
    ]);
    expect(data).toEqual({ metaMsgs: [], tempoMsgs: [], pedalMsgs: [], instrumentMsgs: [], noteMsgs: [] });
  });
});

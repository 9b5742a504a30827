import { describe, it, expect } from "vitest";
import { MidiDict } from "../midi/midi-dict.js";
import type { NoteMessage } from "../midi/types.js";
import {
  testMaxPrograms,
  testMaxInstruments,
  testNoteFrequency,
  testNoteFrequencyPerInstrument,
  testMinLength,
  getTestFn,
  runTests,
} from "./filters.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

/** Ten eighth notes, one per beat: spans 4560 ticks = 4.75 s at 120 BPM. */
function tenNotes(): NoteMessage[] {
  return Array.from({ length: 10 }, (_, i) => ({
    type: "note" as const,
    data: { pitch: 60 + i, start: i * 480, end: i * 480 + 240, velocity: 80 },
    tick: i * 480,
    channel: 0,
  }));
}

function sampleDoc(): MidiDict {
  return new MidiDict({
    ticksPerBeat: 480,
    noteMsgs: tenNotes(),
    instrumentMsgs: [
      { type: "instrument", data: 0, tick: 0, channel: 0 },
      { type: "instrument", data: 1, tick: 0, channel: 1 },
      { type: "instrument", data: 40, tick: 0, channel: 2 },
    ],
  });
}

const frequencyArgs = { max_per_second: 50, min_per_second: 0.5 };

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("program and instrument counts", () => {
  it("counts distinct programs", () => {
    expect(testMaxPrograms(sampleDoc(), { max: 2 })).toEqual([false, 3]);
    expect(testMaxPrograms(sampleDoc(), { max: 3 })).toEqual([true, 3]);
  });

  it("counts distinct instrument families", () => {
    expect(testMaxInstruments(sampleDoc(), { max: 2 })).toEqual([true, 2]);
    expect(testMaxInstruments(sampleDoc(), { max: 1 })).toEqual([false, 2]);
  });
});

describe("note frequency", () => {
  it("measures notes per second over the note span", () => {
    const [passed, value] = testNoteFrequency(sampleDoc(), frequencyArgs);
    expect(passed).toBe(true);
    expect(value).toBeCloseTo(10 / 4.75, 6);
  });

  it("fails outside the bounds", () => {
    const [passed] = testNoteFrequency(sampleDoc(), { max_per_second: 2, min_per_second: 0 });
    expect(passed).toBe(false);
  });

  it("divides by the number of instrument families", () => {
    const [passed, value] = testNoteFrequencyPerInstrument(sampleDoc(), frequencyArgs);
    expect(passed).toBe(true);
    expect(value).toBeCloseTo(10 / 4.75 / 2, 6);
  });

  it("fails with no notes", () => {
    const empty = new MidiDict({ ticksPerBeat: 480 });
    expect(testNoteFrequency(empty, frequencyArgs)).toEqual([false, 0]);
    expect(testNoteFrequencyPerInstrument(empty, frequencyArgs)).toEqual([false, 0]);
  });

  it("fails when the notes span no time", () => {
    const doc = new MidiDict({
      ticksPerBeat: 480,
      noteMsgs: [{ type: "note", data: { pitch: 60, start: 0, end: 0, velocity: 80 }, tick: 0, channel: 0 }],
    });
    expect(testNoteFrequency(doc, frequencyArgs)).toEqual([false, 0]);
  });
});

describe("testMinLength", () => {
  it("reports the span in seconds", () => {
    expect(testMinLength(sampleDoc(), { min_seconds: 20 })).toEqual([false, 4.75]);
    expect(testMinLength(sampleDoc(), { min_seconds: 4 })).toEqual([true, 4.75]);
  });

  it("fails with no notes", () => {
    expect(testMinLength(new MidiDict({ ticksPerBeat: 480 }), { min_seconds: 0 })).toEqual([false, 0]);
  });
});

describe("registry", () => {
  it("looks tests up by config name", () => {
    expect(getTestFn("min_length")).toBe(testMinLength);
  });

  it("throws on unknown names", () => {
    expect(() => getTestFn("max_tempo")).toThrow("Error finding preprocessing function for max_tempo");
  });

  it("rejects malformed args", () => {
    expect(() => testMaxPrograms(sampleDoc(), {})).toThrow('Invalid args for test "max_programs": max: Required');
  });

  it("runs enabled tests in config order", () => {
    const results = runTests(sampleDoc(), {
      min_length: { run: true, args: { min_seconds: 4 } },
      max_programs: { run: false, args: { max: 1 } },
      unknown_test: { run: false, args: {} },
      max_instruments: { run: true, args: { max: 1 } },
    });
    expect(results).toEqual([
      { name: "min_length", passed: true, value: 4.75 },
      { name: "max_instruments", passed: false, value: 2 },
    ]);
  });
});

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { canonicalJson, calculateHash } from "./hash.js";
import type { MidiDictData } from "./types.js";

function dict(overrides: Partial<MidiDictData> = {}): MidiDictData {
  return {
    meta_msgs: [],
    tempo_msgs: [{ type: "tempo", data: 500_000, tick: 0 }],
    pedal_msgs: [],
    instrument_msgs: [{ type: "instrument", data: 0, tick: 0, channel: 0 }],
    note_msgs: [{ type: "note", data: { pitch: 60, start: 0, end: 480, velocity: 80 }, tick: 0, channel: 0 }],
    ticks_per_beat: 480,
    metadata: {},
    ...overrides,
  };
}

describe("canonicalJson", () => {
  it("sorts keys and uses spaced separators", () => {
    expect(canonicalJson({ b: 1, a: [1, { d: "x", c: 2 }] })).toBe('{"a": [1, {"c": 2, "d": "x"}], "b": 1}');
  });

  it("encodes scalars like JSON", () => {
    expect(canonicalJson(null)).toBe("null");
    expect(canonicalJson(true)).toBe("true");
    expect(canonicalJson("a\"b")).toBe('"a\\"b"');
    expect(canonicalJson([])).toBe("[]");
    expect(canonicalJson({})).toBe("{}");
  });

  it("rejects values JSON cannot hold", () => {
    expect(() => canonicalJson(() => 1)).toThrow("Cannot serialize value of type function");
  });
});

describe("calculateHash", () => {
  it("is the MD5 of the canonical musical content", () => {
    const data = dict();
    const expected = createHash("md5")
      .update(
        '{"instrument_msgs": [{"channel": 0, "data": 0, "tick": 0, "type": "instrument"}], ' +
          '"note_msgs": [{"channel": 0, "data": {"end": 480, "pitch": 60, "start": 0, "velocity": 80}, "tick": 0, "type": "note"}], ' +
          '"pedal_msgs": [], ' +
          '"tempo_msgs": [{"data": 500000, "tick": 0, "type": "tempo"}]}',
      )
      .digest("hex");
    expect(calculateHash(data)).toBe(expected);
  });

  it("ignores meta messages, resolution and metadata", () => {
    const base = calculateHash(dict());
    expect(
      calculateHash(
        dict({
          meta_msgs: [{ type: "text", data: "retitled" }],
          ticks_per_beat: 960,
          metadata: { composer: "bach" },
        }),
      ),
    ).toBe(base);
  });

  it("changes with the notes", () => {
    const moved = dict({
      note_msgs: [{ type: "note", data: { pitch: 62, start: 0, end: 480, velocity: 80 }, tick: 0, channel: 0 }],
    });
    expect(calculateHash(moved)).not.toBe(calculateHash(dict()));
  });
});

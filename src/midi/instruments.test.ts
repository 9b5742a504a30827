import { describe, it, expect } from "vitest";
import {
  INSTRUMENT_FAMILIES,
  programToInstrument,
  programsToRemove,
  channelsToRemove,
} from "./instruments.js";
import type { InstrumentMessage } from "./types.js";

function program(data: number, channel: number): InstrumentMessage {
  return { type: "instrument", data, tick: 0, channel };
}

describe("programToInstrument", () => {
  it("maps eight programs to each family", () => {
    expect(programToInstrument(0)).toBe("piano");
    expect(programToInstrument(7)).toBe("piano");
    expect(programToInstrument(8)).toBe("chromatic");
    expect(programToInstrument(40)).toBe("strings");
    expect(programToInstrument(127)).toBe("sfx");
  });

  it("covers sixteen families", () => {
    expect(INSTRUMENT_FAMILIES).toHaveLength(16);
  });

  it("rejects out-of-range programs", () => {
    expect(() => programToInstrument(128)).toThrow("Program out of range: 128");
    expect(() => programToInstrument(-1)).toThrow("Program out of range: -1");
    expect(() => programToInstrument(1.5)).toThrow("Program out of range: 1.5");
  });
});

describe("programsToRemove", () => {
  it("includes every program of a flagged family", () => {
    expect([...programsToRemove({ piano: true, organ: false })]).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
  });

  it("is empty when nothing is flagged", () => {
    expect(programsToRemove({}).size).toBe(0);
  });
});

describe("channelsToRemove", () => {
  it("finds channels playing a flagged program", () => {
    const channels = channelsToRemove(
      { instrument_msgs: [program(0, 0), program(40, 1), program(41, 2)] },
      { strings: true },
    );
    expect([...channels].sort()).toEqual([1, 2]);
  });

  it("never removes the drum channel", () => {
    const channels = channelsToRemove({ instrument_msgs: [program(118, 9)] }, { percussive: true });
    expect(channels.size).toBe(0);
  });
});

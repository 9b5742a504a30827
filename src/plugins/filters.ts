// ─── Filter Tests ────────────────────────────────────────────────────────────
//
// Named accept/reject checks run over a loaded MidiDict. Each returns a
// verdict together with the value it measured, so callers can log why a
// file was rejected. Like the metadata functions, the set is closed.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import type { MidiDict } from "../midi/midi-dict.js";
import type { PluginConfigMap } from "../config/schema.js";
import { getDurationMs } from "../midi/tempo.js";
import { programToInstrument } from "../midi/instruments.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/** `[passed, measured value]` */
export type TestResult = [passed: boolean, value: number];

export type TestFn = (doc: MidiDict, args: unknown) => TestResult;

/** One enabled test's outcome, as reported by runTests. */
export interface NamedTestResult {
  name: string;
  passed: boolean;
  value: number;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function defineTestFn<S extends z.ZodTypeAny>(
  name: string,
  argsSchema: S,
  fn: (doc: MidiDict, args: z.infer<S>) => TestResult,
): TestFn {
  return (doc, args) => {
    const parsed = argsSchema.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(i => `${i.path.join(".") || "args"}: ${i.message}`)
        .join("; ");
      throw new Error(`Invalid args for test "${name}": ${issues}`);
    }
    return fn(doc, parsed.data);
  };
}

/**
 * Milliseconds from the first note's start to the last note's end, in note
 * order. Undefined when there are no notes.
 */
function noteSpanMs(doc: MidiDict): number | undefined {
  const first = doc.noteMsgs[0];
  const last = doc.noteMsgs[doc.noteMsgs.length - 1];
  if (first === undefined || last === undefined) return undefined;

  return getDurationMs(first.data.start, last.data.end, doc.tempoMsgs, doc.ticksPerBeat);
}

/** Distinct instrument families named by the program changes. */
function countInstruments(doc: MidiDict): number {
  return new Set(doc.instrumentMsgs.map(msg => programToInstrument(msg.data))).size;
}

const MaxArgs = z.object({ max: z.number().int().nonnegative() });
const FrequencyArgs = z.object({
  max_per_second: z.number().nonnegative(),
  min_per_second: z.number().nonnegative(),
});
const MinLengthArgs = z.object({ min_seconds: z.number().nonnegative() });

// ─── Tests ───────────────────────────────────────────────────────────────────

/** Fails when more than `max` distinct programs are used. */
export const testMaxPrograms = defineTestFn("max_programs", MaxArgs, (doc, { max }) => {
  const programs = new Set(doc.instrumentMsgs.map(msg => msg.data)).size;
  return [programs <= max, programs];
});

/** Fails when more than `max` distinct instrument families are used. */
export const testMaxInstruments = defineTestFn("max_instruments", MaxArgs, (doc, { max }) => {
  const instruments = countInstruments(doc);
  return [instruments <= max, instruments];
});

/** Notes per second across the whole note span must sit within bounds. */
export const testNoteFrequency = defineTestFn(
  "total_note_frequency",
  FrequencyArgs,
  (doc, { max_per_second, min_per_second }) => {
    const spanMs = noteSpanMs(doc);
    if (spanMs === undefined || spanMs === 0) return [false, 0];

    const notesPerSecond = (doc.noteMsgs.length * 1e3) / spanMs;
    return [
      notesPerSecond >= min_per_second && notesPerSecond <= max_per_second,
      notesPerSecond,
    ];
  },
);

/** As total_note_frequency, divided by the number of instrument families. */
export const testNoteFrequencyPerInstrument = defineTestFn(
  "note_frequency_per_instrument",
  FrequencyArgs,
  (doc, { max_per_second, min_per_second }) => {
    const spanMs = noteSpanMs(doc);
    if (spanMs === undefined || spanMs === 0) return [false, 0];

    const perInstrument = (doc.noteMsgs.length * 1e3) / spanMs / countInstruments(doc);
    return [
      perInstrument >= min_per_second && perInstrument <= max_per_second,
      perInstrument,
    ];
  },
);

/** The note span must last at least `min_seconds`. Reports seconds. */
export const testMinLength = defineTestFn("min_length", MinLengthArgs, (doc, { min_seconds }) => {
  const spanMs = noteSpanMs(doc);
  if (spanMs === undefined || spanMs === 0) return [false, 0];

  const seconds = spanMs / 1e3;
  return [seconds >= min_seconds, seconds];
});

// ─── Registry ────────────────────────────────────────────────────────────────

export const TEST_FUNCTIONS = {
  max_programs: testMaxPrograms,
  max_instruments: testMaxInstruments,
  total_note_frequency: testNoteFrequency,
  note_frequency_per_instrument: testNoteFrequencyPerInstrument,
  min_length: testMinLength,
} as const satisfies Record<string, TestFn>;

export type TestFunctionName = keyof typeof TEST_FUNCTIONS;

export function isTestFunctionName(name: string): name is TestFunctionName {
  return Object.hasOwn(TEST_FUNCTIONS, name);
}

/**
 * Look up a filter test by its config name. Throws on unknown names.
 */
export function getTestFn(name: string): TestFn {
  if (!isTestFunctionName(name)) {
    throw new Error(`Error finding preprocessing function for ${name}`);
  }
  return TEST_FUNCTIONS[name];
}

/**
 * Run every enabled test in config order.
 */
export function runTests(doc: MidiDict, tests: PluginConfigMap): NamedTestResult[] {
  const results: NamedTestResult[] = [];
  for (const [name, settings] of Object.entries(tests)) {
    if (!settings.run) continue;
    const [passed, value] = getTestFn(name)(doc, settings.args);
    results.push({ name, passed, value });
  }
  return results;
}

// ─── MidiDict Interchange Schema ─────────────────────────────────────────────
//
// Zod schemas for the canonical dictionary form of a MIDI file. This is the
// shape written to / read from JSON, and the shape every message takes
// inside a MidiDict. Keys are snake_case so files stay interchangeable with
// other tools that read the same format.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Field Schemas ───────────────────────────────────────────────────────────

const tick = z.number().int().min(0);
const channel = z.number().int().min(0).max(15);
const sevenBit = z.number().int().min(0).max(127);

// ─── Message Schemas ─────────────────────────────────────────────────────────

export const MetaMessageSchema = z.object({
  type: z.enum(["text", "copyright"]),
  data: z.string(),
}).strict();

export const TempoMessageSchema = z.object({
  type: z.literal("tempo"),
  data: z.number().int().positive(),
  tick,
}).strict();

export const PedalMessageSchema = z.object({
  type: z.literal("pedal"),
  data: z.union([z.literal(0), z.literal(1)]),
  tick,
  channel,
}).strict();

export const InstrumentMessageSchema = z.object({
  type: z.literal("instrument"),
  data: sevenBit,
  tick,
  channel,
}).strict();

export const NoteDataSchema = z.object({
  pitch: sevenBit,
  start: tick,
  end: tick,
  velocity: z.number().int().min(1).max(127),
}).strict().refine((note) => note.start <= note.end, {
  message: "note start must not be after its end",
});

export const NoteMessageSchema = z.object({
  type: z.literal("note"),
  data: NoteDataSchema,
  tick,
  channel,
}).strict().refine((msg) => msg.tick === msg.data.start, {
  message: "note tick must equal its start",
});

/**
 * The full dictionary. `.strict()` rejects unknown top-level keys and the
 * required fields reject missing ones, so any structure whose key set
 * differs from the canonical seven fails to parse.
 */
export const MidiDictDataSchema = z.object({
  meta_msgs: z.array(MetaMessageSchema),
  tempo_msgs: z.array(TempoMessageSchema),
  pedal_msgs: z.array(PedalMessageSchema),
  instrument_msgs: z.array(InstrumentMessageSchema),
  note_msgs: z.array(NoteMessageSchema),
  ticks_per_beat: z.number().int().positive(),
  metadata: z.record(z.string(), z.unknown()),
}).strict();

// ─── Derived Types ───────────────────────────────────────────────────────────

export type MetaMessage = z.infer<typeof MetaMessageSchema>;
export type TempoMessage = z.infer<typeof TempoMessageSchema>;
export type PedalMessage = z.infer<typeof PedalMessageSchema>;
export type InstrumentMessage = z.infer<typeof InstrumentMessageSchema>;
export type NoteData = z.infer<typeof NoteDataSchema>;
export type NoteMessage = z.infer<typeof NoteMessageSchema>;
export type MidiDictData = z.infer<typeof MidiDictDataSchema>;

export type MidiMessage =
  | MetaMessage
  | TempoMessage
  | PedalMessage
  | InstrumentMessage
  | NoteMessage;

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Parse an unknown value as MidiDictData.
 * Throws with one line per zod issue if the structure is malformed.
 */
export function parseMidiDictData(value: unknown): MidiDictData {
  const result = MidiDictDataSchema.safeParse(value);
  if (result.success) return result.data;

  const issues = result.error.issues
    .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
    .join("\n");
  throw new Error(`Invalid MIDI dict:\n${issues}`);
}

// ─── Metadata Functions ──────────────────────────────────────────────────────
//
// Named functions that tag a MidiDict with metadata (composer, form, path)
// while it is loaded. The set is closed: config can enable, disable and
// parameterize them, but not add new ones.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { parse as parsePath, resolve } from "node:path";
import { z } from "zod";
import type { MidiDictData, MidiSource } from "../midi/types.js";
import type { PluginConfigMap } from "../config/schema.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/**
 * A metadata function. `args` comes straight from config and is validated
 * by the function itself.
 */
export type MetadataFn = (
  source: MidiSource,
  data: MidiDictData,
  args: unknown,
) => Record<string, string>;

// ─── Word Matching ───────────────────────────────────────────────────────────

/** Strip accents: "Dvořák" → "Dvorak". */
function toAscii(text: string): string {
  return text.normalize("NFKD").replace(/\p{M}/gu, "");
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whether `word` appears in `text` as a whole word, ignoring case and
 * accents. Words are delimited by whitespace, underscores, or the ends of
 * the text, so "bach" matches "Bach_Prelude" but not "Bacharach".
 */
export function matchWord(text: string, word: string): boolean {
  const pattern = new RegExp(
    `(^|[\\s_])(${escapeRegExp(toAscii(word))})([\\s_]|$)`,
    "i",
  );
  return pattern.test(toAscii(text));
}

/** The single name from `names` found in `text`, if exactly one is. */
function uniqueMatch(text: string, names: readonly string[]): string | undefined {
  const matched = new Set(names.filter(name => matchWord(text, name)));
  return matched.size === 1 ? [...matched][0] : undefined;
}

function fileStem(source: MidiSource): string | undefined {
  return source.filename === undefined ? undefined : parsePath(source.filename).name;
}

// ─── Definitions ─────────────────────────────────────────────────────────────

function defineMetadataFn<S extends z.ZodTypeAny>(
  name: string,
  argsSchema: S,
  fn: (source: MidiSource, data: MidiDictData, args: z.infer<S>) => Record<string, string>,
): MetadataFn {
  return (source, data, args) => {
    const parsed = argsSchema.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(i => `${i.path.join(".") || "args"}: ${i.message}`)
        .join("; ");
      throw new Error(`Invalid args for metadata function "${name}": ${issues}`);
    }
    return fn(source, data, parsed.data);
  };
}

const ComposerArgs = z.object({ composer_names: z.array(z.string()) });
const FormArgs = z.object({ form_names: z.array(z.string()) });
const MaestroArgs = z.object({
  metadata_path: z.string(),
  composer_names: z.array(z.string()),
  form_names: z.array(z.string()),
});

const MaestroEntrySchema = z.object({
  composer: z.string(),
  title: z.string(),
}).passthrough();
const MaestroIndexSchema = z.record(z.string(), MaestroEntrySchema);

type MaestroIndex = z.infer<typeof MaestroIndexSchema>;

const maestroIndexCache = new Map<string, MaestroIndex>();

function loadMaestroIndex(filePath: string): MaestroIndex {
  const cached = maestroIndexCache.get(filePath);
  if (cached) return cached;

  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  const index = MaestroIndexSchema.parse(raw);
  maestroIndexCache.set(filePath, index);
  return index;
}

/** Composer named in the file name, when exactly one is. */
export const composerFromFilename = defineMetadataFn(
  "composer_filename",
  ComposerArgs,
  (source, _data, { composer_names }): Record<string, string> => {
    const stem = fileStem(source);
    const composer = stem === undefined ? undefined : uniqueMatch(stem, composer_names);
    return composer ? { composer } : {};
  },
);

/** Musical form named in the file name, when exactly one is. */
export const formFromFilename = defineMetadataFn(
  "form_filename",
  FormArgs,
  (source, _data, { form_names }): Record<string, string> => {
    const stem = fileStem(source);
    const form = stem === undefined ? undefined : uniqueMatch(stem, form_names);
    return form ? { form } : {};
  },
);

/** Composer named across the file's text and copyright messages. */
export const composerFromMetaMsgs = defineMetadataFn(
  "composer_metamsg",
  ComposerArgs,
  (_source, data, { composer_names }): Record<string, string> => {
    const matched = new Set<string>();
    for (const msg of data.meta_msgs) {
      for (const name of composer_names) {
        if (matchWord(msg.data, name)) matched.add(name);
      }
    }
    return matched.size === 1 ? { composer: [...matched][0] } : {};
  },
);

/**
 * Composer and form from a MAESTRO-style index: a JSON object keyed by
 * `<stem>.midi` whose entries carry `composer` and `title`.
 */
export const maestroJson = defineMetadataFn(
  "maestro_json",
  MaestroArgs,
  (source, _data, { metadata_path, composer_names, form_names }) => {
    const stem = fileStem(source);
    if (stem === undefined) return {};

    const entry = loadMaestroIndex(metadata_path)[`${stem}.midi`];
    if (entry === undefined) return {};

    const result: Record<string, string> = {};
    const form = uniqueMatch(entry.title, form_names);
    const composer = uniqueMatch(entry.composer, composer_names);
    if (form) result.form = form;
    if (composer) result.composer = composer;
    return result;
  },
);

/** Absolute path of the source file. */
export const absPath = defineMetadataFn(
  "abs_path",
  z.object({}).passthrough(),
  (source): Record<string, string> => (source.filename === undefined ? {} : { abs_path: resolve(source.filename) }),
);

// ─── Registry ────────────────────────────────────────────────────────────────

export const METADATA_FUNCTIONS = {
  composer_filename: composerFromFilename,
  composer_metamsg: composerFromMetaMsgs,
  form_filename: formFromFilename,
  maestro_json: maestroJson,
  abs_path: absPath,
} as const satisfies Record<string, MetadataFn>;

export type MetadataFunctionName = keyof typeof METADATA_FUNCTIONS;

export function isMetadataFunctionName(name: string): name is MetadataFunctionName {
  return Object.hasOwn(METADATA_FUNCTIONS, name);
}

/**
 * Look up a metadata function by its config name.
 * Throws on unknown names: that is a config error, not bad data.
 */
export function getMetadataFn(name: string): MetadataFn {
  if (!isMetadataFunctionName(name)) {
    throw new Error(`Error finding metadata function for ${name}`);
  }
  return METADATA_FUNCTIONS[name];
}

/**
 * Run every enabled function in config order and merge the results into
 * `data.metadata`; a later function overwrites keys set by an earlier one.
 */
export function runMetadataFunctions(
  source: MidiSource,
  data: MidiDictData,
  functions: PluginConfigMap,
): void {
  for (const [name, settings] of Object.entries(functions)) {
    if (!settings.run) continue;
    const collected = getMetadataFn(name)(source, data, settings.args);
    Object.assign(data.metadata, collected);
  }
}
